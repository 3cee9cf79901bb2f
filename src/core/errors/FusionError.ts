/**
 * Structured errors for the fusion engine
 *
 * Every failure the engine surfaces carries an ErrorCode so callers can branch
 * on the category without matching message text.
 */

/**
 * Error codes covering every failure the engine can raise
 */
export enum ErrorCode {
  // Parameter errors
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  INVALID_SAMPLE_COUNT = 'INVALID_SAMPLE_COUNT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Graph errors
  INSUFFICIENT_PARENTS = 'INSUFFICIENT_PARENTS',
  DERIVED_NODE = 'DERIVED_NODE',

  // Persistence errors
  DECODE_ERROR = 'DECODE_ERROR',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class with a structured code and optional debugging context
 *
 * @example
 * ```typescript
 * throw new FusionError(
 *   ErrorCode.INSUFFICIENT_PARENTS,
 *   'Fusion needs at least 2 existing distributions',
 *   { requested: [3, 9], resolved: [3] }
 * );
 * ```
 */
export class FusionError extends Error {
  /**
   * @param code - Category of the failure
   * @param message - Human-readable description
   * @param context - Values that help explain the failure
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FusionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FusionError);
    }
  }

  /**
   * Code, message and context on one line
   */
  override toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }
}

/**
 * Type guard for FusionError
 */
export function isFusionError(error: unknown): error is FusionError {
  return error instanceof FusionError;
}

/**
 * Wrap an unknown thrown value as a FusionError, leaving FusionErrors untouched
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): FusionError {
  if (isFusionError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new FusionError(code, message, context);
}
