/**
 * Engine configuration
 *
 * Bounds for leaf editing, sampling density, auto-fit tuning and the display
 * flags a fresh workspace starts with.
 */

import { FusionError, ErrorCode } from './errors';
import { isValidGaussian } from './distributions/GaussianDistribution';

export type Range = readonly [min: number, max: number];

/**
 * Which node sizes the auto-fit peak height.
 * 'widest' uses the largest σ (lowest peak); 'narrowest' uses the smallest σ,
 * which always leaves room for the tallest curve.
 */
export type AutoFitPeak = 'widest' | 'narrowest';

export interface DisplaySettings {
  showShading: boolean;
  /** Fill opacity in [0, 1] */
  shadingOpacity: number;
  showStdMarkers: boolean;
}

export interface EngineConfig {
  meanRange: Range;
  stdDevRange: Range;
  defaultLeaf: { mean: number; stdDev: number };
  defaultViewport: Range;
  curveSamples: number;
  autoFitMarginStdDevs: number;
  autoFitHeadroom: number;
  autoFitPeak: AutoFitPeak;
  display: DisplaySettings;
  palette: readonly string[];
  verbose: boolean;
}

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'defaultLeaf' | 'display'>> & {
  defaultLeaf?: Partial<EngineConfig['defaultLeaf']>;
  display?: Partial<DisplaySettings>;
};

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze<EngineConfig>({
  meanRange: [-10, 10],
  stdDevRange: [0.1, 5],
  defaultLeaf: { mean: 0, stdDev: 1 },
  defaultViewport: [-6, 6],
  curveSamples: 300,
  autoFitMarginStdDevs: 4,
  autoFitHeadroom: 1.1,
  autoFitPeak: 'widest',
  display: { showShading: true, shadingOpacity: 0.3, showStdMarkers: true },
  palette: ['#0000ff', '#ff0000', '#00ff00', '#ffa500', '#800080', '#ffc0cb'],
  verbose: false,
});

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
    defaultLeaf: { ...DEFAULT_CONFIG.defaultLeaf, ...overrides.defaultLeaf },
    display: { ...DEFAULT_CONFIG.display, ...overrides.display },
  };

  validateConfig(config);
  return config;
}

function validateConfig(config: EngineConfig): void {
  checkRange('meanRange', config.meanRange);
  checkRange('stdDevRange', config.stdDevRange);
  checkRange('defaultViewport', config.defaultViewport);

  if (config.stdDevRange[0] <= 0) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'stdDevRange must start above 0', {
      stdDevRange: config.stdDevRange,
    });
  }

  if (!isValidGaussian(config.defaultLeaf.mean, config.defaultLeaf.stdDev)) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'defaultLeaf must have a finite mean and a positive stdDev', {
      defaultLeaf: config.defaultLeaf,
    });
  }

  if (!Number.isInteger(config.curveSamples) || config.curveSamples < 2) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'curveSamples must be an integer of at least 2', {
      curveSamples: config.curveSamples,
    });
  }

  if (!(config.autoFitMarginStdDevs >= 0) || !(config.autoFitHeadroom > 0)) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'Auto-fit margin must be >= 0 and headroom > 0', {
      autoFitMarginStdDevs: config.autoFitMarginStdDevs,
      autoFitHeadroom: config.autoFitHeadroom,
    });
  }

  const opacity = config.display.shadingOpacity;
  if (!(opacity >= 0 && opacity <= 1)) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'shadingOpacity must lie in [0, 1]', { opacity });
  }

  if (config.palette.length === 0) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, 'palette must contain at least one colour');
  }
}

function checkRange(name: string, range: Range): void {
  const [min, max] = range;
  if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
    throw new FusionError(ErrorCode.INVALID_CONFIG, `${name} must be a finite range with min < max`, {
      [name]: range,
    });
  }
}

/**
 * Clamp a value into an inclusive range
 */
export function clamp(value: number, [min, max]: Range): number {
  return Math.min(max, Math.max(min, value));
}
