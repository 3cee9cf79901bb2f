/**
 * Gaussian (Normal) distribution value type
 */

import jStat from 'jstat';
import { FusionError, ErrorCode } from '../errors';
import type { ContinuousDistribution } from './Distribution';

const SQRT_TWO_PI = Math.sqrt(2 * Math.PI);

/**
 * Offsets, in standard deviations, of the seven display markers
 */
export const MARKER_OFFSETS = [-3, -2, -1, 0, 1, 2, 3] as const;

export class GaussianDistribution implements ContinuousDistribution {
  constructor(
    private readonly meanValue: number,
    private readonly stdDevValue: number
  ) {
    assertGaussianParameters(meanValue, stdDevValue);
  }

  /**
   * Probability density function: 1/(σ√(2π)) · exp(-(x-μ)²/(2σ²))
   */
  pdf(x: number): number {
    return jStat.normal.pdf(x, this.meanValue, this.stdDevValue);
  }

  mean(): number {
    return this.meanValue;
  }

  stdDev(): number {
    return this.stdDevValue;
  }

  variance(): number {
    return this.stdDevValue * this.stdDevValue;
  }

  /**
   * Precision (1/variance), the weight a distribution carries in fusion
   */
  precision(): number {
    return 1 / this.variance();
  }

  /**
   * Density at the mean, the height of the curve's peak
   */
  peakDensity(): number {
    return peakDensity(this.stdDevValue);
  }

  /**
   * [μ-3σ, μ-2σ, μ-σ, μ, μ+σ, μ+2σ, μ+3σ]; index 3 is always the mean
   */
  standardDeviationMarkers(): number[] {
    return MARKER_OFFSETS.map((k) => (k === 0 ? this.meanValue : this.meanValue + k * this.stdDevValue));
  }
}

/**
 * Peak height of a Gaussian with the given standard deviation
 */
export function peakDensity(stdDev: number): number {
  return 1 / (stdDev * SQRT_TWO_PI);
}

/**
 * True when the mean is finite and σ is finite and positive
 */
export function isValidGaussian(mean: number, stdDev: number): boolean {
  return Number.isFinite(mean) && Number.isFinite(stdDev) && stdDev > 0;
}

/**
 * Throws INVALID_PARAMETER unless {@link isValidGaussian} holds
 */
export function assertGaussianParameters(mean: number, stdDev: number): void {
  if (!isValidGaussian(mean, stdDev)) {
    throw new FusionError(
      ErrorCode.INVALID_PARAMETER,
      `Invalid Gaussian parameters: mean=${mean}, stdDev=${stdDev}. Standard deviation must be positive.`,
      { mean, stdDev }
    );
  }
}
