/**
 * Minimal interface the sampler needs from a continuous distribution
 */
export interface ContinuousDistribution {
  /**
   * Probability density at x
   */
  pdf(x: number): number;

  mean(): number;

  variance(): number;

  stdDev(): number;
}
