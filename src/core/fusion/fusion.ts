/**
 * Precision-weighted fusion of Gaussian beliefs
 *
 * The product of independent Gaussian PDFs, renormalized, is again Gaussian:
 *   precision  p_i = 1/σ_i²
 *   mean       = Σ μ_i·p_i / Σ p_i
 *   variance   = 1 / Σ p_i
 */

import type { NodeId, ProductNode } from '../distributions/GaussianNode';

export interface GaussianParameters {
  mean: number;
  stdDev: number;
}

export interface FusionResult {
  mean: number;
  variance: number;
}

/**
 * Result returned for an empty parent list. A compatibility default, not the
 * fusion of nothing.
 */
export const EMPTY_FUSION: Readonly<FusionResult> = Object.freeze({ mean: 0, variance: 1 });

/**
 * Fuse any number of Gaussians. Duplicates are counted once per occurrence.
 */
export function fuseGaussians(parents: readonly GaussianParameters[]): FusionResult {
  if (parents.length === 0) {
    return { ...EMPTY_FUSION };
  }

  let precisionSum = 0;
  let weightedMeanSum = 0;

  for (const { mean, stdDev } of parents) {
    const precision = 1 / (stdDev * stdDev);
    precisionSum += precision;
    weightedMeanSum += mean * precision;
  }

  return {
    mean: weightedMeanSum / precisionSum,
    variance: 1 / precisionSum,
  };
}

/**
 * Build a product node from the current values of its parents
 */
export function makeProduct(
  id: NodeId,
  name: string,
  parentIds: readonly NodeId[],
  parentValues: readonly GaussianParameters[]
): ProductNode {
  const { mean, variance } = fuseGaussians(parentValues);
  return {
    kind: 'product',
    id,
    name,
    mean,
    stdDev: Math.sqrt(variance),
    parentIds: [...parentIds],
  };
}
