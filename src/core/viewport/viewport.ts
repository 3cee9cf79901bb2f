/**
 * Display window sizing
 */

import { extent, max, min } from 'd3-array';
import { DEFAULT_CONFIG, type AutoFitPeak, type Range } from '../config';
import { peakDensity } from '../distributions/GaussianDistribution';

export interface ViewBounds {
  x: Range;
  y: Range;
}

export interface AutoFitOptions {
  /** Margin beyond the outermost means, in multiples of the largest σ */
  marginStdDevs: number;
  /** Multiplier applied to the peak height */
  headroom: number;
  peak: AutoFitPeak;
}

type Fittable = { mean: number; stdDev: number };

export const DEFAULT_VIEWPORT: Range = DEFAULT_CONFIG.defaultViewport;

/**
 * Window containing every node's mass.
 *
 * x spans the outermost means widened by `marginStdDevs` of the largest σ.
 * y starts at 0 and tops out at `headroom` times the peak of the widest node
 * (or of the narrowest, with `peak: 'narrowest'`). With the default, narrower
 * nodes can peak above the window.
 */
export function autoFit(
  nodes: Iterable<Fittable>,
  options: Partial<AutoFitOptions> = {}
): ViewBounds | undefined {
  const marginStdDevs = options.marginStdDevs ?? DEFAULT_CONFIG.autoFitMarginStdDevs;
  const headroom = options.headroom ?? DEFAULT_CONFIG.autoFitHeadroom;
  const peak = options.peak ?? DEFAULT_CONFIG.autoFitPeak;

  const list = [...nodes];
  const [minMean, maxMean] = extent(list, (n) => n.mean);
  const maxStd = max(list, (n) => n.stdDev);
  const minStd = min(list, (n) => n.stdDev);

  if (minMean === undefined || maxMean === undefined || maxStd === undefined || minStd === undefined) {
    return undefined;
  }

  const margin = marginStdDevs * maxStd;
  const peakStd = peak === 'narrowest' ? minStd : maxStd;

  return {
    x: [minMean - margin, maxMean + margin],
    y: [0, peakDensity(peakStd) * headroom],
  };
}

/**
 * Horizontal range to sample: the fitted or panned bounds, else the fallback
 */
export function plotRange(bounds: ViewBounds | undefined, fallback: Range = DEFAULT_VIEWPORT): Range {
  return bounds ? bounds.x : fallback;
}
