/**
 * Deterministic sampling of a density into point sequences for display
 */

import { FusionError, ErrorCode } from '../errors';
import { MARKER_OFFSETS, type GaussianDistribution } from '../distributions/GaussianDistribution';
import type { ContinuousDistribution } from '../distributions/Distribution';

export interface PlotPoint {
  x: number;
  y: number;
}

export type MarkerRole = 'mean' | 'sigma';

export interface StdMarker {
  x: number;
  /** Signed distance from the mean in standard deviations, -3..3 */
  offset: number;
  role: MarkerRole;
}

/**
 * `n` evenly spaced samples over [xMin, xMax], both endpoints included
 */
export function curvePoints(
  dist: ContinuousDistribution,
  xMin: number,
  xMax: number,
  n: number
): PlotPoint[] {
  if (!Number.isInteger(n) || n < 2) {
    throw new FusionError(ErrorCode.INVALID_SAMPLE_COUNT, `Curve sampling needs at least 2 points, got ${n}`, {
      n,
    });
  }

  const points: PlotPoint[] = new Array(n);
  for (let i = 0; i < n; i++) {
    const x = xMin + ((xMax - xMin) * i) / (n - 1);
    points[i] = { x, y: dist.pdf(x) };
  }
  return points;
}

/**
 * Closed area under the curve: (xMin, 0), `n` interior samples, (xMax, 0).
 *
 * Interior samples sit at i/(n+1) for i = 1..n, strictly inside the range so
 * they never coincide with the corners; a single sample sits at the midpoint.
 * The renderer closes the polygon from the last vertex back to the first.
 */
export function fillPolygon(
  dist: ContinuousDistribution,
  xMin: number,
  xMax: number,
  n: number
): PlotPoint[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new FusionError(ErrorCode.INVALID_SAMPLE_COUNT, `Fill polygon needs a non-negative sample count, got ${n}`, {
      n,
    });
  }

  const points: PlotPoint[] = [{ x: xMin, y: 0 }];

  if (n === 1) {
    const x = (xMin + xMax) / 2;
    points.push({ x, y: dist.pdf(x) });
  } else if (n > 1) {
    for (let i = 1; i <= n; i++) {
      const x = xMin + ((xMax - xMin) * i) / (n + 1);
      points.push({ x, y: dist.pdf(x) });
    }
  }

  points.push({ x: xMax, y: 0 });
  return points;
}

export function standardDeviationMarkers(dist: GaussianDistribution): number[] {
  return dist.standardDeviationMarkers();
}

/**
 * Markers that fall inside [xMin, xMax], boundaries included
 */
export function visibleMarkers(dist: GaussianDistribution, xMin: number, xMax: number): StdMarker[] {
  const positions = dist.standardDeviationMarkers();
  const markers: StdMarker[] = [];

  MARKER_OFFSETS.forEach((offset, i) => {
    const x = positions[i];
    if (x >= xMin && x <= xMax) {
      markers.push({ x, offset, role: offset === 0 ? 'mean' : 'sigma' });
    }
  });

  return markers;
}

/**
 * 8-bit fill alpha for an opacity in [0, 1], floored, never below 1
 */
export function shadingAlpha(opacity: number): number {
  const clamped = Math.min(1, Math.max(0, opacity));
  return Math.max(1, Math.floor(255 * clamped));
}
