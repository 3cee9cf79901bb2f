/**
 * Per-node drawing data for a rendering layer
 */

import type { DisplaySettings, Range } from '../config';
import { toDistribution, type GaussianNode, type NodeId } from '../distributions/GaussianNode';
import { curvePoints, fillPolygon, shadingAlpha, visibleMarkers, type PlotPoint, type StdMarker } from './sampler';

export interface PlotLayer {
  id: NodeId;
  name: string;
  isProduct: boolean;
  color: string;
  curve: PlotPoint[];
  /** Present when shading is on */
  fill?: { polygon: PlotPoint[]; alpha: number };
  /** Present when std markers are on */
  markers?: StdMarker[];
}

export interface PlotLayerOptions {
  samples: number;
  palette: readonly string[];
  display: DisplaySettings;
}

/**
 * One layer per node, in the order given; colours cycle through the palette
 */
export function buildPlotLayers(
  nodes: readonly GaussianNode[],
  [xMin, xMax]: Range,
  options: PlotLayerOptions
): PlotLayer[] {
  const { samples, palette, display } = options;

  return nodes.map((node, index) => {
    const dist = toDistribution(node);
    const layer: PlotLayer = {
      id: node.id,
      name: node.name,
      isProduct: node.kind === 'product',
      color: palette[index % palette.length],
      curve: curvePoints(dist, xMin, xMax, samples),
    };

    if (display.showShading) {
      layer.fill = {
        polygon: fillPolygon(dist, xMin, xMax, samples),
        alpha: shadingAlpha(display.shadingOpacity),
      };
    }

    if (display.showStdMarkers) {
      layer.markers = visibleMarkers(dist, xMin, xMax);
    }

    return layer;
  });
}
