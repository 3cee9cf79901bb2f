/**
 * Core module exports
 */

export { FusionError, ErrorCode, isFusionError, wrapError } from './errors';

export { DEFAULT_CONFIG, resolveConfig, clamp } from './config';
export type {
  AutoFitPeak,
  DisplaySettings,
  EngineConfig,
  EngineConfigOverrides,
  Range,
} from './config';

export * from './distributions';

export { fuseGaussians, makeProduct, EMPTY_FUSION } from './fusion/fusion';
export type { FusionResult, GaussianParameters } from './fusion/fusion';

export { DistributionGraph } from './graph/DistributionGraph';
export type { GraphOptions, LeafPatch, RecomputeReport, TopologicalOrder } from './graph/DistributionGraph';

export {
  curvePoints,
  fillPolygon,
  shadingAlpha,
  standardDeviationMarkers,
  visibleMarkers,
} from './sampling/sampler';
export type { MarkerRole, PlotPoint, StdMarker } from './sampling/sampler';
export { buildPlotLayers } from './sampling/plotLayers';
export type { PlotLayer, PlotLayerOptions } from './sampling/plotLayers';

export { autoFit, plotRange, DEFAULT_VIEWPORT } from './viewport/viewport';
export type { AutoFitOptions, ViewBounds } from './viewport/viewport';

export { decodeSnapshot, encodeSnapshot, toDocument, SnapshotValidator } from './snapshot/SnapshotCodec';
export type { DistributionRecord, SessionSnapshot, SnapshotDocument } from './snapshot/SnapshotCodec';

export { FusionWorkspace } from './workspace/FusionWorkspace';
