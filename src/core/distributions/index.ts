/**
 * Distribution value types and graph nodes
 */

export type { ContinuousDistribution } from './Distribution';
export {
  GaussianDistribution,
  MARKER_OFFSETS,
  peakDensity,
  assertGaussianParameters,
  isValidGaussian,
} from './GaussianDistribution';
export {
  createLeaf,
  evaluateNode,
  isLeaf,
  isProduct,
  nodeMarkers,
  toDistribution,
} from './GaussianNode';
export type { GaussianNode, LeafNode, NodeId, NodeKind, ProductNode } from './GaussianNode';
