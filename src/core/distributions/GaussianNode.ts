/**
 * Graph nodes
 *
 * A node is either a leaf, whose mean and σ are set by the caller, or a
 * product, whose mean and σ are a cache written only by recomputation.
 * `kind` decides which; `parentIds` are the graph edges.
 */

import { GaussianDistribution } from './GaussianDistribution';

export type NodeId = number;

export type NodeKind = 'leaf' | 'product';

interface NodeBase {
  readonly id: NodeId;
  readonly name: string;
  readonly mean: number;
  readonly stdDev: number;
  /** Order preserved, duplicates allowed */
  readonly parentIds: readonly NodeId[];
}

export interface LeafNode extends NodeBase {
  readonly kind: 'leaf';
}

export interface ProductNode extends NodeBase {
  readonly kind: 'product';
}

export type GaussianNode = LeafNode | ProductNode;

export function isProduct(node: GaussianNode): node is ProductNode {
  return node.kind === 'product';
}

export function isLeaf(node: GaussianNode): node is LeafNode {
  return node.kind === 'leaf';
}

/**
 * Build a leaf; parameters are validated by the caller
 */
export function createLeaf(id: NodeId, name: string, mean: number, stdDev: number): LeafNode {
  return { kind: 'leaf', id, name, mean, stdDev, parentIds: [] };
}

/**
 * View a node's current value as a distribution
 */
export function toDistribution(node: GaussianNode): GaussianDistribution {
  return new GaussianDistribution(node.mean, node.stdDev);
}

export function evaluateNode(node: GaussianNode, x: number): number {
  return toDistribution(node).pdf(x);
}

export function nodeMarkers(node: GaussianNode): number[] {
  return toDistribution(node).standardDeviationMarkers();
}
