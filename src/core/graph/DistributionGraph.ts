/**
 * Distribution graph
 *
 * Stores leaf and product nodes keyed by id and keeps products consistent
 * with their parents. Edges live on the products (`parentIds`); a parent may
 * be deleted while its products survive, leaving a dangling edge.
 */

import { DEFAULT_CONFIG, clamp, type Range } from '../config';
import { FusionError, ErrorCode } from '../errors';
import { assertGaussianParameters, isValidGaussian } from '../distributions/GaussianDistribution';
import {
  createLeaf,
  isProduct,
  type GaussianNode,
  type NodeId,
  type NodeKind,
  type ProductNode,
} from '../distributions/GaussianNode';
import { fuseGaussians, makeProduct } from '../fusion/fusion';

export interface GraphOptions {
  /** Bounds applied when a leaf is edited */
  meanRange: Range;
  stdDevRange: Range;
  verbose: boolean;
}

export interface LeafPatch {
  mean?: number;
  stdDev?: number;
}

/**
 * Outcome of one recomputation pass, ids in processing order
 */
export interface RecomputeReport {
  /** Products whose values were rewritten from their parents */
  updated: NodeId[];
  /** Products left untouched because a parent no longer exists */
  stale: NodeId[];
  /** Products left untouched because they sit on or below a dependency cycle */
  cyclic: NodeId[];
  /** Products left untouched because fusing their parents gave no valid Gaussian */
  degenerate: NodeId[];
}

export interface TopologicalOrder {
  /** Products ordered by parent depth, ties broken by id */
  order: ProductNode[];
  cyclic: ProductNode[];
}

export class DistributionGraph {
  private readonly nodesById = new Map<NodeId, GaussianNode>();
  private nextIdValue = 0;
  private readonly options: GraphOptions;

  constructor(options: Partial<GraphOptions> = {}) {
    this.options = {
      meanRange: options.meanRange ?? DEFAULT_CONFIG.meanRange,
      stdDevRange: options.stdDevRange ?? DEFAULT_CONFIG.stdDevRange,
      verbose: options.verbose ?? DEFAULT_CONFIG.verbose,
    };
  }

  /**
   * Rebuild a graph from stored nodes. `nextId` must exceed every id.
   */
  static fromRecords(
    records: Iterable<GaussianNode>,
    nextId: number,
    options: Partial<GraphOptions> = {}
  ): DistributionGraph {
    const graph = new DistributionGraph(options);

    for (const node of records) {
      if (graph.nodesById.has(node.id)) {
        throw new FusionError(ErrorCode.INVALID_PARAMETER, `Duplicate distribution id ${node.id}`, {
          id: node.id,
        });
      }
      if (node.id >= nextId) {
        throw new FusionError(
          ErrorCode.INVALID_PARAMETER,
          `Distribution id ${node.id} is not below next id ${nextId}`,
          { id: node.id, nextId }
        );
      }
      assertGaussianParameters(node.mean, node.stdDev);
      graph.nodesById.set(node.id, node);
    }

    graph.nextIdValue = nextId;
    return graph;
  }

  get size(): number {
    return this.nodesById.size;
  }

  /**
   * The id the next add or fuse will consume
   */
  get nextId(): NodeId {
    return this.nextIdValue;
  }

  has(id: NodeId): boolean {
    return this.nodesById.has(id);
  }

  get(id: NodeId): GaussianNode | undefined {
    return this.nodesById.get(id);
  }

  /**
   * All nodes in ascending id order
   */
  nodes(): GaussianNode[] {
    return [...this.nodesById.values()].sort((a, b) => a.id - b.id);
  }

  ids(): NodeId[] {
    return this.nodes().map((node) => node.id);
  }

  /**
   * Default display name for the next node of a kind, numbered from 1
   */
  nextName(kind: NodeKind): string {
    const label = kind === 'leaf' ? 'Gaussian' : 'Product';
    return `${label} ${this.nextIdValue + 1}`;
  }

  addLeaf(name: string, mean: number, stdDev: number): NodeId {
    assertGaussianParameters(mean, stdDev);

    const id = this.allocateId();
    this.nodesById.set(id, createLeaf(id, name, mean, stdDev));
    return id;
  }

  /**
   * Set a leaf's mean and/or σ, clamped to the configured ranges.
   * Returns false when the id is unknown.
   */
  editLeaf(id: NodeId, patch: LeafPatch): boolean {
    const node = this.nodesById.get(id);
    if (!node) return false;

    if (isProduct(node)) {
      throw new FusionError(
        ErrorCode.DERIVED_NODE,
        `Distribution ${id} is a product; its parameters are derived from its parents`,
        { id, parentIds: node.parentIds }
      );
    }

    const mean = patch.mean ?? node.mean;
    const stdDev = patch.stdDev ?? node.stdDev;
    if (!Number.isFinite(mean) || !Number.isFinite(stdDev)) {
      throw new FusionError(ErrorCode.INVALID_PARAMETER, 'Leaf parameters must be finite numbers', {
        id,
        mean,
        stdDev,
      });
    }

    this.nodesById.set(id, {
      ...node,
      mean: clamp(mean, this.options.meanRange),
      stdDev: clamp(stdDev, this.options.stdDevRange),
    });
    return true;
  }

  /**
   * Create a product of the given nodes. `ids` are stored verbatim as the
   * product's parents; at least two of them must currently exist, and their
   * fusion must be a valid Gaussian (INVALID_PARAMETER otherwise).
   */
  fuseSelected(name: string, ids: readonly NodeId[]): NodeId {
    const parents = this.resolve(ids);

    if (parents.length < 2) {
      throw new FusionError(
        ErrorCode.INSUFFICIENT_PARENTS,
        `Fusion needs at least 2 existing distributions, found ${parents.length}`,
        { requested: [...ids], resolved: parents.map((p) => p.id) }
      );
    }

    const product = makeProduct(this.nextIdValue, name, ids, parents);
    assertGaussianParameters(product.mean, product.stdDev);

    this.nodesById.set(this.allocateId(), product);
    return product.id;
  }

  /**
   * Remove a node. Products that list it keep the edge. Returns false when
   * the id is unknown.
   */
  delete(id: NodeId): boolean {
    return this.nodesById.delete(id);
  }

  /**
   * Order products so that every product comes after the products it fuses.
   * Kahn's algorithm in waves: a product's wave is the length of its longest
   * chain of product ancestors. Leaves and missing parents impose no order.
   */
  topologicalOrder(): TopologicalOrder {
    const products = this.nodes().filter(isProduct);
    const inDegree = new Map<NodeId, number>();
    const dependents = new Map<NodeId, ProductNode[]>();

    for (const product of products) {
      let degree = 0;
      for (const parentId of product.parentIds) {
        const parent = this.nodesById.get(parentId);
        if (parent && isProduct(parent)) {
          degree++;
          const list = dependents.get(parentId) ?? [];
          list.push(product);
          dependents.set(parentId, list);
        }
      }
      inDegree.set(product.id, degree);
    }

    const order: ProductNode[] = [];
    let wave = products.filter((p) => inDegree.get(p.id) === 0);

    while (wave.length > 0) {
      order.push(...wave);
      const next: ProductNode[] = [];

      for (const product of wave) {
        for (const dependent of dependents.get(product.id) ?? []) {
          const remaining = (inDegree.get(dependent.id) ?? 0) - 1;
          inDegree.set(dependent.id, remaining);
          if (remaining === 0) next.push(dependent);
        }
      }

      wave = next.sort((a, b) => a.id - b.id);
    }

    const ordered = new Set(order.map((p) => p.id));
    return { order, cyclic: products.filter((p) => !ordered.has(p.id)) };
  }

  /**
   * Refresh every product from its parents' current values in one pass.
   * Products with a missing parent, an empty parent list, a cyclic ancestry,
   * or a fused value that is not a valid Gaussian keep their stored values.
   */
  recomputeProducts(): RecomputeReport {
    const { order, cyclic } = this.topologicalOrder();
    const report: RecomputeReport = {
      updated: [],
      stale: [],
      cyclic: cyclic.map((p) => p.id),
      degenerate: [],
    };

    for (const product of order) {
      if (product.parentIds.length === 0) continue;

      const parents = this.resolve(product.parentIds);
      if (parents.length < product.parentIds.length) {
        report.stale.push(product.id);
        continue;
      }

      const { mean, variance } = fuseGaussians(parents);
      const stdDev = Math.sqrt(variance);
      if (!isValidGaussian(mean, stdDev)) {
        report.degenerate.push(product.id);
        continue;
      }

      this.nodesById.set(product.id, { ...product, mean, stdDev });
      report.updated.push(product.id);
    }

    if (this.options.verbose && report.cyclic.length > 0) {
      console.warn('Products on a dependency cycle were not recomputed:', report.cyclic);
    }
    if (this.options.verbose && report.degenerate.length > 0) {
      console.warn('Products whose parents fuse to no valid Gaussian were not recomputed:', report.degenerate);
    }

    return report;
  }

  /**
   * Snapshot of every node, ascending by id
   */
  toRecords(): GaussianNode[] {
    return this.nodes();
  }

  private resolve(ids: readonly NodeId[]): GaussianNode[] {
    const found: GaussianNode[] = [];
    for (const id of ids) {
      const node = this.nodesById.get(id);
      if (node) found.push(node);
    }
    return found;
  }

  private allocateId(): NodeId {
    return this.nextIdValue++;
  }
}
