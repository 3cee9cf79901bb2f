/**
 * Fusion workspace
 *
 * The state a front end drives: the graph, the pending fusion selection, the
 * display flags and the current view window. Every mutation recomputes the
 * products before returning, so reads always see consistent values.
 */

import { resolveConfig, type DisplaySettings, type EngineConfig, type EngineConfigOverrides, type Range } from '../config';
import { FusionError, ErrorCode } from '../errors';
import { toDistribution, type GaussianNode, type NodeId } from '../distributions/GaussianNode';
import { DistributionGraph, type LeafPatch, type RecomputeReport } from '../graph/DistributionGraph';
import { curvePoints, fillPolygon, visibleMarkers, type PlotPoint, type StdMarker } from '../sampling/sampler';
import { buildPlotLayers, type PlotLayer } from '../sampling/plotLayers';
import { autoFit, plotRange, type ViewBounds } from '../viewport/viewport';
import { decodeSnapshot, encodeSnapshot, type SessionSnapshot } from '../snapshot/SnapshotCodec';

export class FusionWorkspace {
  readonly config: EngineConfig;
  private graphValue: DistributionGraph;
  private selected: NodeId[] = [];
  private displayValue: DisplaySettings;
  private bounds: ViewBounds | undefined;

  constructor(overrides: EngineConfigOverrides = {}) {
    this.config = resolveConfig(overrides);
    this.graphValue = new DistributionGraph(this.config);
    this.displayValue = { ...this.config.display };
  }

  get graph(): DistributionGraph {
    return this.graphValue;
  }

  get display(): DisplaySettings {
    return { ...this.displayValue };
  }

  /**
   * Ids picked for the next fusion, in the order they were picked
   */
  get selection(): readonly NodeId[] {
    return [...this.selected];
  }

  get viewBounds(): ViewBounds | undefined {
    return this.bounds;
  }

  nodes(): GaussianNode[] {
    return this.graphValue.nodes();
  }

  // ---- graph mutations ----

  addLeaf(
    name: string = this.graphValue.nextName('leaf'),
    mean: number = this.config.defaultLeaf.mean,
    stdDev: number = this.config.defaultLeaf.stdDev
  ): NodeId {
    const id = this.graphValue.addLeaf(name, mean, stdDev);
    this.recompute();
    return id;
  }

  /**
   * Seed an empty workspace with one default leaf. Returns its id, or
   * undefined when nodes already exist.
   */
  ensureInitialLeaf(): NodeId | undefined {
    if (this.graphValue.size > 0) return undefined;
    return this.addLeaf();
  }

  editLeaf(id: NodeId, patch: LeafPatch): boolean {
    const changed = this.graphValue.editLeaf(id, patch);
    if (changed) this.recompute();
    return changed;
  }

  /**
   * Fuse the given ids into a new product
   */
  fuse(ids: readonly NodeId[], name: string = this.graphValue.nextName('product')): NodeId {
    const id = this.graphValue.fuseSelected(name, ids);
    this.recompute();
    return id;
  }

  /**
   * Fuse the current selection; clears it on success
   */
  fuseSelection(name?: string): NodeId {
    const id = this.fuse(this.selected, name);
    this.selected = [];
    return id;
  }

  delete(id: NodeId): boolean {
    this.selected = this.selected.filter((s) => s !== id);
    const removed = this.graphValue.delete(id);
    if (removed) this.recompute();
    return removed;
  }

  recompute(): RecomputeReport {
    return this.graphValue.recomputeProducts();
  }

  // ---- selection ----

  /**
   * Add or remove an id from the fusion selection. Unknown ids are ignored.
   */
  toggleSelected(id: NodeId, selected: boolean): void {
    if (!selected) {
      this.selected = this.selected.filter((s) => s !== id);
      return;
    }
    if (this.graphValue.has(id) && !this.selected.includes(id)) {
      this.selected.push(id);
    }
  }

  clearSelection(): void {
    this.selected = [];
  }

  // ---- display and viewport ----

  setDisplay(patch: Partial<DisplaySettings>): void {
    const next = { ...this.displayValue, ...patch };
    if (!(next.shadingOpacity >= 0 && next.shadingOpacity <= 1)) {
      throw new FusionError(ErrorCode.INVALID_PARAMETER, 'shadingOpacity must lie in [0, 1]', {
        shadingOpacity: next.shadingOpacity,
      });
    }
    this.displayValue = next;
  }

  setViewBounds(bounds: ViewBounds): void {
    this.bounds = bounds;
  }

  resetView(): void {
    this.bounds = undefined;
  }

  /**
   * Fit the view to the current nodes. Leaves the view unchanged and returns
   * undefined when there are none.
   */
  autoFitView(): ViewBounds | undefined {
    const fitted = autoFit(this.graphValue.nodes(), {
      marginStdDevs: this.config.autoFitMarginStdDevs,
      headroom: this.config.autoFitHeadroom,
      peak: this.config.autoFitPeak,
    });
    if (fitted) this.bounds = fitted;
    return fitted;
  }

  plotRange(): Range {
    return plotRange(this.bounds, this.config.defaultViewport);
  }

  // ---- sampling ----

  curvePoints(id: NodeId, samples: number = this.config.curveSamples): PlotPoint[] | undefined {
    const node = this.graphValue.get(id);
    if (!node) return undefined;
    const [xMin, xMax] = this.plotRange();
    return curvePoints(toDistribution(node), xMin, xMax, samples);
  }

  fillPolygon(id: NodeId, samples: number = this.config.curveSamples): PlotPoint[] | undefined {
    const node = this.graphValue.get(id);
    if (!node) return undefined;
    const [xMin, xMax] = this.plotRange();
    return fillPolygon(toDistribution(node), xMin, xMax, samples);
  }

  /**
   * Standard-deviation markers inside the current plot range
   */
  markers(id: NodeId): StdMarker[] | undefined {
    const node = this.graphValue.get(id);
    if (!node) return undefined;
    const [xMin, xMax] = this.plotRange();
    return visibleMarkers(toDistribution(node), xMin, xMax);
  }

  plotLayers(): PlotLayer[] {
    return buildPlotLayers(this.graphValue.nodes(), this.plotRange(), {
      samples: this.config.curveSamples,
      palette: this.config.palette,
      display: this.displayValue,
    });
  }

  // ---- persistence ----

  snapshot(): SessionSnapshot {
    return {
      nodes: this.graphValue.toRecords(),
      nextId: this.graphValue.nextId,
      display: this.display,
    };
  }

  saveSnapshot(): string {
    return encodeSnapshot(this.snapshot());
  }

  /**
   * Replace the workspace state with a saved session. Nothing changes if the
   * input is rejected. Products are not recomputed.
   */
  loadSnapshot(json: string): void {
    let snapshot: SessionSnapshot;
    let graph: DistributionGraph;
    try {
      snapshot = decodeSnapshot(json);
      graph = DistributionGraph.fromRecords(snapshot.nodes, snapshot.nextId, this.config);
    } catch (e: unknown) {
      if (this.config.verbose) {
        console.error('Failed to load session', e);
      }
      throw e;
    }

    this.graphValue = graph;
    this.displayValue = { ...snapshot.display };
    this.selected = [];
  }
}
