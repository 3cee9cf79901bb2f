/**
 * Session snapshot codec
 *
 * Wire format (JSON):
 * {
 *   "distributions": { "<id>": { id, name, mean, std_dev, parent_ids, is_product } },
 *   "next_id": number,
 *   "show_shading": boolean,
 *   "shading_opacity": number,
 *   "show_std_markers": boolean
 * }
 *
 * Product values are stored as last computed and are not recomputed on load.
 */

import type { DisplaySettings } from '../config';
import { FusionError, ErrorCode, wrapError } from '../errors';
import type { GaussianNode, NodeId } from '../distributions/GaussianNode';

export interface SessionSnapshot {
  /** Ascending by id */
  nodes: GaussianNode[];
  nextId: NodeId;
  display: DisplaySettings;
}

export interface DistributionRecord {
  id: number;
  name: string;
  mean: number;
  std_dev: number;
  parent_ids: number[];
  is_product: boolean;
}

export interface SnapshotDocument {
  distributions: Record<string, DistributionRecord>;
  next_id: number;
  show_shading: boolean;
  shading_opacity: number;
  show_std_markers: boolean;
}

const MAX_ID = 0xffffffff;
const ID_KEY = /^(0|[1-9][0-9]*)$/;

export function toDocument(snapshot: SessionSnapshot): SnapshotDocument {
  const distributions: Record<string, DistributionRecord> = {};
  for (const node of snapshot.nodes) {
    distributions[String(node.id)] = {
      id: node.id,
      name: node.name,
      mean: node.mean,
      std_dev: node.stdDev,
      parent_ids: [...node.parentIds],
      is_product: node.kind === 'product',
    };
  }

  return {
    distributions,
    next_id: snapshot.nextId,
    show_shading: snapshot.display.showShading,
    shading_opacity: snapshot.display.shadingOpacity,
    show_std_markers: snapshot.display.showStdMarkers,
  };
}

/**
 * Serialize a snapshot as pretty-printed JSON
 */
export function encodeSnapshot(snapshot: SessionSnapshot): string {
  return JSON.stringify(toDocument(snapshot), null, 2);
}

/**
 * Parse and validate a snapshot. Throws DECODE_ERROR, message prefixed with
 * "Failed to parse session: ".
 */
export function decodeSnapshot(json: string): SessionSnapshot {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e: unknown) {
    const cause = wrapError(e, ErrorCode.DECODE_ERROR);
    throw decodeError(cause.message, cause.context);
  }
  return SnapshotValidator.validate(data);
}

function decodeError(detail: string, context?: Record<string, unknown>): FusionError {
  return new FusionError(ErrorCode.DECODE_ERROR, `Failed to parse session: ${detail}`, context);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_ID;
}

/**
 * Structural checks on a parsed snapshot document
 */
export class SnapshotValidator {
  static validate(data: unknown): SessionSnapshot {
    if (!isRecord(data)) {
      throw decodeError('expected a JSON object at the top level');
    }

    const nextId = data.next_id;
    if (!isId(nextId)) {
      throw decodeError('next_id must be a non-negative integer', { next_id: nextId });
    }

    const display = this.validateDisplay(data);
    const nodes = this.validateDistributions(data.distributions);

    for (const node of nodes) {
      if (node.id >= nextId) {
        throw decodeError(`next_id ${nextId} must be greater than every distribution id`, {
          id: node.id,
          next_id: nextId,
        });
      }
    }

    return { nodes, nextId, display };
  }

  private static validateDisplay(data: Record<string, unknown>): DisplaySettings {
    const { show_shading, shading_opacity, show_std_markers } = data;

    if (typeof show_shading !== 'boolean') {
      throw decodeError('show_shading must be a boolean');
    }
    if (typeof show_std_markers !== 'boolean') {
      throw decodeError('show_std_markers must be a boolean');
    }
    if (typeof shading_opacity !== 'number' || !(shading_opacity >= 0 && shading_opacity <= 1)) {
      throw decodeError('shading_opacity must be a number in [0, 1]', { shading_opacity });
    }

    return {
      showShading: show_shading,
      shadingOpacity: shading_opacity,
      showStdMarkers: show_std_markers,
    };
  }

  private static validateDistributions(value: unknown): GaussianNode[] {
    if (!isRecord(value)) {
      throw decodeError('distributions must be an object keyed by id');
    }

    const nodes: GaussianNode[] = [];
    for (const [key, record] of Object.entries(value)) {
      nodes.push(this.validateNode(key, record));
    }
    return nodes.sort((a, b) => a.id - b.id);
  }

  private static validateNode(key: string, record: unknown): GaussianNode {
    const where = `distributions.${key}`;

    if (!ID_KEY.test(key)) {
      throw decodeError(`${where}: key must be a non-negative integer id`);
    }
    if (!isRecord(record)) {
      throw decodeError(`${where} must be an object`);
    }

    const { id, name, mean, std_dev, parent_ids, is_product } = record;

    if (!isId(id)) {
      throw decodeError(`${where}.id must be a non-negative integer`, { id });
    }
    if (id !== Number(key)) {
      throw decodeError(`${where}.id ${id} does not match its key`, { key, id });
    }
    if (typeof name !== 'string') {
      throw decodeError(`${where}.name must be a string`);
    }
    if (typeof mean !== 'number' || !Number.isFinite(mean)) {
      throw decodeError(`${where}.mean must be a finite number`, { mean });
    }
    if (typeof std_dev !== 'number' || !Number.isFinite(std_dev) || std_dev <= 0) {
      throw decodeError(`${where}.std_dev must be a positive number`, { std_dev });
    }
    if (typeof is_product !== 'boolean') {
      throw decodeError(`${where}.is_product must be a boolean`);
    }
    if (!Array.isArray(parent_ids)) {
      throw decodeError(`${where}.parent_ids must be an array`);
    }

    const parentIds: NodeId[] = [];
    for (const parentId of parent_ids) {
      if (!isId(parentId)) {
        throw decodeError(`${where}.parent_ids must contain non-negative integers`, { parentId });
      }
      parentIds.push(parentId);
    }

    return {
      kind: is_product ? 'product' : 'leaf',
      id,
      name,
      mean,
      stdDev: std_dev,
      parentIds,
    };
  }
}
