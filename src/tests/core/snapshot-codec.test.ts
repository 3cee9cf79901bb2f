import { describe, it, expect } from 'vitest';
import { decodeSnapshot, encodeSnapshot, toDocument, type SessionSnapshot } from '../../core/snapshot/SnapshotCodec';
import { DistributionGraph } from '../../core/graph/DistributionGraph';
import { ErrorCode, FusionError } from '../../core/errors';
import { captureError } from '../utilities/errors';

function sampleSnapshot(): SessionSnapshot {
  const graph = new DistributionGraph();
  graph.addLeaf('Test1', 1, 0.5);
  graph.addLeaf('Test2', -1, 2);
  graph.fuseSelected('Product', [1, 0]);
  graph.addLeaf('Spare', 3.25, 1.1);
  graph.delete(3);

  return {
    nodes: graph.toRecords(),
    nextId: graph.nextId,
    display: { showShading: false, shadingOpacity: 0.65, showStdMarkers: true },
  };
}

function validDocument(): Record<string, unknown> {
  return {
    distributions: {
      '0': { id: 0, name: 'A', mean: 0, std_dev: 1, parent_ids: [], is_product: false },
    },
    next_id: 1,
    show_shading: true,
    shading_opacity: 0.3,
    show_std_markers: true,
  };
}

function decodeFailure(doc: unknown): unknown {
  return captureError(() => decodeSnapshot(JSON.stringify(doc)));
}

describe('encodeSnapshot', () => {
  it('should write the wire format keyed by id', () => {
    const snapshot = sampleSnapshot();
    const doc = JSON.parse(encodeSnapshot(snapshot));

    expect(Object.keys(doc.distributions)).toEqual(['0', '1', '2']);
    expect(doc.next_id).toBe(4);
    expect(doc.show_shading).toBe(false);
    expect(doc.shading_opacity).toBe(0.65);
    expect(doc.show_std_markers).toBe(true);
    expect(doc.distributions['1']).toEqual({
      id: 1,
      name: 'Test2',
      mean: -1,
      std_dev: 2,
      parent_ids: [],
      is_product: false,
    });
    expect(doc.distributions['2'].parent_ids).toEqual([1, 0]);
    expect(doc.distributions['2'].is_product).toBe(true);
  });

  it('should pretty-print with two-space indentation', () => {
    const json = encodeSnapshot(sampleSnapshot());
    expect(json.startsWith('{\n  "distributions": {\n    "0": {')).toBe(true);
    expect(json).toBe(JSON.stringify(toDocument(sampleSnapshot()), null, 2));
  });
});

describe('decodeSnapshot', () => {
  it('should round-trip every field, derived values included', () => {
    const snapshot = sampleSnapshot();
    const decoded = decodeSnapshot(encodeSnapshot(snapshot));

    expect(decoded).toEqual(snapshot);
    expect(decoded.nodes[2].kind).toBe('product');
    expect(decoded.nodes[2].parentIds).toEqual([1, 0]);
    expect(decoded.nodes[2].mean).toBe(snapshot.nodes[2].mean);
    expect(decoded.nodes[2].stdDev).toBe(snapshot.nodes[2].stdDev);
  });

  it('should keep stale product values as stored', () => {
    const doc = validDocument();
    doc.distributions = {
      '0': { id: 0, name: 'A', mean: 0, std_dev: 1, parent_ids: [], is_product: false },
      '5': { id: 5, name: 'P', mean: 9, std_dev: 0.25, parent_ids: [0, 3], is_product: true },
    };
    doc.next_id = 6;

    const decoded = decodeSnapshot(JSON.stringify(doc));
    expect(decoded.nodes[1]).toEqual({ kind: 'product', id: 5, name: 'P', mean: 9, stdDev: 0.25, parentIds: [0, 3] });
  });

  it('should preserve parents listed on a leaf', () => {
    const doc = validDocument();
    doc.distributions = {
      '0': { id: 0, name: 'A', mean: 0, std_dev: 1, parent_ids: [], is_product: false },
      '1': { id: 1, name: 'B', mean: 0, std_dev: 1, parent_ids: [0], is_product: false },
    };
    doc.next_id = 2;

    const decoded = decodeSnapshot(JSON.stringify(doc));
    expect(decoded.nodes[1].kind).toBe('leaf');
    expect(decoded.nodes[1].parentIds).toEqual([0]);
    expect(JSON.parse(encodeSnapshot(decoded)).distributions['1'].parent_ids).toEqual([0]);
  });

  it('should accept an empty session', () => {
    const doc = validDocument();
    doc.distributions = {};
    doc.next_id = 0;

    expect(decodeSnapshot(JSON.stringify(doc)).nodes).toEqual([]);
  });

  it('should report malformed JSON as DECODE_ERROR', () => {
    const error = captureError(() => decodeSnapshot('{ not json'));

    expect(error).toBeInstanceOf(FusionError);
    expect(error).toMatchObject({
      code: ErrorCode.DECODE_ERROR,
      message: expect.stringMatching(/^Failed to parse session: /),
      context: { originalStack: expect.any(String) },
    });
  });

  it('should reject a non-object document', () => {
    expect(decodeFailure([1, 2])).toMatchObject({
      message: 'Failed to parse session: expected a JSON object at the top level',
    });
  });

  it('should reject missing or mistyped top-level fields', () => {
    const noNextId = validDocument();
    delete noNextId.next_id;
    expect(decodeFailure(noNextId)).toMatchObject({
      message: 'Failed to parse session: next_id must be a non-negative integer',
    });

    const badFlag = { ...validDocument(), show_shading: 'yes' };
    expect(decodeFailure(badFlag)).toMatchObject({
      message: 'Failed to parse session: show_shading must be a boolean',
    });

    const badOpacity = { ...validDocument(), shading_opacity: 1.5 };
    expect(decodeFailure(badOpacity)).toMatchObject({
      message: 'Failed to parse session: shading_opacity must be a number in [0, 1]',
    });

    const badDistributions = { ...validDocument(), distributions: [] };
    expect(decodeFailure(badDistributions)).toMatchObject({
      message: 'Failed to parse session: distributions must be an object keyed by id',
    });
  });

  it('should reject invalid distribution records', () => {
    const record = (overrides: Record<string, unknown>) => ({
      ...validDocument(),
      distributions: {
        '0': { id: 0, name: 'A', mean: 0, std_dev: 1, parent_ids: [], is_product: false, ...overrides },
      },
    });

    expect(decodeFailure(record({ std_dev: 0 }))).toMatchObject({
      code: ErrorCode.DECODE_ERROR,
      message: 'Failed to parse session: distributions.0.std_dev must be a positive number',
    });
    expect(decodeFailure(record({ mean: 'x' }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.mean must be a finite number',
    });
    expect(decodeFailure(record({ name: 3 }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.name must be a string',
    });
    expect(decodeFailure(record({ id: 1 }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.id 1 does not match its key',
    });
    expect(decodeFailure(record({ id: -1 }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.id must be a non-negative integer',
    });
    expect(decodeFailure(record({ parent_ids: [0, 'a'] }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.parent_ids must contain non-negative integers',
    });
    expect(decodeFailure(record({ parent_ids: null }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.parent_ids must be an array',
    });
    expect(decodeFailure(record({ is_product: 1 }))).toMatchObject({
      message: 'Failed to parse session: distributions.0.is_product must be a boolean',
    });
  });

  it('should reject non-canonical keys', () => {
    const doc = {
      ...validDocument(),
      distributions: { '01': { id: 1, name: 'A', mean: 0, std_dev: 1, parent_ids: [], is_product: false } },
      next_id: 2,
    };
    expect(decodeFailure(doc)).toMatchObject({
      message: 'Failed to parse session: distributions.01: key must be a non-negative integer id',
    });
  });

  it('should reject a next_id that does not exceed every id', () => {
    const doc = { ...validDocument(), next_id: 0 };
    expect(decodeFailure(doc)).toMatchObject({
      message: 'Failed to parse session: next_id 0 must be greater than every distribution id',
    });
  });
});
