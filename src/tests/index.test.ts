import { describe, it, expect } from 'vitest';
import { VERSION, FusionWorkspace, fuseGaussians, ErrorCode, DEFAULT_CONFIG } from '../index';

describe('package entry', () => {
  it('should expose the engine surface', () => {
    const ws = new FusionWorkspace();
    ws.ensureInitialLeaf();

    expect(VERSION).toBe('0.1.0');
    expect(ws.nodes()).toHaveLength(1);
    expect(fuseGaussians([])).toEqual({ mean: 0, variance: 1 });
    expect(ErrorCode.DECODE_ERROR).toBe('DECODE_ERROR');
    expect(DEFAULT_CONFIG.curveSamples).toBe(300);
  });
});
