import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, clamp, resolveConfig, type EngineConfigOverrides } from '../../core/config';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/errors';

describe('resolveConfig', () => {
  it('should return the defaults without overrides', () => {
    const config = resolveConfig();

    expect(config.meanRange).toEqual([-10, 10]);
    expect(config.stdDevRange).toEqual([0.1, 5]);
    expect(config.defaultViewport).toEqual([-6, 6]);
    expect(config.curveSamples).toBe(300);
    expect(config.display).toEqual({ showShading: true, shadingOpacity: 0.3, showStdMarkers: true });
    expect(config.palette).toHaveLength(6);
    expect(config.verbose).toBe(false);
  });

  it('should merge nested overrides', () => {
    const config = resolveConfig({ display: { shadingOpacity: 0.8 }, defaultLeaf: { mean: 2 } });

    expect(config.display).toEqual({ showShading: true, shadingOpacity: 0.8, showStdMarkers: true });
    expect(config.defaultLeaf).toEqual({ mean: 2, stdDev: 1 });
    expect(DEFAULT_CONFIG.display.shadingOpacity).toBe(0.3);
  });

  const invalid: EngineConfigOverrides[] = [
    { meanRange: [3, 3] },
    { stdDevRange: [0, 5] },
    { defaultViewport: [6, -6] },
    { curveSamples: 1 },
    { curveSamples: 10.5 },
    { autoFitHeadroom: 0 },
    { display: { shadingOpacity: 1.2 } },
    { palette: [] },
    { defaultLeaf: { stdDev: 0 } },
    { defaultLeaf: { stdDev: Infinity } },
  ];

  it.each(invalid)('should reject invalid override %j', (overrides) => {
    expect(captureError(() => resolveConfig(overrides))).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  });
});

describe('clamp', () => {
  it('should clamp into an inclusive range', () => {
    expect(clamp(-20, [-10, 10])).toBe(-10);
    expect(clamp(20, [-10, 10])).toBe(10);
    expect(clamp(0.3, [0.1, 5])).toBe(0.3);
  });
});
