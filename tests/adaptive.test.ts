import { describe, it, expect, vi } from 'vitest';
import { threshold } from '../src/index.js';
import type { GlobalEstimator } from '../src/index.js';
import type { Logger } from '../src/internal/logger.js';
import { clampToGuide, computeBlockSurface, MIN_BLOCK_SAMPLES } from '../src/internal/adaptive-blocks.js';
import { resolveGrid } from '../src/internal/geometry.js';
import { countForeground, makeGrid, makeHalvesImage, makeImage, makeInput, makeVolume } from './fixtures/helpers.js';

const OTSU: GlobalEstimator = { kind: 'otsu', variant: { classes: 'two' } };

function spyLogger(): Logger {
  return { logTrace: vi.fn(), logWarn: vi.fn() };
}

describe('computeBlockSurface', () => {
  it('treats a window larger than the image as a single block', () => {
    const image = makeHalvesImage(10, 10);
    const { grid, valid } = makeGrid(image);
    const surface = computeBlockSurface(Float64Array.from(image.data), valid, grid, {
      windowSize: 50,
      estimator: OTSU,
      guide: 0.5,
      logger: spyLogger(),
    });

    expect(surface).toHaveLength(100);
    for (const v of surface) expect(v).toBeCloseTo(0.5, 9);
  });

  it('interpolates between block estimates across the plane', () => {
    // Two 10x10 blocks, constant 0.2 and 0.8, centred on columns 4.5 and 14.5.
    const image = makeHalvesImage(10, 20);
    const { grid, valid } = makeGrid(image);
    const surface = computeBlockSurface(Float64Array.from(image.data), valid, grid, {
      windowSize: 10,
      estimator: OTSU,
      guide: 0.5,
      logger: spyLogger(),
    });

    expect(surface[0]).toBeCloseTo(0.2 - 0.6 * 0.45, 9);
    expect(surface[9]).toBeCloseTo(0.2 + 0.6 * 0.45, 9);
    expect(surface[10]).toBeCloseTo(0.2 + 0.6 * 0.55, 9);
    // Every row gets the same profile.
    expect(surface[5 * 20 + 9]).toBeCloseTo(surface[9], 12);
  });

  it('borrows the nearest estimated block for a block without enough samples', () => {
    const image = makeImage(4, 8, (_r, c) => (c < 2 ? 0.2 : 0.8));
    const grid = resolveGrid(image.shape);
    const valid = new Uint8Array(grid.size);
    for (let r = 0; r < 4; r++) {
      for (let c = 0; c < 4; c++) valid[r * 8 + c] = 1;
    }
    // The right block keeps fewer valid samples than it needs.
    for (let i = 0; i < MIN_BLOCK_SAMPLES - 1; i++) valid[4 + i] = 1;

    const logger = spyLogger();
    const surface = computeBlockSurface(Float64Array.from(image.data), valid, grid, {
      windowSize: 4,
      estimator: OTSU,
      guide: 0.9,
      logger,
    });

    for (const v of surface) expect(v).toBeCloseTo(0.5, 9);
    expect(logger.logTrace).toHaveBeenCalledWith('BLOCK_FALLBACK', { plane: 0, skipped: 1 });
    expect(logger.logWarn).not.toHaveBeenCalled();
  });

  it('falls back to the guide for a plane with no valid samples', () => {
    const volume = makeVolume(2, 4, 4, (_p, _r, c) => (c < 2 ? 0.2 : 0.8));
    const grid = resolveGrid(volume.shape);
    const valid = new Uint8Array(grid.size);
    valid.fill(1, 0, grid.planeSize);

    const logger = spyLogger();
    const surface = computeBlockSurface(Float64Array.from(volume.data), valid, grid, {
      windowSize: 4,
      estimator: OTSU,
      guide: 0.42,
      logger,
    });

    for (let i = 0; i < grid.planeSize; i++) expect(surface[i]).toBeCloseTo(0.5, 9);
    for (let i = grid.planeSize; i < grid.size; i++) expect(surface[i]).toBe(0.42);
    expect(logger.logWarn).toHaveBeenCalledTimes(1);
    expect(logger.logWarn).toHaveBeenCalledWith('BLOCK_FALLBACK', expect.stringContaining('plane 1'));
  });

  it('processes each plane of a volume independently', () => {
    const volume = makeVolume(2, 6, 6, (p, _r, c) => (c < 3 ? 0.1 : p === 0 ? 0.5 : 0.9));
    const { grid, valid } = makeGrid(volume);
    const surface = computeBlockSurface(Float64Array.from(volume.data), valid, grid, {
      windowSize: 6,
      estimator: OTSU,
      guide: 0.5,
      logger: spyLogger(),
    });

    expect(surface[0]).toBeCloseTo(0.3, 9);
    expect(surface[grid.planeSize]).toBeCloseTo(0.5, 9);
  });
});

describe('clampToGuide', () => {
  it('bounds values to [0.7, 1.5] times the guide', () => {
    const surface = Float64Array.from([0.1, 1, 2]);
    expect(Array.from(clampToGuide(surface, 1))).toEqual([0.7, 1, 1.5]);
  });

  it('returns the same array it was given', () => {
    const surface = Float64Array.from([0.3]);
    expect(clampToGuide(surface, 0.5)).toBe(surface);
  });
});

describe('adaptive strategy', () => {
  it('treats a window larger than the image as a single block', () => {
    const result = threshold(makeInput(makeHalvesImage(10, 10)), {
      strategy: 'adaptive',
      method: 'otsu',
      windowSize: 64,
    });

    expect(result.strategy).toBe('adaptive');
    if (result.strategy !== 'adaptive') return;
    expect(result.guideThreshold).toBeCloseTo(0.5, 9);
    for (const v of result.finalThreshold.data) expect(v).toBeCloseTo(0.5, 9);
    expect(countForeground(result.binaryImage.data)).toBe(50);
  });

  it('clamps local thresholds into the guide band', () => {
    const result = threshold(makeInput(makeHalvesImage(10, 20)), {
      strategy: 'adaptive',
      method: 'otsu',
      windowSize: 10,
    });
    if (result.strategy !== 'adaptive') throw new Error('expected an adaptive result');

    const orig = result.origThreshold.data;
    expect(orig[0]).toBeCloseTo(0.35, 9);
    expect(orig[9]).toBeCloseTo(0.47, 9);
    expect(orig[19]).toBeCloseTo(0.75, 9);
    // Binary output still splits the halves.
    for (let c = 0; c < 20; c++) expect(result.binaryImage.data[c]).toBe(c < 10 ? 0 : 1);
  });

  it('keeps every final threshold within the guide band and the range bounds', () => {
    const image = makeImage(12, 12, (r, c) => 0.1 + 0.05 * ((r * 7 + c * 3) % 13));
    const config = {
      strategy: 'adaptive' as const,
      method: 'minimum-cross-entropy' as const,
      windowSize: 5,
      correctionFactor: 1.3,
      thresholdMin: 0.2,
      thresholdMax: 0.6,
    };
    const result = threshold(makeInput(image), config);
    if (result.strategy !== 'adaptive') throw new Error('expected an adaptive result');

    const g = result.guideThreshold;
    for (const v of result.finalThreshold.data) {
      expect(v).toBeGreaterThanOrEqual(Math.max(0.7 * g, config.thresholdMin) - 1e-12);
      expect(v).toBeLessThanOrEqual(Math.min(1.5 * g, config.thresholdMax) + 1e-12);
    }
    expect(result.finalThreshold.shape).toEqual([12, 12]);
  });

  it('maps log-space block estimates back to linear intensity', () => {
    const result = threshold(makeInput(makeHalvesImage(10, 10)), {
      strategy: 'adaptive',
      method: 'otsu',
      windowSize: 64,
      logTransform: true,
    });
    if (result.strategy !== 'adaptive') throw new Error('expected an adaptive result');

    // Midpoint in log space between the noise floor and 0.8: sqrt(0.8 * (0.2 + 0.6 / 256)).
    const expected = Math.sqrt(0.8 * (0.2 + 0.6 / 256));
    expect(result.guideThreshold).toBeCloseTo(expected, 6);
    expect(result.origThreshold.data[0]).toBeCloseTo(expected, 6);
  });
});
