import type { BinaryImage } from '../types.js';
import type { Grid } from './types.js';
import { ShapeError } from '../errors.js';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Scale by the correction factor, then clamp into [min, max]. */
export function finalizeThreshold(raw: number, correctionFactor: number, min: number, max: number): number {
  return clamp(raw * correctionFactor, min, max);
}

/** Elementwise finalizeThreshold into a new array. */
export function finalizeThresholdMap(raw: Float64Array, correctionFactor: number, min: number, max: number): Float64Array {
  const out = new Float64Array(raw.length);
  for (let i = 0; i < raw.length; i++) out[i] = finalizeThreshold(raw[i], correctionFactor, min, max);
  return out;
}

/**
 * Foreground where the value reaches the threshold (scalar or per pixel) and
 * the sample is valid. Masked-out samples are always background.
 */
export function binarize(values: ArrayLike<number>, valid: Uint8Array, threshold: number | Float64Array, grid: Grid): BinaryImage {
  const data = new Uint8Array(grid.size);

  if (typeof threshold === 'number') {
    for (let i = 0; i < grid.size; i++) {
      data[i] = valid[i] && values[i] >= threshold ? 1 : 0;
    }
  } else {
    if (threshold.length !== grid.size) {
      throw new ShapeError(`binarize: threshold has ${threshold.length} values but the image has ${grid.size} samples`, {
        stage: 'postprocessing',
        parameter: 'threshold',
      });
    }
    for (let i = 0; i < grid.size; i++) {
      data[i] = valid[i] && values[i] >= threshold[i] ? 1 : 0;
    }
  }

  return { data, shape: grid.shape };
}
