import type { Grid } from './types.js';
import { DomainError } from '../errors.js';
import { extent } from './statistics.js';
import { collectValid } from './geometry.js';

/** Half of a Gaussian's mass lies within 0.674 sigma of its centre. */
const HALF_MASS_SIGMAS = 0.674;
const KERNEL_TRUNCATE = 4;

export interface SmoothedImage {
  values: Float64Array;
  /** 0 when no smoothing was applied. */
  sigma: number;
}

/** Monotone log compression fitted to one image, with its exact inverse. */
export interface LogTransform {
  forward: (value: number) => number;
  inverse: (value: number) => number;
}

export interface WorkingImage {
  /** Smoothed intensities; binarization compares these against the threshold. */
  smoothed: Float64Array;
  /** Values estimators see: `smoothed`, or its log transform. */
  working: Float64Array;
  /** Present when estimates must be mapped back to linear intensity. */
  transform: LogTransform | null;
  sigma: number;
}

export function smoothingSigma(smoothingScale: number): number {
  return smoothingScale > 0 ? smoothingScale / HALF_MASS_SIGMAS : 0;
}

function gaussianKernel(sigma: number): Float64Array {
  const radius = Math.max(1, Math.ceil(KERNEL_TRUNCATE * sigma));
  const kernel = new Float64Array(2 * radius + 1);
  let total = 0;
  for (let k = -radius; k <= radius; k++) {
    const w = Math.exp(-(k * k) / (2 * sigma * sigma));
    kernel[k + radius] = w;
    total += w;
  }
  for (let k = 0; k < kernel.length; k++) kernel[k] /= total;
  return kernel;
}

/** 1D convolution along one axis with zero padding outside the image. */
function convolveAxis(src: Float64Array, length: number, stride: number, kernel: Float64Array): Float64Array {
  const radius = (kernel.length - 1) / 2;
  const out = new Float64Array(src.length);

  for (let i = 0; i < src.length; i++) {
    const coord = Math.floor(i / stride) % length;
    const from = Math.max(-radius, -coord);
    const to = Math.min(radius, length - 1 - coord);
    let acc = 0;
    for (let k = from; k <= to; k++) {
      acc += src[i + k * stride] * kernel[k + radius];
    }
    out[i] = acc;
  }

  return out;
}

function gaussianBlur(src: Float64Array, grid: Grid, kernel: Float64Array): Float64Array {
  let out = convolveAxis(src, grid.cols, 1, kernel);
  out = convolveAxis(out, grid.rows, grid.cols, kernel);
  if (grid.volumetric && grid.planes > 1) {
    out = convolveAxis(out, grid.planes, grid.planeSize, kernel);
  }
  return out;
}

/**
 * Gaussian smoothing that ignores invalid samples: the blurred masked image is
 * divided by the blurred mask, so masked intensity never bleeds into valid
 * samples.
 */
export function smoothMasked(
  values: ArrayLike<number>,
  valid: Uint8Array,
  grid: Grid,
  smoothingScale: number,
): SmoothedImage {
  const sigma = smoothingSigma(smoothingScale);
  if (sigma === 0) {
    return { values: Float64Array.from(values), sigma: 0 };
  }

  const masked = new Float64Array(grid.size);
  const weight = new Float64Array(grid.size);
  for (let i = 0; i < grid.size; i++) {
    if (valid[i]) {
      masked[i] = values[i];
      weight[i] = 1;
    }
  }

  const kernel = gaussianKernel(sigma);
  const blurred = gaussianBlur(masked, grid, kernel);
  const bleed = gaussianBlur(weight, grid, kernel);

  const out = new Float64Array(grid.size);
  for (let i = 0; i < grid.size; i++) {
    out[i] = blurred[i] / (bleed[i] + Number.EPSILON);
  }
  return { values: out, sigma };
}

/**
 * Fit a log transform to the given samples. Intensities are floored just above
 * the bottom 1/256 of their range, log'd, then stretched onto [0, 1]. The inverse
 * is exact on [floor, max]. A flat distribution gets the identity.
 */
export function createLogTransform(samples: ArrayLike<number>): LogTransform {
  const { min, max } = extent(samples);
  if (!(max > min)) {
    return { forward: v => v, inverse: v => v };
  }

  const noiseFloor = min + (max - min) / 256 + Number.EPSILON;
  if (noiseFloor <= 0) {
    throw new DomainError(
      `createLogTransform: log transform needs non-negative intensities (minimum is ${min})`,
      { stage: 'preprocessing', parameter: 'logTransform' },
    );
  }

  const logMin = Math.log(noiseFloor);
  const logRange = Math.log(max) - logMin;

  return {
    forward: v => (Math.log(Math.max(v, noiseFloor)) - logMin) / logRange,
    inverse: t => Math.exp(t * logRange + logMin),
  };
}

/**
 * Smooth (when asked) and optionally log-transform the image. The log transform
 * is fitted to the valid smoothed samples.
 */
export function smoothAndTransform(
  values: ArrayLike<number>,
  valid: Uint8Array,
  grid: Grid,
  smoothingScale: number,
  logTransform: boolean,
): WorkingImage {
  const smoothed = smoothMasked(values, valid, grid, smoothingScale);
  if (!logTransform) {
    return { smoothed: smoothed.values, working: smoothed.values, transform: null, sigma: smoothed.sigma };
  }

  const transform = createLogTransform(collectValid(smoothed.values, valid));

  const working = new Float64Array(grid.size);
  for (let i = 0; i < grid.size; i++) {
    working[i] = valid[i] ? transform.forward(smoothed.values[i]) : 0;
  }
  return { smoothed: smoothed.values, working, transform, sigma: smoothed.sigma };
}
