import type { BinaryImage, ThresholdMap } from '../types.js';
import { extent, variance } from './statistics.js';

const ENTROPY_BINS = 256;

interface LogSplit {
  foreground: number[];
  background: number[];
}

/**
 * log2 intensities of valid samples split by the binary image, floored at
 * 1/256 of the brightest valid sample. Null when there is nothing to measure.
 */
function splitLogIntensities(values: ArrayLike<number>, valid: Uint8Array, binary: BinaryImage): LogSplit | null {
  let max = -Infinity;
  for (let i = 0; i < valid.length; i++) {
    if (valid[i] && values[i] > max) max = values[i];
  }
  const floor = max / 256;
  if (!(floor > 0)) return null;

  const foreground: number[] = [];
  const background: number[] = [];
  for (let i = 0; i < valid.length; i++) {
    if (!valid[i]) continue;
    const v = Math.log2(Math.max(values[i], floor));
    if (binary.data[i]) foreground.push(v);
    else background.push(v);
  }
  return { foreground, background };
}

/** Size-weighted mean of the foreground and background log2-intensity variances. */
export function weightedVariance(values: ArrayLike<number>, valid: Uint8Array, binary: BinaryImage): number {
  const split = splitLogIntensities(values, valid, binary);
  if (!split) return 0;

  const { foreground, background } = split;
  if (foreground.length === 0) return variance(background);
  if (background.length === 0) return variance(foreground);
  return (
    (variance(foreground) * foreground.length + variance(background) * background.length) /
    (foreground.length + background.length)
  );
}

function sumPLogP(counts: Uint32Array, total: number): number {
  let acc = 0;
  for (let b = 0; b < counts.length; b++) {
    if (counts[b] === 0) continue;
    const p = counts[b] / total;
    acc += p * Math.log2(p);
  }
  return acc;
}

/**
 * Sum over foreground and background of `p log2 p` for 256-bin histograms of
 * their log2 intensities, taken over the joint range. 0 when either side is empty.
 */
export function sumOfEntropies(values: ArrayLike<number>, valid: Uint8Array, binary: BinaryImage): number {
  const split = splitLogIntensities(values, valid, binary);
  if (!split) return 0;

  const { foreground, background } = split;
  if (foreground.length === 0 || background.length === 0) return 0;

  const fg = extent(foreground);
  const bg = extent(background);
  const lower = Math.min(fg.min, bg.min);
  const upper = Math.max(fg.max, bg.max);
  const scale = upper > lower ? ENTROPY_BINS / (upper - lower) : 0;

  const histogram = (side: number[]): Uint32Array => {
    const counts = new Uint32Array(ENTROPY_BINS);
    for (const v of side) counts[Math.min(ENTROPY_BINS - 1, Math.floor((v - lower) * scale))]++;
    return counts;
  };

  return sumPLogP(histogram(foreground), foreground.length) + sumPLogP(histogram(background), background.length);
}

/** Mean of a scalar or per-pixel threshold. */
export function meanThreshold(threshold: number | ThresholdMap): number {
  if (typeof threshold === 'number') return threshold;
  let sum = 0;
  for (let i = 0; i < threshold.data.length; i++) sum += threshold.data[i];
  return sum / threshold.data.length;
}
