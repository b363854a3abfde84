import type { MiddleAssignment } from './types.js';
import { extent } from './statistics.js';

const TWO_CLASS_BINS = 256;
const THREE_CLASS_BINS = 128;
const TIE_TOLERANCE = 1e-9;

interface Histogram {
  counts: Float64Array;
  /** Bin centres. */
  centers: Float64Array;
  min: number;
  binWidth: number;
}

/** Histogram spanning [min, max] of the samples; the maximum lands in the last bin. */
function buildHistogram(samples: ArrayLike<number>, nBins: number): Histogram {
  const { min, max } = extent(samples);
  const binWidth = (max - min) / nBins;
  const counts = new Float64Array(nBins);
  for (let i = 0; i < samples.length; i++) {
    const bin = Math.floor((samples[i] - min) / binWidth);
    counts[Math.min(nBins - 1, Math.max(0, bin))]++;
  }
  const centers = new Float64Array(nBins);
  for (let b = 0; b < nBins; b++) centers[b] = min + (b + 0.5) * binWidth;
  return { counts, centers, min, binWidth };
}

/** Upper edge of a (possibly fractional) bin index. */
function upperEdge(hist: Histogram, bin: number): number {
  return hist.min + (bin + 1) * hist.binWidth;
}

function countDistinct(samples: ArrayLike<number>, limit: number): number {
  const seen = new Set<number>();
  for (let i = 0; i < samples.length && seen.size < limit; i++) seen.add(samples[i]);
  return seen.size;
}

/**
 * Two-class Otsu: the split maximizing between-class variance.
 * Samples at or above the returned value form the upper class. When several
 * adjacent splits tie, the middle of the run holding the first maximum is
 * used, so a two-level distribution is cut at the midpoint between its levels.
 */
export function thresholdOtsu(samples: ArrayLike<number>): number {
  const { min, max } = extent(samples);
  if (min === max) return min;

  const hist = buildHistogram(samples, TWO_CLASS_BINS);
  const { counts, centers } = hist;
  const nBins = counts.length;

  let total = 0;
  let totalSum = 0;
  for (let b = 0; b < nBins; b++) {
    total += counts[b];
    totalSum += counts[b] * centers[b];
  }

  // Split k puts bins 0..k in the lower class.
  const between = new Float64Array(nBins - 1);
  let weightLow = 0;
  let sumLow = 0;
  let best = 0;
  for (let k = 0; k < nBins - 1; k++) {
    weightLow += counts[k];
    sumLow += counts[k] * centers[k];
    const weightHigh = total - weightLow;
    if (weightLow === 0 || weightHigh === 0) continue;

    const meanDiff = sumLow / weightLow - (totalSum - sumLow) / weightHigh;
    between[k] = weightLow * weightHigh * meanDiff * meanDiff;
    if (between[k] > best) best = between[k];
  }

  const isTied = (k: number): boolean => between[k] >= best * (1 - TIE_TOLERANCE);

  // Average the contiguous run of tied splits that starts at the first maximum.
  let first = 0;
  while (!isTied(first)) first++;
  let last = first;
  while (last + 1 < nBins - 1 && isTied(last + 1)) last++;

  return upperEdge(hist, (first + last) / 2);
}

/**
 * Three-class Otsu over a 128-bin histogram. Returns both class boundaries,
 * lower first. Falls back to two-class Otsu (both boundaries equal) when the
 * samples hold fewer than three distinct values.
 */
export function multiOtsuBoundaries(samples: ArrayLike<number>): [number, number] {
  if (countDistinct(samples, 3) < 3) {
    const t = thresholdOtsu(samples);
    return [t, t];
  }

  const hist = buildHistogram(samples, THREE_CLASS_BINS);
  const { counts, centers } = hist;
  const nBins = counts.length;

  const cumWeight = new Float64Array(nBins + 1);
  const cumSum = new Float64Array(nBins + 1);
  for (let b = 0; b < nBins; b++) {
    cumWeight[b + 1] = cumWeight[b] + counts[b];
    cumSum[b + 1] = cumSum[b] + counts[b] * centers[b];
  }

  // Score of class [from, to): w * mu^2 = sum^2 / w.
  const classScore = (from: number, to: number): number => {
    const w = cumWeight[to] - cumWeight[from];
    if (w === 0) return 0;
    const s = cumSum[to] - cumSum[from];
    return (s * s) / w;
  };

  let bestScore = -Infinity;
  let bestLow = 0;
  let bestHigh = 1;
  for (let low = 0; low < nBins - 2; low++) {
    for (let high = low + 1; high < nBins - 1; high++) {
      const score = classScore(0, low + 1) + classScore(low + 1, high + 1) + classScore(high + 1, nBins);
      if (score > bestScore) {
        bestScore = score;
        bestLow = low;
        bestHigh = high;
      }
    }
  }

  return [upperEdge(hist, bestLow), upperEdge(hist, bestHigh)];
}

/** Three-class Otsu reduced to one threshold by where the middle class goes. */
export function thresholdMultiOtsu(samples: ArrayLike<number>, middle: MiddleAssignment): number {
  const [low, high] = multiOtsuBoundaries(samples);
  return middle === 'foreground' ? low : high;
}
