/** Arithmetic mean. Callers guarantee a non-empty input. */
export function mean(values: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

/** Population variance (divides by n). */
export function variance(values: ArrayLike<number>): number {
  const m = mean(values);
  let acc = 0;
  for (let i = 0; i < values.length; i++) {
    const d = values[i] - m;
    acc += d * d;
  }
  return acc / values.length;
}

export function standardDeviation(values: ArrayLike<number>): number {
  return Math.sqrt(variance(values));
}

/** Median of an ascending array; even lengths average the two middle values. */
export function medianOfSorted(sorted: ArrayLike<number>): number {
  const n = sorted.length;
  const mid = Math.floor(n / 2);
  return n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function median(values: ArrayLike<number>): number {
  return medianOfSorted(sortedCopy(values));
}

/** Median absolute deviation from the median. */
export function medianAbsoluteDeviation(values: ArrayLike<number>): number {
  const center = median(values);
  const deviations = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) deviations[i] = Math.abs(values[i] - center);
  return median(deviations);
}

/**
 * Mode from a histogram of floor(sqrt(n)) bins over [min, max].
 * Returns the centre of the fullest bin; the lowest bin wins ties.
 */
export function binnedMode(values: ArrayLike<number>): number {
  const { min, max } = extent(values);
  if (min === max) return min;

  const nBins = Math.max(1, Math.floor(Math.sqrt(values.length)));
  const counts = new Uint32Array(nBins);
  const scale = nBins / (max - min);
  for (let i = 0; i < values.length; i++) {
    counts[Math.min(nBins - 1, Math.floor((values[i] - min) * scale))]++;
  }

  let best = 0;
  for (let b = 1; b < nBins; b++) {
    if (counts[b] > counts[best]) best = b;
  }
  return min + ((best + 0.5) / nBins) * (max - min);
}

export function extent(values: ArrayLike<number>): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function sortedCopy(values: ArrayLike<number>): Float64Array {
  return Float64Array.from(values).sort();
}

/** True when every value equals the first one. */
export function isConstant(values: ArrayLike<number>): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] !== values[0]) return false;
  }
  return true;
}
