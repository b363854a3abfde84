import type { AveragingMethod } from '../types.js';
import type { RobustBackgroundOptions } from './types.js';
import { binnedMode, mean, medianAbsoluteDeviation, medianOfSorted, sortedCopy, standardDeviation } from './statistics.js';

/** Centre statistic of an ascending array. */
function centerOf(sorted: Float64Array, method: AveragingMethod): number {
  switch (method) {
    case 'mean':
      return mean(sorted);
    case 'median':
      return medianOfSorted(sorted);
    case 'mode':
      return binnedMode(sorted);
  }
}

/**
 * Robust background threshold: trim the dimmest and brightest outlier
 * fractions by rank, then return `centre + numberOfDeviations * spread` over
 * what is left.
 */
export function thresholdRobustBackground(samples: ArrayLike<number>, options: RobustBackgroundOptions): number {
  const sorted = sortedCopy(samples);
  const n = sorted.length;
  if (sorted[0] === sorted[n - 1]) return sorted[0];

  const lowChop = Math.round(n * options.lowerOutlierFraction);
  const highChop = n - Math.round(n * options.upperOutlierFraction);
  // Fractions summing below 1 can still round to an empty range on tiny inputs.
  const kept = highChop > lowChop ? sorted.subarray(lowChop, highChop) : sorted;

  const center = centerOf(kept, options.averagingMethod);
  const spread =
    options.varianceMethod === 'standard-deviation' ? standardDeviation(kept) : medianAbsoluteDeviation(kept);

  return center + options.numberOfDeviations * spread;
}
