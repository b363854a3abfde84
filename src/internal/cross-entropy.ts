import { extent, mean, sortedCopy } from './statistics.js';

const MAX_ITERATIONS = 1000;

/** Half the smallest gap between distinct sample values. */
function convergenceTolerance(samples: ArrayLike<number>): number {
  const sorted = sortedCopy(samples);
  let smallest = Infinity;
  for (let i = 1; i < sorted.length; i++) {
    const gap = sorted[i] - sorted[i - 1];
    if (gap > 0 && gap < smallest) smallest = gap;
  }
  return smallest / 2;
}

/**
 * Li's minimum cross-entropy threshold.
 *
 * Starting from the mean, each step splits the samples at the current guess and
 * moves to the value minimizing the cross-entropy between the image and its
 * two-class approximation, (mu_b - mu_f) / (ln mu_b - ln mu_f). Samples are
 * shifted so the smallest is 0, which keeps the class means non-negative.
 * Stops once a step moves less than half the smallest gap between values.
 */
export function thresholdLi(samples: ArrayLike<number>): number {
  const { min, max } = extent(samples);
  if (min === max) return min;

  const tolerance = convergenceTolerance(samples);
  let next = mean(samples) - min;
  let current = -2 * tolerance;

  for (let iter = 0; iter < MAX_ITERATIONS && Math.abs(next - current) > tolerance; iter++) {
    current = next;

    let foreSum = 0;
    let foreCount = 0;
    let backSum = 0;
    let backCount = 0;
    for (let i = 0; i < samples.length; i++) {
      const v = samples[i] - min;
      if (v > current) {
        foreSum += v;
        foreCount++;
      } else {
        backSum += v;
        backCount++;
      }
    }

    if (foreCount === 0 || backCount === 0) break;
    const meanFore = foreSum / foreCount;
    const meanBack = backSum / backCount;
    if (meanBack === 0) break;

    next = (meanBack - meanFore) / (Math.log(meanBack) - Math.log(meanFore));
  }

  return next + min;
}
