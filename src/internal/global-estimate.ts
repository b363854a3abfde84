import type { GlobalEstimator } from './types.js';
import { DomainError } from '../errors.js';
import { isConstant } from './statistics.js';
import { thresholdLi } from './cross-entropy.js';
import { thresholdOtsu, thresholdMultiOtsu } from './otsu.js';
import { thresholdRobustBackground } from './robust-background.js';

/**
 * Reduce a set of valid samples to one threshold. A constant distribution
 * returns its value; an empty one is a DomainError.
 */
export function estimateGlobalThreshold(samples: ArrayLike<number>, estimator: GlobalEstimator): number {
  if (samples.length === 0) {
    throw new DomainError(`estimateGlobalThreshold: no valid samples to estimate a ${estimator.kind} threshold from`, {
      stage: 'estimation',
      parameter: 'mask',
    });
  }
  if (isConstant(samples)) return samples[0];

  switch (estimator.kind) {
    case 'minimum-cross-entropy':
      return thresholdLi(samples);
    case 'otsu':
      return estimator.variant.classes === 'two'
        ? thresholdOtsu(samples)
        : thresholdMultiOtsu(samples, estimator.variant.middle);
    case 'robust-background':
      return thresholdRobustBackground(samples, estimator.options);
  }
}
