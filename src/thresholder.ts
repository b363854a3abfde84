import type {
  AppliedThreshold,
  ThresholdInput,
  ThresholdMap,
  ThresholdMeasurements,
  ThresholdResult,
  ThresholdingConfig,
} from './types.js';
import type { ResolvedConfig } from './internal/types.js';
import { runApplyThreshold, runPipeline } from './internal/pipeline.js';
import { validateConfig } from './internal/validation.js';
import { assertImageData, resolveGrid, resolveValidity } from './internal/geometry.js';
import { meanThreshold, sumOfEntropies, weightedVariance } from './internal/measurements.js';

/** Default configuration values. */
export const DEFAULT_CONFIG: Readonly<Required<ThresholdingConfig>> = {
  strategy: 'global',
  method: 'minimum-cross-entropy',
  otsuClasses: 2,
  assignMiddleToForeground: true,
  logTransform: false,
  correctionFactor: 1,
  thresholdMin: 0,
  thresholdMax: 1,
  manualThreshold: 0,
  windowSize: 50,
  smoothingScale: 0,
  lowerOutlierFraction: 0.05,
  upperOutlierFraction: 0.05,
  averagingMethod: 'mean',
  varianceMethod: 'standard-deviation',
  numberOfDeviations: 2,
  sauvolaK: 0.5,
  sauvolaR: 0.5,
  automatic: false,
  debug: false,
};

/** Resolve a partial config into a full, validated config with defaults. */
function resolveConfig(config?: ThresholdingConfig): ResolvedConfig {
  return validateConfig({ ...DEFAULT_CONFIG, ...config });
}

/** Reusable, stateless thresholder. Invalid settings throw from the constructor. */
export class Thresholder {
  readonly config: Readonly<Required<ThresholdingConfig>>;

  constructor(config?: ThresholdingConfig) {
    this.config = resolveConfig(config);
  }

  /** Compute the threshold(s) and binary image for one input. */
  threshold(input: ThresholdInput): ThresholdResult {
    return runPipeline(input, this.config);
  }

  /** Binarize against a known threshold, smoothing with this config's scale. */
  applyThreshold(input: ThresholdInput, threshold: number | ThresholdMap): AppliedThreshold {
    return runApplyThreshold(input, threshold, this.config.smoothingScale);
  }
}

/** Threshold with an optional config. For repeated use, prefer creating a Thresholder instance. */
export function threshold(input: ThresholdInput, config?: ThresholdingConfig): ThresholdResult {
  return new Thresholder(config).threshold(input);
}

/**
 * Binarize against an already known threshold (scalar or per pixel). Samples
 * at or above the threshold are foreground; masked samples are background.
 */
export function applyThreshold(
  input: ThresholdInput,
  threshold: number | ThresholdMap,
  smoothingScale = 0,
): AppliedThreshold {
  return runApplyThreshold(input, threshold, smoothingScale);
}

/**
 * Per-image bookkeeping for a result: mean thresholds, plus the foreground and
 * background quality measures computed on the unsmoothed valid intensities.
 */
export function measureThreshold(input: ThresholdInput, result: ThresholdResult): ThresholdMeasurements {
  const grid = resolveGrid(input.image.shape, input.volumetric);
  assertImageData(input.image, grid);
  const valid = resolveValidity(input.image, input.mask, grid);

  return {
    finalThreshold: meanThreshold(result.finalThreshold),
    origThreshold: meanThreshold(result.origThreshold),
    guideThreshold: result.guideThreshold,
    weightedVariance: weightedVariance(input.image.data, valid, result.binaryImage),
    sumOfEntropies: sumOfEntropies(input.image.data, valid, result.binaryImage),
  };
}
