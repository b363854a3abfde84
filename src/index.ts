// Core
export { Thresholder, threshold, applyThreshold, measureThreshold, DEFAULT_CONFIG } from './thresholder.js';

// Building blocks
export { estimateGlobalThreshold } from './internal/global-estimate.js';
export { createLogTransform, smoothingSigma } from './internal/preprocess.js';
export { finalizeThreshold } from './internal/postprocess.js';
export type { GlobalEstimator, OtsuVariant, MiddleAssignment, RobustBackgroundOptions } from './internal/types.js';
export type { LogTransform } from './internal/preprocess.js';

// Errors
export { ThresholdError, ConfigurationError, DomainError, ShapeError } from './errors.js';
export type { ThresholdStage, ThresholdErrorContext } from './errors.js';

// Types
export type {
  ImageShape,
  IntensityImage,
  ImageMask,
  BinaryImage,
  ThresholdMap,
  ThresholdStrategy,
  ThresholdMethod,
  AveragingMethod,
  VarianceMethod,
  ThresholdingConfig,
  ThresholdInput,
  GlobalThresholdResult,
  AdaptiveThresholdResult,
  ThresholdResult,
  AppliedThreshold,
  ThresholdMeasurements,
} from './types.js';
