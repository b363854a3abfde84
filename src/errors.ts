/** Stage of the thresholding flow that raised an error. */
export type ThresholdStage =
  | 'configuration'
  | 'preprocessing'
  | 'estimation'
  | 'adaptive'
  | 'sauvola'
  | 'postprocessing'
  | 'dispatch';

export interface ThresholdErrorContext {
  stage: ThresholdStage;
  /** Config or input field the error is about, when there is one. */
  parameter?: string;
}

/** Base class for everything the engine throws on purpose. */
export class ThresholdError extends Error {
  readonly stage: ThresholdStage;
  readonly parameter: string | undefined;

  constructor(message: string, context: ThresholdErrorContext) {
    super(message);
    this.name = 'ThresholdError';
    this.stage = context.stage;
    this.parameter = context.parameter;
  }
}

/** Invalid or unsupported settings. Raised before any computation. */
export class ConfigurationError extends ThresholdError {
  constructor(message: string, context: ThresholdErrorContext) {
    super(message, context);
    this.name = 'ConfigurationError';
  }
}

/** Nothing valid to estimate from. */
export class DomainError extends ThresholdError {
  constructor(message: string, context: ThresholdErrorContext) {
    super(message, context);
    this.name = 'DomainError';
  }
}

/** Image, mask or threshold geometry that does not line up. */
export class ShapeError extends ThresholdError {
  constructor(message: string, context: ThresholdErrorContext) {
    super(message, context);
    this.name = 'ShapeError';
  }
}
