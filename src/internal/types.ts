import type { AveragingMethod, ImageShape, ThresholdStrategy, ThresholdMethod, VarianceMethod } from '../types.js';

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  strategy: ThresholdStrategy;
  method: ThresholdMethod;
  otsuClasses: 2 | 3;
  assignMiddleToForeground: boolean;
  logTransform: boolean;
  correctionFactor: number;
  thresholdMin: number;
  thresholdMax: number;
  manualThreshold: number;
  windowSize: number;
  smoothingScale: number;
  lowerOutlierFraction: number;
  upperOutlierFraction: number;
  averagingMethod: AveragingMethod;
  varianceMethod: VarianceMethod;
  numberOfDeviations: number;
  sauvolaK: number;
  sauvolaR: number;
  automatic: boolean;
  debug: boolean;
}

/** Image geometry with 2D images treated as a single plane. */
export interface Grid {
  planes: number;
  rows: number;
  cols: number;
  /** Samples per plane (rows * cols). */
  planeSize: number;
  /** Total samples. */
  size: number;
  volumetric: boolean;
  shape: ImageShape;
}

/** Three-class Otsu: which side the middle class is assigned to. */
export type MiddleAssignment = 'foreground' | 'background';

export type OtsuVariant =
  | { classes: 'two' }
  | { classes: 'three'; middle: MiddleAssignment };

/** Methods that reduce a sample distribution to one scalar. */
export type GlobalEstimator =
  | { kind: 'minimum-cross-entropy' }
  | { kind: 'otsu'; variant: OtsuVariant }
  | { kind: 'robust-background'; options: RobustBackgroundOptions };

/** Where a threshold comes from, resolved by the dispatcher. */
export type ThresholdSource =
  | { kind: 'manual'; value: number }
  | { kind: 'measurement'; value: number }
  | { kind: 'estimated'; estimator: GlobalEstimator }
  | { kind: 'sauvola'; k: number; r: number };

export interface RobustBackgroundOptions {
  lowerOutlierFraction: number;
  upperOutlierFraction: number;
  averagingMethod: AveragingMethod;
  varianceMethod: VarianceMethod;
  numberOfDeviations: number;
}
