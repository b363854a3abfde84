/**
 * Image geometry. Two axes are `[rows, cols]`; three axes are
 * `[planes, rows, cols]` (a volumetric stack of planes). Data is row-major and
 * plane-major: `index = plane * rows * cols + row * cols + col`.
 */
export type ImageShape =
  | readonly [rows: number, cols: number]
  | readonly [planes: number, rows: number, cols: number];

/** Grayscale intensities, conventionally normalized to [0, 1] by the host. */
export interface IntensityImage {
  /** Samples in row-major order. Non-finite samples are treated as masked out. */
  data: ArrayLike<number>;
  shape: ImageShape;
}

/** Validity mask. Truthy entries mark samples that take part in thresholding. */
export interface ImageMask {
  data: ArrayLike<boolean | number>;
  /**
   * Must equal the image shape. For a volumetric image an in-plane
   * `[rows, cols]` mask is also accepted and applied to every plane.
   */
  shape: ImageShape;
}

/** Foreground/background segmentation: 1 = foreground, 0 = background. */
export interface BinaryImage {
  data: Uint8Array;
  shape: ImageShape;
}

/** A threshold per pixel, congruent to the image it was computed for. */
export interface ThresholdMap {
  data: Float64Array;
  shape: ImageShape;
}

export type ThresholdStrategy = 'global' | 'adaptive';

export type ThresholdMethod =
  | 'minimum-cross-entropy'
  | 'otsu'
  | 'robust-background'
  | 'sauvola'
  | 'manual'
  | 'measurement';

export type AveragingMethod = 'mean' | 'median' | 'mode';

export type VarianceMethod = 'standard-deviation' | 'median-absolute-deviation';

/** Optional tuning knobs, set on the Thresholder constructor. */
export interface ThresholdingConfig {
  /** Single threshold for the whole image, or one blended across local windows. Default: 'global' */
  strategy?: ThresholdStrategy;
  /**
   * How the threshold is obtained. 'sauvola' is adaptive-only; 'manual' and
   * 'measurement' are global-only. Default: 'minimum-cross-entropy'
   */
  method?: ThresholdMethod;
  /** Number of Otsu classes. Default: 2 */
  otsuClasses?: 2 | 3;
  /**
   * Three-class Otsu only: whether the middle intensity class counts as
   * foreground (lower boundary is used) or background (upper boundary). Default: true
   */
  assignMiddleToForeground?: boolean;
  /** Estimate the threshold on log-compressed intensities. Default: false */
  logTransform?: boolean;
  /** Multiplier applied to the estimated threshold. Default: 1 */
  correctionFactor?: number;
  /** Lower bound on the final threshold. Default: 0 */
  thresholdMin?: number;
  /** Upper bound on the final threshold. Default: 1 */
  thresholdMax?: number;
  /** Threshold used as-is by the 'manual' method. Default: 0 */
  manualThreshold?: number;
  /** Edge length in pixels of the adaptive window. Default: 50 */
  windowSize?: number;
  /**
   * Gaussian smoothing scale applied before thresholding. Roughly half of the
   * kernel mass lies within this distance of the centre. 0 disables smoothing. Default: 0
   */
  smoothingScale?: number;
  /** Fraction of the dimmest samples discarded by robust background. Default: 0.05 */
  lowerOutlierFraction?: number;
  /** Fraction of the brightest samples discarded by robust background. Default: 0.05 */
  upperOutlierFraction?: number;
  /** Robust background centre statistic. Default: 'mean' */
  averagingMethod?: AveragingMethod;
  /** Robust background spread statistic. Default: 'standard-deviation' */
  varianceMethod?: VarianceMethod;
  /** Spreads added to the robust background centre. Default: 2 */
  numberOfDeviations?: number;
  /** Sauvola sensitivity `k`. Default: 0.5 */
  sauvolaK?: number;
  /** Sauvola dynamic range of the standard deviation `R`. Default: 0.5 */
  sauvolaR?: number;
  /**
   * Ignore the method settings and run a smoothed global minimum cross-entropy
   * threshold (smoothing scale 1, no log transform). Default: false
   */
  automatic?: boolean;
  /** Emit trace logging for each stage. Default: false */
  debug?: boolean;
}

/** Single object passed to threshold(). */
export interface ThresholdInput {
  image: IntensityImage;
  /** Absent means every sample is valid. */
  mask?: ImageMask;
  /** Image measurement to threshold with. Required by the 'measurement' method. */
  measurementValue?: number;
  /**
   * Whether the image is a volume. Defaults to `image.shape.length === 3`;
   * when given it must agree with the shape.
   */
  volumetric?: boolean;
}

interface ThresholdResultBase {
  /** Segmentation of the (smoothed) image against `finalThreshold`; masked samples are 0. */
  binaryImage: BinaryImage;
  /** Gaussian sigma used for smoothing, 0 when no smoothing was applied. */
  sigma: number;
}

/** Result of the global strategy: one scalar threshold. */
export interface GlobalThresholdResult extends ThresholdResultBase {
  strategy: 'global';
  /** `origThreshold` after the correction factor and range clamp. */
  finalThreshold: number;
  /** Threshold before the correction factor and range clamp. */
  origThreshold: number;
  guideThreshold: null;
}

/** Result of the adaptive strategy: one threshold per pixel. */
export interface AdaptiveThresholdResult extends ThresholdResultBase {
  strategy: 'adaptive';
  /** `origThreshold` after the correction factor and range clamp, per pixel. */
  finalThreshold: ThresholdMap;
  /** Local thresholds bounded by the guide, before correction and range clamp. */
  origThreshold: ThresholdMap;
  /**
   * Whole-image estimate used to bound the local thresholds, reported after the
   * correction factor and range clamp.
   */
  guideThreshold: number;
}

/** The complete result returned by threshold(). */
export type ThresholdResult = GlobalThresholdResult | AdaptiveThresholdResult;

/** Result of applying an already known threshold. */
export interface AppliedThreshold {
  binaryImage: BinaryImage;
  sigma: number;
}

/** Scalar bookkeeping a host persists for one thresholded image. */
export interface ThresholdMeasurements {
  /** Mean of the final threshold (the value itself for the global strategy). */
  finalThreshold: number;
  /** Mean of the original threshold. */
  origThreshold: number;
  /** Guide threshold; null for the global strategy. */
  guideThreshold: number | null;
  /** Size-weighted variance of log2 intensities within foreground and background. */
  weightedVariance: number;
  /** Sum of `p log2 p` over the foreground and background log2-intensity histograms (never positive). */
  sumOfEntropies: number;
}
