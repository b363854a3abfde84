import type {
  AppliedThreshold,
  ImageShape,
  ThresholdInput,
  ThresholdMap,
  ThresholdResult,
} from '../types.js';
import type { GlobalEstimator, Grid, OtsuVariant, ResolvedConfig, ThresholdSource } from './types.js';
import { ConfigurationError, ShapeError } from '../errors.js';
import { assertImageData, collectValid, resolveGrid, resolveValidity } from './geometry.js';
import type { WorkingImage } from './preprocess.js';
import type { Logger, LogScope } from './logger.js';
import { smoothAndTransform } from './preprocess.js';
import { estimateGlobalThreshold } from './global-estimate.js';
import { clampToGuide, computeBlockSurface } from './adaptive-blocks.js';
import { computeSauvolaSurface } from './sauvola.js';
import { binarize, finalizeThreshold, finalizeThresholdMap } from './postprocess.js';
import { createLogger } from './logger.js';

const CROSS_ENTROPY: GlobalEstimator = { kind: 'minimum-cross-entropy' };

interface PreparedInput {
  grid: Grid;
  valid: Uint8Array;
}

type Loggers = Record<LogScope, Logger>;

function createLoggers(debug: boolean): Loggers {
  const traceOn = (): boolean => debug;
  return {
    dispatch: createLogger({ scope: 'dispatch', traceOn }),
    estimate: createLogger({ scope: 'estimate', traceOn }),
    adaptive: createLogger({ scope: 'adaptive', traceOn }),
    sauvola: createLogger({ scope: 'sauvola', traceOn }),
  };
}

function prepareInput(input: ThresholdInput): PreparedInput {
  const grid = resolveGrid(input.image.shape, input.volumetric);
  assertImageData(input.image, grid);
  const valid = resolveValidity(input.image, input.mask, grid);
  return { grid, valid };
}

/** Automatic mode swaps in a smoothed global minimum cross-entropy threshold. */
export function effectiveConfig(config: ResolvedConfig): ResolvedConfig {
  if (!config.automatic) return config;
  return {
    ...config,
    smoothingScale: 1,
    logTransform: false,
    strategy: 'global',
    method: 'minimum-cross-entropy',
  };
}

export function resolveOtsuVariant(config: ResolvedConfig): OtsuVariant {
  if (config.otsuClasses === 2) return { classes: 'two' };
  return { classes: 'three', middle: config.assignMiddleToForeground ? 'foreground' : 'background' };
}

/** Map the configured method onto where the threshold comes from. */
export function resolveSource(config: ResolvedConfig, measurementValue: number | undefined): ThresholdSource {
  switch (config.method) {
    case 'manual':
      return { kind: 'manual', value: config.manualThreshold };
    case 'measurement':
      if (measurementValue === undefined || !Number.isFinite(measurementValue)) {
        throw new ConfigurationError(
          `resolveSource: the measurement method needs a finite measurementValue (got ${String(measurementValue)})`,
          { stage: 'dispatch', parameter: 'measurementValue' },
        );
      }
      return { kind: 'measurement', value: measurementValue };
    case 'sauvola':
      return { kind: 'sauvola', k: config.sauvolaK, r: config.sauvolaR };
    case 'minimum-cross-entropy':
      return { kind: 'estimated', estimator: CROSS_ENTROPY };
    case 'otsu':
      return { kind: 'estimated', estimator: { kind: 'otsu', variant: resolveOtsuVariant(config) } };
    case 'robust-background':
      return {
        kind: 'estimated',
        estimator: {
          kind: 'robust-background',
          options: {
            lowerOutlierFraction: config.lowerOutlierFraction,
            upperOutlierFraction: config.upperOutlierFraction,
            averagingMethod: config.averagingMethod,
            varianceMethod: config.varianceMethod,
            numberOfDeviations: config.numberOfDeviations,
          },
        },
      };
  }
}

function toLinear(work: WorkingImage, value: number): number {
  return work.transform ? work.transform.inverse(value) : value;
}

function toMap(data: Float64Array, shape: ImageShape): ThresholdMap {
  return { data, shape };
}

function runGlobal(
  input: ThresholdInput,
  prepared: PreparedInput,
  config: ResolvedConfig,
  source: ThresholdSource,
  loggers: Loggers,
): ThresholdResult {
  const { grid, valid } = prepared;
  const { correctionFactor, thresholdMin, thresholdMax } = config;

  if (source.kind === 'manual' || source.kind === 'measurement') {
    const work = smoothAndTransform(input.image.data, valid, grid, config.smoothingScale, false);
    // Manual thresholds are used exactly as entered.
    const finalThreshold =
      source.kind === 'manual' ? source.value : finalizeThreshold(source.value, correctionFactor, thresholdMin, thresholdMax);
    return {
      strategy: 'global',
      finalThreshold,
      origThreshold: source.value,
      guideThreshold: null,
      binaryImage: binarize(work.smoothed, valid, finalThreshold, grid),
      sigma: work.sigma,
    };
  }

  if (source.kind === 'sauvola') {
    throw new ConfigurationError('runPipeline: sauvola is only available with the adaptive strategy', {
      stage: 'dispatch',
      parameter: 'method',
    });
  }

  const work = smoothAndTransform(input.image.data, valid, grid, config.smoothingScale, config.logTransform);
  const raw = estimateGlobalThreshold(collectValid(work.working, valid), source.estimator);
  const origThreshold = toLinear(work, raw);
  const finalThreshold = finalizeThreshold(origThreshold, correctionFactor, thresholdMin, thresholdMax);

  loggers.estimate.logTrace('GLOBAL_THRESHOLD', { estimator: source.estimator.kind, raw, origThreshold, finalThreshold });

  return {
    strategy: 'global',
    finalThreshold,
    origThreshold,
    guideThreshold: null,
    binaryImage: binarize(work.smoothed, valid, finalThreshold, grid),
    sigma: work.sigma,
  };
}

function runAdaptive(
  input: ThresholdInput,
  prepared: PreparedInput,
  config: ResolvedConfig,
  source: ThresholdSource,
  loggers: Loggers,
): ThresholdResult {
  if (source.kind === 'manual' || source.kind === 'measurement') {
    throw new ConfigurationError(`runPipeline: ${source.kind} is only available with the global strategy`, {
      stage: 'dispatch',
      parameter: 'method',
    });
  }

  const { grid, valid } = prepared;
  const { correctionFactor, thresholdMin, thresholdMax, windowSize } = config;
  const work = smoothAndTransform(input.image.data, valid, grid, config.smoothingScale, config.logTransform);

  // Sauvola has no global form; its guide is the minimum cross-entropy threshold.
  const guideEstimator = source.kind === 'sauvola' ? CROSS_ENTROPY : source.estimator;
  const guideRaw = estimateGlobalThreshold(collectValid(work.working, valid), guideEstimator);
  const guide = toLinear(work, guideRaw);

  loggers.estimate.logTrace('GUIDE_THRESHOLD', { estimator: guideEstimator.kind, guide });

  const surface =
    source.kind === 'sauvola'
      ? computeSauvolaSurface(work.working, valid, grid, { windowSize, k: source.k, r: source.r, logger: loggers.sauvola })
      : computeBlockSurface(work.working, valid, grid, {
          windowSize,
          estimator: source.estimator,
          guide: guideRaw,
          logger: loggers.adaptive,
        });

  if (work.transform) {
    for (let i = 0; i < surface.length; i++) surface[i] = work.transform.inverse(surface[i]);
  }
  const orig = clampToGuide(surface, guide);
  const final = finalizeThresholdMap(orig, correctionFactor, thresholdMin, thresholdMax);

  return {
    strategy: 'adaptive',
    finalThreshold: toMap(final, grid.shape),
    origThreshold: toMap(orig, grid.shape),
    guideThreshold: finalizeThreshold(guide, correctionFactor, thresholdMin, thresholdMax),
    binaryImage: binarize(work.smoothed, valid, final, grid),
    sigma: work.sigma,
  };
}

/** Run the full thresholding flow for one image. */
export function runPipeline(input: ThresholdInput, resolved: ResolvedConfig): ThresholdResult {
  const config = effectiveConfig(resolved);
  const loggers = createLoggers(config.debug);

  const prepared = prepareInput(input);
  const source = resolveSource(config, input.measurementValue);

  loggers.dispatch.logTrace('DISPATCH', {
    strategy: config.strategy,
    source: source.kind,
    shape: prepared.grid.shape,
    automatic: config.automatic,
  });

  const result =
    config.strategy === 'global'
      ? runGlobal(input, prepared, config, source, loggers)
      : runAdaptive(input, prepared, config, source, loggers);

  loggers.dispatch.logTrace('THRESHOLD_RESULT', {
    strategy: result.strategy,
    guideThreshold: result.guideThreshold,
    sigma: result.sigma,
  });
  return result;
}

/** Smooth, then binarize against a threshold that is already known. */
export function runApplyThreshold(
  input: ThresholdInput,
  threshold: number | ThresholdMap,
  smoothingScale: number,
): AppliedThreshold {
  if (!Number.isFinite(smoothingScale) || smoothingScale < 0) {
    throw new ConfigurationError(`applyThreshold: smoothingScale must be a non-negative number (got ${smoothingScale})`, {
      stage: 'configuration',
      parameter: 'smoothingScale',
    });
  }

  const { grid, valid } = prepareInput(input);
  if (typeof threshold !== 'number') {
    const mapAxes: readonly number[] = threshold.shape;
    const imageAxes: readonly number[] = grid.shape;
    if (mapAxes.length !== imageAxes.length || mapAxes.some((n, axis) => n !== imageAxes[axis])) {
      throw new ShapeError(
        `applyThreshold: threshold shape [${mapAxes.join(', ')}] does not match image shape [${imageAxes.join(', ')}]`,
        { stage: 'postprocessing', parameter: 'threshold.shape' },
      );
    }
  }

  const values = typeof threshold === 'number' ? threshold : threshold.data;
  const hasNaN = typeof values === 'number' ? Number.isNaN(values) : values.some(Number.isNaN);
  if (hasNaN) {
    throw new ConfigurationError('applyThreshold: threshold must not be NaN', {
      stage: 'postprocessing',
      parameter: 'threshold',
    });
  }

  const work = smoothAndTransform(input.image.data, valid, grid, smoothingScale, false);
  return { binaryImage: binarize(work.smoothed, valid, values, grid), sigma: work.sigma };
}
