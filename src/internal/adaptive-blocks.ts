import type { GlobalEstimator, Grid } from './types.js';
import type { Logger } from './logger.js';
import { estimateGlobalThreshold } from './global-estimate.js';
import { interpolateGrid } from './interpolation.js';

/** Local thresholds are kept within these multiples of the guide threshold. */
export const GUIDE_LIMITS: readonly [low: number, high: number] = [0.7, 1.5];

/** Blocks with fewer valid samples than this borrow a neighbour's value. */
export const MIN_BLOCK_SAMPLES = 4;

interface BlockAxis {
  starts: number[];
  ends: number[];
  /** Block centres in pixel coordinates. */
  centers: Float64Array;
}

/** Split an axis into windowSize-long blocks, the last one clipped. */
function splitAxis(length: number, windowSize: number): BlockAxis {
  const starts: number[] = [];
  const ends: number[] = [];
  for (let start = 0; start < length; start += windowSize) {
    starts.push(start);
    ends.push(Math.min(length, start + windowSize));
  }
  const centers = new Float64Array(starts.length);
  for (let i = 0; i < starts.length; i++) centers[i] = (starts[i] + ends[i] - 1) / 2;
  return { starts, ends, centers };
}

/**
 * Give every unestimated block the value of the nearest estimated block
 * (squared block-index distance, raster order on ties). Returns false when
 * no block in the plane could be estimated.
 */
function fillMissingBlocks(values: Float64Array, estimated: Uint8Array, nbc: number): boolean {
  const sources: number[] = [];
  for (let b = 0; b < estimated.length; b++) {
    if (estimated[b]) sources.push(b);
  }
  if (sources.length === 0) return false;

  for (let b = 0; b < estimated.length; b++) {
    if (estimated[b]) continue;
    const bi = Math.floor(b / nbc);
    const bj = b % nbc;
    let nearest = sources[0];
    let nearestDist = Infinity;
    for (const s of sources) {
      const di = Math.floor(s / nbc) - bi;
      const dj = (s % nbc) - bj;
      const dist = di * di + dj * dj;
      if (dist < nearestDist) {
        nearestDist = dist;
        nearest = s;
      }
    }
    values[b] = values[nearest];
  }
  return true;
}

export interface BlockSurfaceOptions {
  windowSize: number;
  estimator: GlobalEstimator;
  /** Guide in working space; used for planes with no estimable block. */
  guide: number;
  logger: Logger;
}

/**
 * Per-pixel threshold surface from one estimate per window.
 *
 * Each plane is tiled into windowSize x windowSize blocks, the estimator runs
 * on each block's valid samples, and the block values are spline-interpolated
 * from the block centres across the plane. Planes of a volume are processed
 * independently. The surface is returned unclamped, in working space.
 */
export function computeBlockSurface(working: Float64Array, valid: Uint8Array, grid: Grid, options: BlockSurfaceOptions): Float64Array {
  const { windowSize, estimator, guide, logger } = options;
  const rowAxis = splitAxis(grid.rows, windowSize);
  const colAxis = splitAxis(grid.cols, windowSize);
  const nbr = rowAxis.starts.length;
  const nbc = colAxis.starts.length;

  logger.logTrace('BLOCK_GRID', { planes: grid.planes, blockRows: nbr, blockCols: nbc, windowSize });

  const surface = new Float64Array(grid.size);
  const samples = new Float64Array(Math.min(windowSize, grid.rows) * Math.min(windowSize, grid.cols));

  for (let p = 0; p < grid.planes; p++) {
    const planeOffset = p * grid.planeSize;
    const blockValues = new Float64Array(nbr * nbc);
    const estimated = new Uint8Array(nbr * nbc);

    for (let bi = 0; bi < nbr; bi++) {
      for (let bj = 0; bj < nbc; bj++) {
        let count = 0;
        for (let r = rowAxis.starts[bi]; r < rowAxis.ends[bi]; r++) {
          for (let c = colAxis.starts[bj]; c < colAxis.ends[bj]; c++) {
            const idx = planeOffset + r * grid.cols + c;
            if (valid[idx]) samples[count++] = working[idx];
          }
        }
        if (count < MIN_BLOCK_SAMPLES) continue;

        blockValues[bi * nbc + bj] = estimateGlobalThreshold(samples.subarray(0, count), estimator);
        estimated[bi * nbc + bj] = 1;
      }
    }

    const skipped = estimated.length - estimated.reduce((acc, e) => acc + e, 0);
    if (skipped > 0) {
      if (fillMissingBlocks(blockValues, estimated, nbc)) {
        logger.logTrace('BLOCK_FALLBACK', { plane: p, skipped });
      } else {
        logger.logWarn('BLOCK_FALLBACK', `plane ${p} has no block with ${MIN_BLOCK_SAMPLES} valid samples; using the guide threshold`);
        blockValues.fill(guide);
      }
    }

    const plane = interpolateGrid(blockValues, rowAxis.centers, colAxis.centers, grid.rows, grid.cols);
    surface.set(plane, planeOffset);
  }

  return surface;
}

/** Clamp each value into [0.7 guide, 1.5 guide], in place. */
export function clampToGuide(surface: Float64Array, guide: number): Float64Array {
  const a = GUIDE_LIMITS[0] * guide;
  const b = GUIDE_LIMITS[1] * guide;
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  for (let i = 0; i < surface.length; i++) {
    surface[i] = Math.min(hi, Math.max(lo, surface[i]));
  }
  return surface;
}
