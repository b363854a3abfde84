import type { Grid } from './types.js';
import type { Logger } from './logger.js';

export interface SauvolaOptions {
  windowSize: number;
  /** Sensitivity. */
  k: number;
  /** Dynamic range of the standard deviation. */
  r: number;
  logger: Logger;
}

/**
 * Summed-volume table with one extra leading row/col/plane of zeros, so
 * `table[(p+1, r+1, c+1)]` holds the sum over [0..p] x [0..r] x [0..c].
 */
class SummedVolume {
  private readonly table: Float64Array;
  private readonly stridePlane: number;
  private readonly strideRow: number;

  constructor(source: (idx: number) => number, grid: Grid) {
    this.strideRow = grid.cols + 1;
    this.stridePlane = (grid.rows + 1) * this.strideRow;
    this.table = new Float64Array((grid.planes + 1) * this.stridePlane);

    for (let p = 0; p < grid.planes; p++) {
      for (let r = 0; r < grid.rows; r++) {
        for (let c = 0; c < grid.cols; c++) {
          const at = this.offset(p + 1, r + 1, c + 1);
          this.table[at] =
            source(p * grid.planeSize + r * grid.cols + c) +
            this.table[at - 1] +
            this.table[at - this.strideRow] +
            this.table[at - this.stridePlane] -
            this.table[at - 1 - this.strideRow] -
            this.table[at - 1 - this.stridePlane] -
            this.table[at - this.strideRow - this.stridePlane] +
            this.table[at - 1 - this.strideRow - this.stridePlane];
        }
      }
    }
  }

  private offset(p: number, r: number, c: number): number {
    return p * this.stridePlane + r * this.strideRow + c;
  }

  /** Sum over the inclusive box [p0..p1] x [r0..r1] x [c0..c1]. */
  sum(p0: number, p1: number, r0: number, r1: number, c0: number, c1: number): number {
    const t = this.table;
    return (
      t[this.offset(p1 + 1, r1 + 1, c1 + 1)] -
      t[this.offset(p0, r1 + 1, c1 + 1)] -
      t[this.offset(p1 + 1, r0, c1 + 1)] -
      t[this.offset(p1 + 1, r1 + 1, c0)] +
      t[this.offset(p0, r0, c1 + 1)] +
      t[this.offset(p0, r1 + 1, c0)] +
      t[this.offset(p1 + 1, r0, c0)] -
      t[this.offset(p0, r0, c0)]
    );
  }
}

/**
 * Sauvola threshold per pixel: `m * (1 + k * (s / r - 1))` with the mean `m`
 * and standard deviation `s` of the valid samples in a window centred on the
 * pixel. Windows are square in 2D and cubic for volumes; an even window size
 * is widened by one so it can be centred. A window without valid samples uses
 * the statistics of the whole image.
 */
export function computeSauvolaSurface(working: Float64Array, valid: Uint8Array, grid: Grid, options: SauvolaOptions): Float64Array {
  const { k, r: range, logger } = options;
  const windowSize = options.windowSize % 2 === 0 ? options.windowSize + 1 : options.windowSize;
  const half = (windowSize - 1) / 2;
  const depthHalf = grid.volumetric ? half : 0;

  logger.logTrace('SAUVOLA_WINDOW', { windowSize, depth: 2 * depthHalf + 1, k, r: range });

  const sums = new SummedVolume(i => (valid[i] ? working[i] : 0), grid);
  const squares = new SummedVolume(i => (valid[i] ? working[i] * working[i] : 0), grid);
  const counts = new SummedVolume(i => valid[i], grid);

  const lastPlane = grid.planes - 1;
  const lastRow = grid.rows - 1;
  const lastCol = grid.cols - 1;
  const totalCount = counts.sum(0, lastPlane, 0, lastRow, 0, lastCol);
  const globalMean = totalCount > 0 ? sums.sum(0, lastPlane, 0, lastRow, 0, lastCol) / totalCount : 0;
  const globalStd =
    totalCount > 0
      ? Math.sqrt(Math.max(0, squares.sum(0, lastPlane, 0, lastRow, 0, lastCol) / totalCount - globalMean * globalMean))
      : 0;

  const out = new Float64Array(grid.size);
  for (let p = 0; p < grid.planes; p++) {
    const p0 = Math.max(0, p - depthHalf);
    const p1 = Math.min(lastPlane, p + depthHalf);
    for (let row = 0; row < grid.rows; row++) {
      const r0 = Math.max(0, row - half);
      const r1 = Math.min(lastRow, row + half);
      for (let col = 0; col < grid.cols; col++) {
        const c0 = Math.max(0, col - half);
        const c1 = Math.min(lastCol, col + half);

        const n = counts.sum(p0, p1, r0, r1, c0, c1);
        let m = globalMean;
        let s = globalStd;
        if (n > 0) {
          m = sums.sum(p0, p1, r0, r1, c0, c1) / n;
          s = Math.sqrt(Math.max(0, squares.sum(p0, p1, r0, r1, c0, c1) / n - m * m));
        }

        out[p * grid.planeSize + row * grid.cols + col] = m * (1 + k * (s / range - 1));
      }
    }
  }

  return out;
}
