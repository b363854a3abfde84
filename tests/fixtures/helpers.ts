import type { ImageMask, IntensityImage, ThresholdInput } from '../../src/types.js';
import type { Grid } from '../../src/internal/types.js';
import { resolveGrid } from '../../src/internal/geometry.js';

/** Create a 2D image from a per-pixel function. */
export function makeImage(rows: number, cols: number, fn: (row: number, col: number) => number): IntensityImage {
  const data = new Float64Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) data[r * cols + c] = fn(r, c);
  }
  return { data, shape: [rows, cols] };
}

/** Create a uniform 2D image. */
export function makeUniformImage(rows: number, cols: number, value: number): IntensityImage {
  return makeImage(rows, cols, () => value);
}

/** Left half `low`, right half `high`. */
export function makeHalvesImage(rows: number, cols: number, low: number = 0.2, high: number = 0.8): IntensityImage {
  return makeImage(rows, cols, (_r, c) => (c < cols / 2 ? low : high));
}

/** Create a volume from a per-voxel function. */
export function makeVolume(
  planes: number,
  rows: number,
  cols: number,
  fn: (plane: number, row: number, col: number) => number,
): IntensityImage {
  const data = new Float64Array(planes * rows * cols);
  for (let p = 0; p < planes; p++) {
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) data[p * rows * cols + r * cols + c] = fn(p, r, c);
    }
  }
  return { data, shape: [planes, rows, cols] };
}

/** Create a 2D mask from a per-pixel predicate. */
export function makeMask(rows: number, cols: number, fn: (row: number, col: number) => boolean): ImageMask {
  const data: boolean[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) data.push(fn(r, c));
  }
  return { data, shape: [rows, cols] };
}

/** Build a ThresholdInput around an image. */
export function makeInput(image: IntensityImage, overrides: Partial<ThresholdInput> = {}): ThresholdInput {
  return { image, ...overrides };
}

/** Grid and all-valid map for calling engine stages directly. */
export function makeGrid(image: IntensityImage): { grid: Grid; valid: Uint8Array } {
  const grid = resolveGrid(image.shape);
  return { grid, valid: new Uint8Array(grid.size).fill(1) };
}

/** Sum of a binary image. */
export function countForeground(data: Uint8Array): number {
  let n = 0;
  for (let i = 0; i < data.length; i++) n += data[i];
  return n;
}

/** Samples from a list of [value, count] pairs. */
export function repeatValues(pairs: [value: number, count: number][]): Float64Array {
  const out: number[] = [];
  for (const [value, count] of pairs) {
    for (let i = 0; i < count; i++) out.push(value);
  }
  return Float64Array.from(out);
}
