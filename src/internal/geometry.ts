import type { ImageMask, ImageShape, IntensityImage } from '../types.js';
import type { Grid } from './types.js';
import { ShapeError } from '../errors.js';

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

function formatShape(shape: ImageShape): string {
  const axes: readonly number[] = shape;
  return `[${axes.join(', ')}]`;
}

/** Build the plane/row/col geometry for an image shape. */
export function resolveGrid(shape: ImageShape, volumetric?: boolean): Grid {
  const axes: readonly number[] = shape;
  if (!axes.every(isPositiveInteger)) {
    throw new ShapeError(`resolveGrid: image shape ${formatShape(shape)} must contain positive integers`, {
      stage: 'dispatch',
      parameter: 'image.shape',
    });
  }

  const isVolume = shape.length === 3;
  if (volumetric !== undefined && volumetric !== isVolume) {
    throw new ShapeError(
      `resolveGrid: volumetric=${volumetric} does not match image shape ${formatShape(shape)}`,
      { stage: 'dispatch', parameter: 'volumetric' },
    );
  }

  const planes = shape.length === 3 ? shape[0] : 1;
  const rows = shape.length === 3 ? shape[1] : shape[0];
  const cols = shape.length === 3 ? shape[2] : shape[1];
  const planeSize = rows * cols;

  return { planes, rows, cols, planeSize, size: planes * planeSize, volumetric: isVolume, shape };
}

/** Check that the image data length matches its shape. */
export function assertImageData(image: IntensityImage, grid: Grid): void {
  if (image.data.length !== grid.size) {
    throw new ShapeError(
      `assertImageData: image has ${image.data.length} samples but shape ${formatShape(grid.shape)} needs ${grid.size}`,
      { stage: 'dispatch', parameter: 'image.data' },
    );
  }
}

/**
 * Resolve the valid-sample map: mask true and intensity finite.
 * A volume accepts either a full mask or an in-plane mask shared by every plane.
 */
export function resolveValidity(image: IntensityImage, mask: ImageMask | undefined, grid: Grid): Uint8Array {
  const valid = new Uint8Array(grid.size);
  const data = image.data;

  if (!mask) {
    for (let i = 0; i < grid.size; i++) {
      valid[i] = Number.isFinite(data[i]) ? 1 : 0;
    }
    return valid;
  }

  const maskAxes: readonly number[] = mask.shape;
  const imageAxes: readonly number[] = grid.shape;
  const sameShape =
    maskAxes.length === imageAxes.length && maskAxes.every((n, axis) => n === imageAxes[axis]);
  const planeShape =
    grid.volumetric && mask.shape.length === 2 && mask.shape[0] === grid.rows && mask.shape[1] === grid.cols;

  if (!sameShape && !planeShape) {
    throw new ShapeError(
      `resolveValidity: mask shape ${formatShape(mask.shape)} does not match image shape ${formatShape(grid.shape)}`,
      { stage: 'dispatch', parameter: 'mask.shape' },
    );
  }

  const expected = sameShape ? grid.size : grid.planeSize;
  if (mask.data.length !== expected) {
    throw new ShapeError(
      `resolveValidity: mask has ${mask.data.length} samples but shape ${formatShape(mask.shape)} needs ${expected}`,
      { stage: 'dispatch', parameter: 'mask.data' },
    );
  }

  for (let i = 0; i < grid.size; i++) {
    const m = sameShape ? mask.data[i] : mask.data[i % grid.planeSize];
    valid[i] = m && Number.isFinite(data[i]) ? 1 : 0;
  }
  return valid;
}

/** Gather valid samples into a dense array. */
export function collectValid(values: ArrayLike<number>, valid: Uint8Array): Float64Array {
  let count = 0;
  for (let i = 0; i < valid.length; i++) count += valid[i];

  const out = new Float64Array(count);
  let k = 0;
  for (let i = 0; i < valid.length; i++) {
    if (valid[i]) out[k++] = values[i];
  }
  return out;
}
