/**
 * Natural cubic spline through (xs[i], ys[i]); xs strictly increasing.
 *
 * Beyond the outer knots the spline continues along its end tangent. Two knots
 * give a straight line, one knot a constant.
 */
export function naturalCubicSpline(xs: ArrayLike<number>, ys: ArrayLike<number>): (x: number) => number {
  const n = xs.length;
  if (n === 1) {
    const only = ys[0];
    return () => only;
  }

  // Second derivatives, zero at both ends (Thomas algorithm on the interior).
  const m = new Float64Array(n);
  if (n > 2) {
    const diag = new Float64Array(n);
    const rhs = new Float64Array(n);
    for (let i = 1; i < n - 1; i++) {
      const h0 = xs[i] - xs[i - 1];
      const h1 = xs[i + 1] - xs[i];
      diag[i] = 2 * (h0 + h1);
      rhs[i] = 6 * ((ys[i + 1] - ys[i]) / h1 - (ys[i] - ys[i - 1]) / h0);
    }
    for (let i = 2; i < n - 1; i++) {
      const h = xs[i] - xs[i - 1];
      const w = h / diag[i - 1];
      diag[i] -= w * h;
      rhs[i] -= w * rhs[i - 1];
    }
    for (let i = n - 2; i >= 1; i--) {
      const h1 = xs[i + 1] - xs[i];
      m[i] = (rhs[i] - (i < n - 2 ? h1 * m[i + 1] : 0)) / diag[i];
    }
  }

  const first = 0;
  const last = n - 1;
  const startSlope = (ys[1] - ys[0]) / (xs[1] - xs[0]) - ((xs[1] - xs[0]) * m[1]) / 6;
  const endSlope = (ys[last] - ys[last - 1]) / (xs[last] - xs[last - 1]) + ((xs[last] - xs[last - 1]) * m[last - 1]) / 6;

  return (x: number): number => {
    if (x <= xs[first]) return ys[first] + startSlope * (x - xs[first]);
    if (x >= xs[last]) return ys[last] + endSlope * (x - xs[last]);

    let lo = 0;
    let hi = last;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (xs[mid] <= x) lo = mid;
      else hi = mid;
    }

    const h = xs[hi] - xs[lo];
    const a = (xs[hi] - x) / h;
    const b = (x - xs[lo]) / h;
    return a * ys[lo] + b * ys[hi] + ((a * a * a - a) * m[lo] + (b * b * b - b) * m[hi]) * (h * h) / 6;
  };
}

/**
 * Tensor-product natural cubic spline of a knot grid (row-major,
 * rowKnots.length x colKnots.length), sampled at every pixel of a rows x cols
 * plane.
 */
export function interpolateGrid(
  values: Float64Array,
  rowKnots: Float64Array,
  colKnots: Float64Array,
  rows: number,
  cols: number,
): Float64Array {
  const nbr = rowKnots.length;
  const nbc = colKnots.length;

  // Along rows first: one spline per knot column, sampled at every pixel row.
  const perRow = new Float64Array(rows * nbc);
  const column = new Float64Array(nbr);
  for (let j = 0; j < nbc; j++) {
    for (let i = 0; i < nbr; i++) column[i] = values[i * nbc + j];
    const spline = naturalCubicSpline(rowKnots, column);
    for (let r = 0; r < rows; r++) perRow[r * nbc + j] = spline(r);
  }

  const out = new Float64Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    const spline = naturalCubicSpline(colKnots, perRow.subarray(r * nbc, (r + 1) * nbc));
    for (let c = 0; c < cols; c++) out[r * cols + c] = spline(c);
  }
  return out;
}
