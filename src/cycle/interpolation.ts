/**
 * Natural cubic spline interpolation over tabulated data.
 *
 * Outside the tabulated range the end segments' cubics are continued, so
 * callers must check the domain themselves if extrapolation matters.
 */

export interface CubicSpline {
  readonly xMin: number;
  readonly xMax: number;
  evaluate(x: number): number;
}

/**
 * Binary search for the segment [xs[lo], xs[lo + 1]] containing x.
 * Values below or above the table map to the first or last segment.
 */
export function findSegment(xs: readonly number[], x: number): number {
  const last = xs.length - 2;
  if (x <= xs[0]) return 0;
  if (x >= xs[xs.length - 1]) return last;

  let lo = 0;
  let hi = xs.length - 1;

  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (xs[mid] <= x) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return lo;
}

/**
 * Second derivatives of the natural spline (zero curvature at both ends),
 * from the tridiagonal system solved with the Thomas algorithm.
 */
function solveCurvatures(xs: readonly number[], ys: readonly number[]): number[] {
  const n = xs.length;
  const m = n - 2;
  const curvature = new Array<number>(n).fill(0);
  if (m <= 0) return curvature;

  const sub: number[] = [];
  const diag: number[] = [];
  const sup: number[] = [];
  const rhs: number[] = [];

  for (let k = 0; k < m; k++) {
    const i = k + 1;
    const hPrev = xs[i] - xs[i - 1];
    const hNext = xs[i + 1] - xs[i];
    sub.push(hPrev);
    diag.push(2 * (hPrev + hNext));
    sup.push(hNext);
    rhs.push(6 * ((ys[i + 1] - ys[i]) / hNext - (ys[i] - ys[i - 1]) / hPrev));
  }

  // Forward elimination
  for (let k = 1; k < m; k++) {
    const w = sub[k] / diag[k - 1];
    diag[k] -= w * sup[k - 1];
    rhs[k] -= w * rhs[k - 1];
  }

  // Back substitution
  for (let k = m - 1; k >= 0; k--) {
    const next = k < m - 1 ? sup[k] * curvature[k + 2] : 0;
    curvature[k + 1] = (rhs[k] - next) / diag[k];
  }

  return curvature;
}

/**
 * Build a natural cubic spline through (xs, ys). xs must be strictly
 * increasing and hold at least two points; the caller validates this.
 */
export function createCubicSpline(xs: readonly number[], ys: readonly number[]): CubicSpline {
  const x = [...xs];
  const y = [...ys];
  const curvature = solveCurvatures(x, y);

  return {
    xMin: x[0],
    xMax: x[x.length - 1],

    evaluate(t: number): number {
      const i = findSegment(x, t);
      const h = x[i + 1] - x[i];
      const a = (x[i + 1] - t) / h;
      const b = (t - x[i]) / h;
      return (
        a * y[i] + b * y[i + 1] +
        ((a * a * a - a) * curvature[i] + (b * b * b - b) * curvature[i + 1]) * h * h / 6
      );
    },
  };
}
