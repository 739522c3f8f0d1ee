/**
 * Lightweight dense least squares for small column counts
 * Columns stored as Float64Array, rows = observations
 */
import { NumericalError } from 'core-types';

const RANK_TOL = 1e-10;

function dot(a: ArrayLike<number>, b: ArrayLike<number>, from = 0): number {
  if (a.length !== b.length) {
    throw new NumericalError(`dot: dimension mismatch ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = from; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Solve min ||A x - y||₂ by Householder QR.
 * `cols` is overwritten with R (upper part) and reflectors; `y` is copied.
 * Throws NumericalError when A is rank deficient relative to RANK_TOL.
 */
export function lstsqQR(cols: Float64Array[], y: ArrayLike<number>): Float64Array {
  const m = cols.length;
  if (m === 0) throw new NumericalError('lstsqQR: no columns');
  const n = cols[0].length;
  if (y.length !== n) {
    throw new NumericalError(`lstsqQR: dimension mismatch ${n} vs ${y.length}`);
  }
  if (n < m) {
    throw new NumericalError(`lstsqQR: underdetermined system (${n} rows, ${m} columns)`);
  }

  const b = Float64Array.from(y);
  const diag = new Float64Array(m);
  const v = new Float64Array(n);

  for (let k = 0; k < m; k++) {
    const ck = cols[k];
    const norm = Math.sqrt(dot(ck, ck, k));
    if (norm === 0) {
      throw new NumericalError(`lstsqQR: zero column ${k}`);
    }
    const alpha = ck[k] > 0 ? -norm : norm;

    v.fill(0);
    for (let i = k; i < n; i++) v[i] = ck[i];
    v[k] -= alpha;
    const vv = dot(v, v, k);
    if (vv === 0) {
      diag[k] = ck[k];
      continue;
    }

    for (let j = k; j < m; j++) {
      const cj = cols[j];
      const s = (2 * dot(v, cj, k)) / vv;
      for (let i = k; i < n; i++) cj[i] -= s * v[i];
    }
    const s = (2 * dot(v, b, k)) / vv;
    for (let i = k; i < n; i++) b[i] -= s * v[i];
    diag[k] = ck[k];
  }

  let maxDiag = 0;
  for (let k = 0; k < m; k++) maxDiag = Math.max(maxDiag, Math.abs(diag[k]));
  for (let k = 0; k < m; k++) {
    if (!(Math.abs(diag[k]) > RANK_TOL * maxDiag)) {
      throw new NumericalError(`lstsqQR: rank deficient at column ${k} (|r_kk|=${Math.abs(diag[k])})`);
    }
  }

  // back substitution on R x = Qᵀ y
  const x = new Float64Array(m);
  for (let k = m - 1; k >= 0; k--) {
    let s = b[k];
    for (let j = k + 1; j < m; j++) s -= cols[j][k] * x[j];
    x[k] = s / diag[k];
  }
  return x;
}
