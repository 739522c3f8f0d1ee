import { NumericalError } from 'core-types';
import { lstsqQR } from '../linalg';

/**
 * Polynomial in z = (x - center) / halfWidth, coefficients lowest power first.
 * The rescaling keeps the Vandermonde columns O(1) for spot-sized inputs.
 */
export interface PolyModel {
  coef: Float64Array;
  center: number;
  halfWidth: number;
}

export function distinctCount(x: ArrayLike<number>): number {
  const seen = new Set<number>();
  for (let i = 0; i < x.length; i++) seen.add(x[i]);
  return seen.size;
}

/** Least-squares fit of a degree-`deg` polynomial to (x, y). */
export function polyfit(x: ArrayLike<number>, y: ArrayLike<number>, deg: number): PolyModel {
  if (!Number.isInteger(deg) || deg < 0) {
    throw new NumericalError(`polyfit: invalid degree ${deg}`);
  }
  if (x.length !== y.length) {
    throw new NumericalError(`polyfit: dimension mismatch ${x.length} vs ${y.length}`);
  }
  const distinct = distinctCount(x);
  if (distinct <= deg) {
    throw new NumericalError(`polyfit: degree ${deg} needs more than ${distinct} distinct abscissae`);
  }

  let lo = Infinity, hi = -Infinity;
  for (let i = 0; i < x.length; i++) {
    if (!Number.isFinite(x[i]) || !Number.isFinite(y[i])) {
      throw new NumericalError(`polyfit: non-finite sample at ${i}`);
    }
    lo = Math.min(lo, x[i]);
    hi = Math.max(hi, x[i]);
  }
  const center = 0.5 * (hi + lo);
  const halfWidth = hi > lo ? 0.5 * (hi - lo) : 1;

  const n = x.length;
  const cols: Float64Array[] = [];
  for (let j = 0; j <= deg; j++) cols.push(new Float64Array(n));
  for (let i = 0; i < n; i++) {
    const z = (x[i] - center) / halfWidth;
    let zj = 1;
    for (let j = 0; j <= deg; j++) {
      cols[j][i] = zj;
      zj *= z;
    }
  }

  return { coef: lstsqQR(cols, y), center, halfWidth };
}

/** Horner evaluation at a single point. */
export function polyval(model: PolyModel, x: number): number {
  const z = (x - model.center) / model.halfWidth;
  const { coef } = model;
  let acc = 0;
  for (let k = coef.length - 1; k >= 0; k--) acc = acc * z + coef[k];
  return acc;
}

export function polyvalMany(model: PolyModel, xs: ArrayLike<number>): Float64Array {
  const out = new Float64Array(xs.length);
  for (let i = 0; i < xs.length; i++) out[i] = polyval(model, xs[i]);
  return out;
}
