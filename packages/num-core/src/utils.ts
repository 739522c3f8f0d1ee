import { NumericalError } from 'core-types';

export function assertFinite(x: number, tag: string): number {
  if (!Number.isFinite(x)) {
    throw new NumericalError(`Non-finite value at ${tag}: ${x}`);
  }
  return x;
}

export function mean(xs: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < xs.length; i++) sum += xs[i];
  return sum / xs.length;
}
