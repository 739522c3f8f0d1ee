/**
 * Cox-Ross-Rubinstein tree for American options with a continuous yield.
 * Node (i, j) carries S0 * u^j * d^(i-j); value is max(continuation, exercise).
 * At zero vol the tree collapses onto the forward path (u = d = a, p = 1).
 */
import { NumericalError, ValidationError } from 'core-types';
import { assertFinite } from 'num-core';
import type { AmericanSpec, LatticeOptions, LatticeOutput, LatticeParams } from './types';

export const BINOMIAL_SUB_METHOD = 'binomial tree; Hull Ch.13';

export function latticeParams(spec: AmericanSpec, nsteps: number): LatticeParams {
  const { ref, T, rate } = spec;
  const dt = T / nsteps;
  const a = Math.exp((rate - ref.q) * dt);
  if (ref.vol * Math.sqrt(dt) === 0) {
    // no diffusion: every node sits on the forward, u = d = a
    return { dt, u: a, d: a, a, p: 1, dfDt: Math.exp(-rate * dt), dfT: Math.exp(-rate * T) };
  }
  const u = Math.exp(ref.vol * Math.sqrt(dt));
  const d = 1 / u;
  const p = (a - d) / (u - d);
  if (!(p >= 0 && p <= 1)) {
    throw new NumericalError(`binomial: up probability ${p} outside [0, 1] (vol=${ref.vol}, dt=${dt})`);
  }
  return { dt, u, d, a, p, dfDt: Math.exp(-rate * dt), dfT: Math.exp(-rate * T) };
}

export function priceAmerican(spec: AmericanSpec, opts: LatticeOptions): LatticeOutput {
  const n = opts.nsteps;
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError('binomial', [`nsteps: expected a positive integer, got ${n}`]);
  }
  const params = latticeParams(spec, n);
  const { u, d, p, dfDt } = params;
  const S0 = spec.ref.spot;
  const sign = spec.right === 'call' ? 1 : -1;
  const exercise = (s: number) => Math.max(sign * (s - spec.K), 0);
  const spotAt = (i: number, j: number) => S0 * Math.pow(u, j) * Math.pow(d, i - j);

  let values: number[] = [];
  for (let j = 0; j <= n; j++) values.push(exercise(spotAt(n, j)));

  const optTree: number[][] = [];
  if (opts.keepHist) optTree.push(values);

  for (let i = n - 1; i >= 0; i--) {
    const next: number[] = new Array(i + 1);
    for (let j = 0; j <= i; j++) {
      const hold = dfDt * (p * values[j + 1] + (1 - p) * values[j]);
      next[j] = Math.max(hold, exercise(spotAt(i, j)));
    }
    values = next;
    if (opts.keepHist) optTree.push(values);
  }

  const out: LatticeOutput = {
    px: assertFinite(values[0], 'binomial.px'),
    subMethod: BINOMIAL_SUB_METHOD,
    params,
  };
  if (opts.keepHist) {
    const refTree: number[][] = [];
    for (let i = 0; i <= n; i++) {
      const level: number[] = [];
      for (let j = 0; j <= i; j++) level.push(spotAt(i, j));
      refTree.push(level);
    }
    out.refTree = refTree;
    out.optTree = optTree.reverse();
  }
  return out;
}
