import type { OptionRight, Underlying } from 'core-types';

export interface AmericanSpec {
  ref: Underlying;
  right: OptionRight;
  K: number;
  T: number;
  rate: number;
}

export interface LatticeOptions {
  method: 'binomial';
  nsteps: number;
  keepHist: boolean;
}

/** Per-step tree parameters (Hull ch. 13 notation) */
export interface LatticeParams {
  dt: number;
  u: number;
  d: number;
  a: number;     // growth factor exp((r - q) dt)
  p: number;     // risk-neutral up probability
  dfDt: number;
  dfT: number;
}

export interface LatticeOutput {
  px: number;
  subMethod: string;
  params: LatticeParams;
  /** level i holds i+1 nodes, lowest spot first */
  refTree?: number[][];
  optTree?: number[][];
}
