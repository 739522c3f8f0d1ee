/**
 * Black-Scholes-Merton with a continuous dividend yield.
 * Conventions:
 *  - rates and yields continuously compounded, T in years
 *  - sigma * sqrt(T) == 0, a zero spot or a zero strike collapses to the
 *    discounted forward intrinsic
 */
import type { OptionRight } from 'core-types';
import { normCdf } from './normal';

export interface BsInputs {
  spot: number;
  strike: number;
  vol: number;
  T: number;
  r: number;
  q: number;
  right: OptionRight;
}

function bsD1D2(spot: number, strike: number, vol: number, T: number, r: number, q: number): { d1: number; d2: number } {
  const volT = vol * Math.sqrt(T);
  const d1 = (Math.log(spot / strike) + (r - q + 0.5 * vol * vol) * T) / volT;
  return { d1, d2: d1 - volT };
}

export function blackScholesPrice(inputs: BsInputs): number {
  const { spot, strike, vol, T, r, q, right } = inputs;
  const fwdSpot = spot * Math.exp(-q * T);
  const pvStrike = strike * Math.exp(-r * T);

  if (vol * Math.sqrt(T) === 0 || spot === 0 || strike === 0) {
    return right === 'call' ? Math.max(fwdSpot - pvStrike, 0) : Math.max(pvStrike - fwdSpot, 0);
  }

  const { d1, d2 } = bsD1D2(spot, strike, vol, T, r, q);
  return right === 'call'
    ? fwdSpot * normCdf(d1) - pvStrike * normCdf(d2)
    : pvStrike * normCdf(-d2) - fwdSpot * normCdf(-d1);
}
