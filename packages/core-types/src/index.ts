export type OptionRight = 'call' | 'put';

export type PricingMethod = 'BS' | 'LT' | 'MC' | 'FD';

export const PRICING_METHODS: readonly PricingMethod[] = ['BS', 'LT', 'MC', 'FD'];

export interface Underlying {
  spot: number;
  vol: number;   // annualized volatility (decimal)
  q: number;     // continuous dividend yield
}

export interface OptionContract {
  ref: Underlying;
  right: OptionRight;
  K?: number;    // strike; spot when omitted
  T: number;     // maturity in years
  rate: number;  // domestic risk-free rate
}

export interface ForwardStartContract extends OptionContract {
  kind: 'forwardStart';
  startTime: number; // T_s, strike reference fixing time
}

export interface QuantoContract extends OptionContract {
  kind: 'quanto';
  foreignRate: number;
  fxVol: number;
  correlation: number; // asset / exchange-rate correlation, not range checked
}

export type ExoticContract = ForwardStartContract | QuantoContract;
export type ContractKind = ExoticContract['kind'];

export interface PriceParams {
  keepHist: boolean;
  nsteps?: number;
  npaths?: number;
  deg?: number;
  seed?: number;
  itmOnly?: boolean;
  fxVol?: number;
  correlation?: number;
}

export interface PriceResult<D = undefined> {
  px: number;
  method: PricingMethod;
  subMethod?: string;
  params: PriceParams;
  diagnostics?: D;
}

export * from './errors';
