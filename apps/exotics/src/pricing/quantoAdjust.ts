export interface QuantoAdjustInputs {
  correlation: number;
  vol: number;
  fxVol: number;
  rate: number;
  q: number;
  foreignRate: number;
}

/**
 * Dividend yield that makes a single-currency model reproduce the quanto drift:
 * q' = r_f - ((r - q) + rho * sigma * sigma_fx).
 * Correlation is not range checked.
 */
export function quantoDividendYield(inputs: QuantoAdjustInputs): number {
  const { correlation, vol, fxVol, rate, q, foreignRate } = inputs;
  const growthAdj = correlation * vol * fxVol;
  const domesticNumeraire = rate - q;
  const foreignNumeraire = domesticNumeraire + growthAdj;
  return foreignRate - foreignNumeraire;
}
