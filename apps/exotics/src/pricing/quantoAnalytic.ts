import type { PriceResult, QuantoContract } from "core-types";
import { assertFinite, blackScholesPrice } from "num-core";
import { validateQuanto } from "../contracts/schema";
import { quantoDividendYield } from "./quantoAdjust";

/** European quanto: vanilla Black-Scholes under the foreign rate and adjusted yield. */
export function priceQuantoAnalytic(contract: QuantoContract): PriceResult {
  const c = validateQuanto(contract);
  const { spot, vol, q } = c.ref;
  const qAdj = quantoDividendYield({
    correlation: c.correlation,
    vol,
    fxVol: c.fxVol,
    rate: c.rate,
    q,
    foreignRate: c.foreignRate,
  });

  const px = blackScholesPrice({ spot, strike: c.K, vol, T: c.T, r: c.foreignRate, q: qAdj, right: c.right });
  return {
    px: assertFinite(px, "quantoAnalytic.px"),
    method: "BS",
    subMethod: "European quanto",
    params: { keepHist: false, fxVol: c.fxVol, correlation: c.correlation },
  };
}
