import type { ForwardStartContract, PriceResult } from "core-types";
import { assertFinite, blackScholesPrice } from "num-core";
import { validateForwardStart } from "../contracts/schema";

/**
 * Forward-start option, closed form.
 *
 * The vanilla price for the given strike, multiplied by e^{-q T_s} for the
 * expected drift of the strike reference between today and T_s. With
 * T_s = 0 this is exactly the vanilla price.
 */
export function priceForwardStartAnalytic(contract: ForwardStartContract): PriceResult {
  const c = validateForwardStart(contract);
  const { spot, vol, q } = c.ref;

  const vanilla = blackScholesPrice({ spot, strike: c.K, vol, T: c.T, r: c.rate, q, right: c.right });
  const px = vanilla * Math.exp(-q * c.startTime);

  return {
    px: assertFinite(px, "forwardStart.px"),
    method: "BS",
    params: { keepHist: false },
  };
}
