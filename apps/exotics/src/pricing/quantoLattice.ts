import type { PriceResult, QuantoContract } from "core-types";
import { priceAmerican, type LatticeParams } from "lattice-core";
import { validateQuanto } from "../contracts/schema";
import { quantoDividendYield } from "./quantoAdjust";

export interface QuantoLatticeOptions {
  nsteps: number;
  keepHist?: boolean;
}

export interface LatticeDiagnostics {
  lattice: LatticeParams;
  qAdj: number;
  refTree?: number[][];
  optTree?: number[][];
}

/**
 * Quanto option on a binomial tree.
 *
 * The quanto correction is absorbed into the dividend yield, so a plain
 * single-currency American tree at the foreign rate prices it.
 */
export function priceQuantoLattice(
  contract: QuantoContract,
  opts: QuantoLatticeOptions
): PriceResult<LatticeDiagnostics> {
  const c = validateQuanto(contract);
  const keepHist = opts.keepHist ?? false;
  const qAdj = quantoDividendYield({
    correlation: c.correlation,
    vol: c.ref.vol,
    fxVol: c.fxVol,
    rate: c.rate,
    q: c.ref.q,
    foreignRate: c.foreignRate,
  });

  const out = priceAmerican(
    {
      ref: { spot: c.ref.spot, vol: c.ref.vol, q: qAdj },
      right: c.right,
      K: c.K,
      T: c.T,
      rate: c.foreignRate,
    },
    { method: "binomial", nsteps: opts.nsteps, keepHist }
  );

  const diagnostics: LatticeDiagnostics = { lattice: out.params, qAdj };
  if (keepHist) {
    diagnostics.refTree = out.refTree;
    diagnostics.optTree = out.optTree;
  }

  return {
    px: out.px,
    method: "LT",
    subMethod: out.subMethod,
    params: {
      keepHist,
      nsteps: opts.nsteps,
      fxVol: c.fxVol,
      correlation: c.correlation,
    },
    diagnostics,
  };
}
