import { z } from "zod";
import type { PriceResult, QuantoContract } from "core-types";
import { assertFinite, mean, SeededRandom } from "num-core";
import { Fit } from "poly-fit";
import { parseWith, validateQuanto } from "../contracts/schema";
import { silentLogger, type Logger } from "../logging/logger";
import { quantoDividendYield } from "./quantoAdjust";

export const DEFAULT_LSM_DEG = 5;
export const DEFAULT_LSM_SEED = 1;

export interface QuantoLsmOptions {
  nsteps: number;
  npaths: number;
  seed?: number;
  /** regression degree; anything not coercible to a non-negative integer means the default */
  deg?: number | string;
  /** regress on in-the-money paths only (canonical Longstaff-Schwartz) */
  itmOnly?: boolean;
  keepHist?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface LsmDiagnostics {
  qAdj: number;
  /** spot grid, row t = time step, column = path */
  paths?: Float64Array[];
  /** value grid after backward induction */
  values?: Float64Array[];
}

const LsmOptionsSchema = z.object({
  nsteps: z.number().int().positive(),
  npaths: z.number().int().positive(),
  seed: z.number().int().default(DEFAULT_LSM_SEED),
  deg: z.coerce.number().int().nonnegative().catch(DEFAULT_LSM_DEG),
  itmOnly: z.boolean().default(false),
  keepHist: z.boolean().default(false),
});

function simulatePaths(
  S0: number,
  drift: number,
  diffusion: number,
  nsteps: number,
  npaths: number,
  rng: SeededRandom
): Float64Array[] {
  const S: Float64Array[] = [new Float64Array(npaths).fill(S0)];
  const logRet = new Float64Array(npaths);
  for (let t = 1; t <= nsteps; t++) {
    const row = new Float64Array(npaths);
    for (let p = 0; p < npaths; p++) {
      logRet[p] += rng.normal(drift, diffusion);
      row[p] = S0 * Math.exp(logRet[p]);
    }
    S.push(row);
  }
  return S;
}

/**
 * Continuation estimate at one step.
 *
 * With itmOnly, out-of-the-money paths get +Infinity, and a step with `deg`
 * or fewer distinct in-the-money spots is skipped (null, one warning): no
 * path exercises there. The unfiltered fit has no such escape; a singular
 * regression raises NumericalError.
 */
function continuation(
  spots: Float64Array,
  discounted: Float64Array,
  payout: Float64Array,
  deg: number,
  itmOnly: boolean,
  log: Logger
): Float64Array | null {
  if (!itmOnly) {
    return Fit.polyvalMany(Fit.polyfit(spots, discounted, deg), spots);
  }

  const xs: number[] = [];
  const ys: number[] = [];
  for (let p = 0; p < spots.length; p++) {
    if (payout[p] > 0) {
      xs.push(spots[p]);
      ys.push(discounted[p]);
    }
  }
  if (Fit.distinctCount(xs) <= deg) {
    log.warnOnce("lsm.itm-sparse", `fewer than ${deg + 1} in-the-money spots at a step; no exercise there`);
    return null;
  }

  const model = Fit.polyfit(xs, ys, deg);
  const C = new Float64Array(spots.length).fill(Infinity);
  for (let p = 0; p < spots.length; p++) {
    if (payout[p] > 0) C[p] = Fit.polyval(model, spots[p]);
  }
  return C;
}

/**
 * American quanto option by least-squares Monte Carlo.
 *
 * Paths follow GBM under the foreign measure with the quanto-adjusted yield
 * and are discounted at the foreign rate. Backward induction regresses the
 * discounted next-step value on spot and exercises where payout beats the
 * fitted continuation value.
 */
export function priceQuantoLsm(
  contract: QuantoContract,
  opts: QuantoLsmOptions
): PriceResult<LsmDiagnostics> {
  const c = validateQuanto(contract);
  const { nsteps, npaths, seed, deg, itmOnly, keepHist } = parseWith(LsmOptionsSchema, opts, "monte carlo options");
  const { signal } = opts;
  const log = opts.logger ?? silentLogger;
  signal?.throwIfAborted();

  const { spot: S0, vol } = c.ref;
  const dt = c.T / nsteps;
  const df = Math.exp(-c.foreignRate * dt);
  const signCP = c.right === "call" ? 1 : -1;
  const qAdj = quantoDividendYield({
    correlation: c.correlation,
    vol,
    fxVol: c.fxVol,
    rate: c.rate,
    q: c.ref.q,
    foreignRate: c.foreignRate,
  });

  const rng = new SeededRandom(seed);
  const S = simulatePaths(S0, (c.foreignRate - qAdj - 0.5 * vol * vol) * dt, vol * Math.sqrt(dt), nsteps, npaths, rng);

  const payout = S.map((row) => row.map((s) => Math.max(signCP * (s - c.K), 0)));
  const v = payout.map((row) => Float64Array.from(row));

  const discounted = new Float64Array(npaths);
  for (let t = nsteps - 1; t >= 1; t--) {
    signal?.throwIfAborted();
    const next = v[t + 1];
    for (let p = 0; p < npaths; p++) discounted[p] = next[p] * df;

    const C = continuation(S[t], discounted, payout[t], deg, itmOnly, log);
    const row = v[t];
    const pay = payout[t];
    for (let p = 0; p < npaths; p++) {
      row[p] = C !== null && pay[p] > C[p] ? pay[p] : discounted[p];
    }
  }
  for (let p = 0; p < npaths; p++) v[0][p] = v[1][p] * df;

  const px = assertFinite(mean(v[0]), "lsm.px");
  log.debug(`px=${px} nsteps=${nsteps} npaths=${npaths} deg=${deg} seed=${seed}`);

  const diagnostics: LsmDiagnostics = { qAdj };
  if (keepHist) {
    diagnostics.paths = S;
    diagnostics.values = v;
  }

  return {
    px,
    method: "MC",
    subMethod: itmOnly ? "LSM, in-the-money regression" : "LSM",
    params: {
      keepHist,
      nsteps,
      npaths,
      deg,
      seed,
      itmOnly,
      fxVol: c.fxVol,
      correlation: c.correlation,
    },
    diagnostics,
  };
}
