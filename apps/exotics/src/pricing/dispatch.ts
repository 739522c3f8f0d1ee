import {
  PRICING_METHODS,
  UnsupportedMethodError,
  type ContractKind,
  type ExoticContract,
  type ForwardStartContract,
  type PriceResult,
  type PricingMethod,
  type QuantoContract,
} from "core-types";
import { loadConfig } from "../config/configManager";
import type { AppConfig } from "../config/schema";
import { createLogger, type Logger } from "../logging/logger";
import { priceForwardStartAnalytic } from "./forwardStart";
import { priceQuantoAnalytic } from "./quantoAnalytic";
import { priceQuantoLattice, type LatticeDiagnostics } from "./quantoLattice";
import { priceQuantoLsm, type LsmDiagnostics } from "./quantoLsm";

/** Knobs accepted by priceOption; each pricer reads the ones it needs. */
export interface PriceOptions {
  nsteps?: number;
  npaths?: number;
  seed?: number;
  deg?: number | string;
  itmOnly?: boolean;
  keepHist?: boolean;
  signal?: AbortSignal;
}

export type AnyPriceResult = PriceResult<LatticeDiagnostics | LsmDiagnostics | undefined>;

type Pricer<C> = (contract: C, opts: PriceOptions, cfg: AppConfig, log: Logger) => AnyPriceResult;

/** null marks a method that has no implementation for the option kind. */
type MethodTable<C> = Record<PricingMethod, Pricer<C> | null>;

const FORWARD_START: MethodTable<ForwardStartContract> = {
  BS: (contract) => priceForwardStartAnalytic(contract),
  LT: null,
  MC: null,
  FD: null,
};

const QUANTO: MethodTable<QuantoContract> = {
  BS: (contract) => priceQuantoAnalytic(contract),
  LT: (contract, opts, cfg) =>
    priceQuantoLattice(contract, {
      nsteps: opts.nsteps ?? cfg.defaults.lattice.nsteps,
      keepHist: opts.keepHist,
    }),
  MC: (contract, opts, cfg, log) => {
    const mc = cfg.defaults.monteCarlo;
    return priceQuantoLsm(contract, {
      nsteps: opts.nsteps ?? mc.nsteps,
      npaths: opts.npaths ?? mc.npaths,
      seed: opts.seed ?? mc.seed,
      deg: opts.deg ?? mc.deg,
      itmOnly: opts.itmOnly ?? mc.itmOnly,
      keepHist: opts.keepHist,
      signal: opts.signal,
      logger: log,
    });
  },
  FD: null,
};

export function parseMethod(kind: ContractKind, method: string): PricingMethod {
  const upper = method.toUpperCase();
  const found = PRICING_METHODS.find((m) => m === upper);
  if (!found) throw new UnsupportedMethodError(kind, method);
  return found;
}

function lookup<C>(table: MethodTable<C>, kind: ContractKind, method: string): Pricer<C> {
  const pricer = table[parseMethod(kind, method)];
  if (!pricer) throw new UnsupportedMethodError(kind, method);
  return pricer;
}

export function supportedMethods(kind: ContractKind): PricingMethod[] {
  const table = kind === "forwardStart" ? FORWARD_START : QUANTO;
  return PRICING_METHODS.filter((m) => table[m] !== null);
}

function run(contract: ExoticContract, method: string, opts: PriceOptions, cfg: AppConfig, log: Logger): AnyPriceResult {
  switch (contract.kind) {
    case "forwardStart":
      return lookup(FORWARD_START, contract.kind, method)(contract, opts, cfg, log);
    case "quanto":
      return lookup(QUANTO, contract.kind, method)(contract, opts, cfg, log);
    default: {
      const exhaustive: never = contract;
      return exhaustive;
    }
  }
}

/**
 * Price a forward-start or quanto contract with the named method.
 * Unknown or unimplemented methods fail before any validation or simulation.
 */
export function priceOption(
  contract: ExoticContract,
  method: PricingMethod | string,
  opts: PriceOptions = {},
  cfg: AppConfig = loadConfig()
): AnyPriceResult {
  const log = createLogger("pricer", cfg.logging.level);
  const result = run(contract, method, opts, cfg, log);
  log.debug(`${contract.kind} ${result.method} px=${result.px}`);
  return result;
}
