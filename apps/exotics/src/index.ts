export { quantoDividendYield } from "./pricing/quantoAdjust";
export type { QuantoAdjustInputs } from "./pricing/quantoAdjust";
export { priceForwardStartAnalytic } from "./pricing/forwardStart";
export { priceQuantoAnalytic } from "./pricing/quantoAnalytic";
export { priceQuantoLattice } from "./pricing/quantoLattice";
export type { LatticeDiagnostics, QuantoLatticeOptions } from "./pricing/quantoLattice";
export { priceQuantoLsm, DEFAULT_LSM_DEG, DEFAULT_LSM_SEED } from "./pricing/quantoLsm";
export type { LsmDiagnostics, QuantoLsmOptions } from "./pricing/quantoLsm";
export { priceOption, parseMethod, supportedMethods } from "./pricing/dispatch";
export type { AnyPriceResult, PriceOptions } from "./pricing/dispatch";
export { loadConfig, parseConfig, resetConfigCache } from "./config/configManager";
export type { AppConfig, LogLevel } from "./config/schema";
export { createLogger } from "./logging/logger";
export type { Logger } from "./logging/logger";
export * from "core-types";
