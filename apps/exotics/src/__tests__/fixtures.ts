import type { QuantoContract } from "core-types";

// Hull, Options Futures & Other Derivatives, ex. 30.5
export const hull305: QuantoContract = {
  kind: "quanto",
  ref: { spot: 1200, vol: 0.25, q: 0.015 },
  right: "call",
  K: 1200,
  T: 2,
  rate: 0.03,
  foreignRate: 0.05,
  fxVol: 0.12,
  correlation: 0.2,
};

// Hull problem 30.9(b)
export const hull309b: QuantoContract = {
  kind: "quanto",
  ref: { spot: 400, vol: 0.2, q: 0.03 },
  right: "call",
  K: 400,
  T: 2,
  rate: 0.06,
  foreignRate: 0.04,
  fxVol: 0.06,
  correlation: 0.4,
};
