import { describe, it, expect } from "vitest";
import { NumericalError, ValidationError } from "core-types";
import { blackScholesPrice } from "num-core";
import { priceAmerican, latticeParams, type AmericanSpec } from "../src/index";

// Hull ex. 30.5 after the quanto yield substitution with zero fx vol
const spec: AmericanSpec = {
  ref: { spot: 1200, vol: 0.25, q: 0.035 },
  right: "call",
  K: 1200,
  T: 2,
  rate: 0.05,
};

describe("latticeParams", () => {
  it("uses CRR up/down factors and the yield-adjusted growth", () => {
    const p = latticeParams(spec, 100);
    expect(p.dt).toBe(0.02);
    expect(p.u).toBeCloseTo(1.0359877703222138, 14);
    expect(p.d).toBeCloseTo(0.965262359891545, 14);
    expect(p.a).toBeCloseTo(1.0003000450045003, 14);
    expect(p.p).toBeCloseTo(0.49540447909174495, 12);
    expect(p.dfDt).toBeCloseTo(0.999000499833375, 14);
    expect(p.dfT).toBeCloseTo(0.9048374180359595, 14);
  });

  it("rejects a lattice whose up probability leaves [0, 1]", () => {
    expect(() => latticeParams({ ...spec, ref: { spot: 1200, vol: 0.001, q: 0 } }, 2)).toThrow(NumericalError);
  });
});

describe("priceAmerican", () => {
  it("prices the reference call", () => {
    const out = priceAmerican(spec, { method: "binomial", nsteps: 100, keepHist: false });
    expect(out.px).toBeCloseTo(172.20505562521683, 6);
    expect(out.subMethod).toBe("binomial tree; Hull Ch.13");
    expect(out.refTree).toBeUndefined();
  });

  it("keeps trees on request without changing the price", () => {
    const plain = priceAmerican(spec, { method: "binomial", nsteps: 100, keepHist: false });
    const hist = priceAmerican(spec, { method: "binomial", nsteps: 100, keepHist: true });
    expect(hist.px).toBe(plain.px);
    expect(hist.refTree).toHaveLength(101);
    expect(hist.refTree?.[0][0]).toBeCloseTo(1200, 9);
    expect(hist.refTree?.[1][0]).toBeCloseTo(1158.3148318698472, 9);
    expect(hist.refTree?.[1][1]).toBeCloseTo(1243.1853243866492, 9);
    expect(hist.optTree?.[0]).toEqual([hist.px]);
    expect(hist.optTree?.[100]).toHaveLength(101);
  });

  it("is never below the European value", () => {
    const put: AmericanSpec = { ...spec, right: "put" };
    const american = priceAmerican(put, { method: "binomial", nsteps: 200, keepHist: false }).px;
    const european = blackScholesPrice({ spot: 1200, strike: 1200, vol: 0.25, T: 2, r: 0.05, q: 0.035, right: "put" });
    expect(american).toBeGreaterThan(european);
  });

  it("values a one-step tree by hand", () => {
    const one: AmericanSpec = { ref: { spot: 100, vol: 0.2, q: 0 }, right: "put", K: 100, T: 1, rate: 0.05 };
    const { u, d, p, dfDt } = latticeParams(one, 1);
    const hold = dfDt * (p * Math.max(100 - 100 * u, 0) + (1 - p) * Math.max(100 - 100 * d, 0));
    const out = priceAmerican(one, { method: "binomial", nsteps: 1, keepHist: false });
    expect(out.px).toBeCloseTo(Math.max(hold, 0), 12);
  });

  it("follows the forward path at zero vol", () => {
    const flat: AmericanSpec = { ref: { spot: 100, vol: 0, q: 0 }, right: "call", K: 90, T: 1, rate: 0.05 };
    const params = latticeParams(flat, 4);
    expect(params.p).toBe(1);
    expect(params.u).toBe(params.d);
    const call = priceAmerican(flat, { method: "binomial", nsteps: 4, keepHist: false });
    expect(call.px).toBeCloseTo(100 - 90 * Math.exp(-0.05), 10);
    const put = priceAmerican({ ...flat, right: "put", K: 110 }, { method: "binomial", nsteps: 4, keepHist: false });
    expect(put.px).toBeCloseTo(10, 12);
  });

  it("validates the step count", () => {
    expect(() => priceAmerican(spec, { method: "binomial", nsteps: 0, keepHist: false })).toThrow(ValidationError);
    expect(() => priceAmerican(spec, { method: "binomial", nsteps: 2.5, keepHist: false })).toThrow(ValidationError);
  });
});
