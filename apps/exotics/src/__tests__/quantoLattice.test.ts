import { describe, it, expect } from "vitest";
import { ValidationError } from "core-types";
import { priceQuantoLattice } from "../pricing/quantoLattice";
import { priceQuantoAnalytic } from "../pricing/quantoAnalytic";
import { hull305, hull309b } from "./fixtures";

describe("priceQuantoLattice", () => {
  it("prices Hull 30.5 with the quanto correction", () => {
    const res = priceQuantoLattice(hull305, { nsteps: 100 });
    expect(res.px).toBeCloseTo(179.82607364328157, 6);
    expect(res.method).toBe("LT");
    expect(res.subMethod).toBe("binomial tree; Hull Ch.13");
    expect(res.diagnostics?.qAdj).toBeCloseTo(0.029, 14);
    expect(res.params).toEqual({ keepHist: false, nsteps: 100, fxVol: 0.12, correlation: 0.2 });
  });

  it("prices Hull 30.5 with no fx risk", () => {
    const res = priceQuantoLattice({ ...hull305, fxVol: 0, correlation: 0 }, { nsteps: 100 });
    expect(res.px).toBeCloseTo(172.20505562521683, 6);
    expect(res.diagnostics?.lattice.a).toBeCloseTo(1.0003000450045003, 14);
    expect(res.diagnostics?.lattice.p).toBeCloseTo(0.49540447909174495, 12);
  });

  it("prices Hull 30.9(b)", () => {
    expect(priceQuantoLattice(hull309b, { nsteps: 100 }).px).toBeCloseTo(57.50700503047851, 6);
  });

  it("does not depend on history retention", () => {
    for (const contract of [hull305, { ...hull305, fxVol: 0, correlation: 0 }]) {
      const plain = priceQuantoLattice(contract, { nsteps: 100, keepHist: false });
      const hist = priceQuantoLattice(contract, { nsteps: 100, keepHist: true });
      expect(hist.px).toBe(plain.px);
      expect(plain.diagnostics?.refTree).toBeUndefined();
      expect(hist.diagnostics?.refTree?.[100]).toHaveLength(101);
    }
  });

  it("is worth at least the European quanto", () => {
    const put = { ...hull305, right: "put" as const };
    const american = priceQuantoLattice(put, { nsteps: 200 }).px;
    expect(american).toBeGreaterThan(priceQuantoAnalytic(put).px);
  });

  it("validates before building the tree", () => {
    expect(() => priceQuantoLattice({ ...hull305, fxVol: -0.1 }, { nsteps: 100 })).toThrow(ValidationError);
    expect(() => priceQuantoLattice(hull305, { nsteps: 0 })).toThrow(ValidationError);
  });
});
