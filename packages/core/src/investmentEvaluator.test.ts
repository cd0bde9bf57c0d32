import { describe, expect, it } from "vitest";
import {
  NPV,
  breakevenYear,
  cashFlowSeries,
  horizonRoiPct,
  irrFromSavings,
  simplePayback,
} from "./investmentEvaluator";

describe("NPV", () => {
  it("computes discounted value for simple cash flows", () => {
    expect(NPV(0.1, [-100, 60, 60])).toBeCloseTo(4.13223, 5);
  });

  it("rejects discount rates at or below -100%", () => {
    expect(() => NPV(-1, [1])).toThrow("discountRate must be greater than -1");
  });
});

describe("simplePayback", () => {
  it("divides capex by savings", () => {
    expect(simplePayback(500_000, 100_000)).toBe(5);
  });

  it("is infinite without savings", () => {
    expect(simplePayback(500_000, 0)).toBe(Number.POSITIVE_INFINITY);
    expect(simplePayback(500_000, -10)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("irrFromSavings", () => {
  it("resolves a £500k project saving £100k a year to about 15.1%", () => {
    expect(irrFromSavings(500_000, 100_000)).toBeCloseTo(15.098414477112565, 6);
  });

  it("lands on a root of the NPV curve", () => {
    const capex = 399_600;
    const savings = 45_390.59769311428;
    const irr = irrFromSavings(capex, savings);
    const { cashFlows } = cashFlowSeries(capex, savings);

    expect(irr).toBeCloseTo(2.38657111070123, 6);
    expect(NPV(irr / 100, cashFlows)).toBeCloseTo(0, 4);
  });

  it("returns zero when there are no savings", () => {
    expect(irrFromSavings(100_000, 0)).toBe(0);
  });

  it("settles near zero when the project never pays back", () => {
    expect(irrFromSavings(249_800, 6_808.589653967142)).toBeCloseTo(0, 10);
  });
});

describe("cashFlowSeries", () => {
  it("builds eleven yearly values with a running total", () => {
    const { cashFlows, cumulativeCashFlow } = cashFlowSeries(500_000, 100_000);

    expect(cashFlows).toEqual([
      -500_000, 100_000, 100_000, 100_000, 100_000, 100_000, 100_000, 100_000, 100_000, 100_000,
      100_000,
    ]);
    expect(cumulativeCashFlow).toEqual([
      -500_000, -400_000, -300_000, -200_000, -100_000, 0, 100_000, 200_000, 300_000, 400_000,
      500_000,
    ]);
  });

  it("keeps year 0 at a plain zero for free installs", () => {
    expect(Object.is(cashFlowSeries(0, 10, 1).cashFlows[0], 0)).toBe(true);
  });

  it("rejects negative capex and fractional horizons", () => {
    expect(() => cashFlowSeries(-1, 10)).toThrow("capex must be >= 0");
    expect(() => cashFlowSeries(1, 10, 2.5)).toThrow("years must be a positive integer");
  });
});

describe("breakevenYear", () => {
  it("returns the first non-negative year", () => {
    expect(breakevenYear([-500_000, -400_000, -300_000, 0, 100_000])).toBe(3);
  });

  it("returns null when the total never turns", () => {
    expect(breakevenYear([-10, -9, -8])).toBeNull();
  });
});

describe("horizonRoiPct", () => {
  it("averages the final position against capex", () => {
    const { cumulativeCashFlow } = cashFlowSeries(500_000, 100_000);
    expect(horizonRoiPct(500_000, cumulativeCashFlow)).toBe(200);
  });

  it("is zero without capex", () => {
    expect(horizonRoiPct(0, [0, 10])).toBe(0);
  });
});
