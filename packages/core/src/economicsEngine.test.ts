import { describe, expect, it } from "vitest";
import { computeEconomics, capexFor } from "./economicsEngine";
import { computePerformance } from "./performanceModel";
import {
  DEFAULT_INVESTMENT_ASSUMPTIONS,
  celsius,
  gbp,
  kw,
  type EnergyPrices,
  type SiteInputs,
} from "./siteModel";

const site: SiteInputs = {
  processTempC: celsius(150),
  energyVector: "Steam",
  targetSupplyTempC: celsius(150),
  steamPressureBarA: 5,
  productionDays: 250,
  productionHoursPerDay: 12,
};

const gasBoiler: EnergyPrices = {
  existingSystem: "Fossil fuel boiler",
  fuelType: "Natural gas",
  fuelPricePerMwh: gbp(30),
  electricityPricePerMwh: gbp(90),
  existingSystemEfficiency: 0.8,
};

const performanceFor = (processHeatKw: number, wasteInletTempC = 100) =>
  computePerformance(
    {
      wasteInletTempC: celsius(wasteInletTempC),
      supplyTempC: celsius(150),
      processHeatKw: kw(processHeatKw),
    },
    { wasteHeatMinPct: 30, wasteHeatMaxPct: 50 },
  );

describe("computeEconomics", () => {
  const result = computeEconomics(
    performanceFor(1000),
    site,
    gasBoiler,
    DEFAULT_INVESTMENT_ASSUMPTIONS,
    { wasteInletTempC: celsius(100), wasteHeatKw: kw(1000), wasteMedium: "HotWater" },
  );

  it("balances annual energy and cost against the gas boiler", () => {
    expect(result.operatingHours).toBe(3000);
    expect(result.usefulHeatMwh).toBe(3000);
    expect(result.baselineInputMwh).toBe(3750);
    expect(result.heatPumpInputMwh).toBeCloseTo(745.66002563206, 6);
    expect(result.baselineUnitPrice).toBe(30);
    expect(result.costCurrent).toBe(112500);
    expect(result.costHeatPump).toBeCloseTo(67109.4023068857, 6);
  });

  it("reports CO2 from the fuel factor and grid electricity", () => {
    expect(result.co2Current).toBeCloseTo(760.125, 6);
    expect(result.co2HeatPump).toBeCloseTo(37.28300128160317, 6);
    expect(result.co2Savings).toBeCloseTo(722.8419987183968, 6);
  });

  it("sizes and prices the high case at full demand", () => {
    const { high } = result;
    expect(high.hpSizeKw).toBe(1000);
    expect(high.hrSizeKw).toBe(660);
    expect(high.capex).toBe(399600);
    expect(high.annualSavings).toBeCloseTo(45390.5976931143, 6);
    expect(high.simplePaybackYears).toBeCloseTo(8.803585330638178, 8);
    expect(high.irrPct).toBeCloseTo(2.38657111070123, 6);
    expect(high.breakevenYear).toBe(9);
    expect(high.cashFlow).toHaveLength(11);
    expect(high.cumulativeCashFlow[0]).toBe(-399600);
    expect(high.cumulativeCashFlow[8]).toBeCloseTo(-36475.218, 2);
    expect(high.cumulativeCashFlow[9]).toBeCloseTo(8915.379, 2);
    expect(high.netPositionYear10).toBeCloseTo(54305.976931143, 5);
    expect(high.tenYearRoiPct).toBeCloseTo(113.59008431710285, 8);
  });

  it("halves the heat pump and keeps 15% of savings in the low case", () => {
    const { low } = result;
    expect(low.hpSizeKw).toBe(500);
    expect(low.hrSizeKw).toBe(330);
    expect(low.capex).toBe(249800);
    expect(low.annualSavings).toBeCloseTo(6808.589653967144, 6);
    expect(low.simplePaybackYears).toBeCloseTo(36.68894920909937, 8);
    expect(low.irrPct).toBeCloseTo(0, 10);
    expect(low.breakevenYear).toBeNull();
    expect(low.netPositionYear10).toBeCloseTo(-181714.10346032857, 5);
  });

  it("traces inputs, fixed constants and gate assumptions", () => {
    const byName = new Map(result.assumptionTrace.map((item) => [item.name, item]));

    expect(byName.get("processHeatKw")).toEqual({
      name: "processHeatKw",
      category: "operational",
      unit: "kW",
      value: 1000,
      source: "input",
    });
    expect(byName.get("heatRecoveryRatio")?.value).toBe(0.66);
    expect(byName.get("heatRecoveryRatio")?.source).toBe("core-default");
    expect(byName.get("fuelEmissionFactor")?.value).toBe(0.2027);
    expect(byName.get("wasteInletTempC")?.source).toBe("gate");
    expect(byName.get("wasteHeatKw")?.value).toBe(1000);
    expect(byName.has("wastePercent")).toBe(false);
    expect(result.belowRecommendedSize).toBe(false);
  });

  it("uses the electricity price and factor for an electric boiler and flags small sites", () => {
    const electric = computeEconomics(
      performanceFor(200),
      site,
      { ...gasBoiler, existingSystem: "Electric boiler", existingSystemEfficiency: 0.95 },
      DEFAULT_INVESTMENT_ASSUMPTIONS,
    );

    expect(electric.belowRecommendedSize).toBe(true);
    expect(electric.baselineUnitPrice).toBe(90);
    expect(electric.co2Current).toBeCloseTo(31.578947368, 6);
    expect(electric.high.hpSizeKw).toBe(250);
    expect(electric.low.hpSizeKw).toBe(250);
    expect(electric.high.capex).toBe(174900);
    expect(electric.assumptionTrace.some((item) => item.name === "fuelEmissionFactor")).toBe(
      false,
    );
  });

  it("floors savings at zero when electricity is too expensive", () => {
    const pricey = computeEconomics(
      performanceFor(1000),
      site,
      { ...gasBoiler, electricityPricePerMwh: gbp(1000) },
      DEFAULT_INVESTMENT_ASSUMPTIONS,
    );

    expect(pricey.high.annualSavings).toBe(0);
    expect(pricey.high.simplePaybackYears).toBe(Number.POSITIVE_INFINITY);
    expect(pricey.high.irrPct).toBe(0);
    expect(pricey.high.breakevenYear).toBeNull();
    expect(pricey.low.annualSavings).toBe(0);
  });

  it("marks emission factors as request values when overridden", () => {
    const overridden = computeEconomics(
      performanceFor(1000),
      site,
      gasBoiler,
      DEFAULT_INVESTMENT_ASSUMPTIONS,
      {},
      { electricityKgPerMwh: 100 },
    );

    expect(overridden.co2HeatPump).toBeCloseTo(74.56600256320634, 6);
    expect(
      overridden.assumptionTrace.find((item) => item.name === "electricityEmissionFactor"),
    ).toMatchObject({ value: 100, source: "input" });
  });

  it("refuses to run without a positive COP", () => {
    expect(() =>
      computeEconomics(performanceFor(1000, 170), site, gasBoiler, DEFAULT_INVESTMENT_ASSUMPTIONS),
    ).toThrow("copReal must be > 0");
  });

  it("rejects out-of-range efficiencies and negative costs", () => {
    expect(() =>
      computeEconomics(
        performanceFor(1000),
        site,
        { ...gasBoiler, existingSystemEfficiency: 0 },
        DEFAULT_INVESTMENT_ASSUMPTIONS,
      ),
    ).toThrow("existingSystemEfficiency must be between 0 and 1");
    expect(() =>
      computeEconomics(performanceFor(1000), site, gasBoiler, {
        ...DEFAULT_INVESTMENT_ASSUMPTIONS,
        hpCostPerKw: gbp(-1),
      }),
    ).toThrow("hpCostPerKw must be >= 0");
  });
});

describe("capexFor", () => {
  it("adds fixed costs to per-kW equipment and installation", () => {
    expect(capexFor(1000, 660, DEFAULT_INVESTMENT_ASSUMPTIONS)).toBe(399600);
  });
});
