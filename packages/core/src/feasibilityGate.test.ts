import { describe, expect, it } from "vitest";
import {
  evaluateFeasibility,
  isGateTerminal,
  parseBandUpperPercent,
} from "./feasibilityGate";
import { celsius, kw, type SiteInputs, type WasteHeatProfile } from "./siteModel";

const site: SiteInputs = {
  processTempC: celsius(150),
  energyVector: "Steam",
  targetSupplyTempC: celsius(150),
  steamPressureBarA: 5,
  productionDays: 250,
  productionHoursPerDay: 12,
};

const wasteHeat: WasteHeatProfile = {
  hasWasteHeat: true,
  howReleased: "DedicatedExhaust",
  tempKnown: true,
  tempC: celsius(100),
  amountKnown: true,
  amountKw: kw(1000),
  amountPctBand: "31–50% (average for modern processes)",
  medium: "HotWater",
  alreadyCaptured: false,
  existingRecoveryEquipment: false,
};

describe("evaluateFeasibility", () => {
  it("cautions a steam site with known waste heat and lists every note in order", () => {
    const result = evaluateFeasibility(site, wasteHeat);

    expect(result.status).toBe("Caution");
    expect(result.assumptions).toEqual({
      wasteInletTempC: 100,
      wasteHeatKw: 1000,
      wasteMedium: "HotWater",
    });
    expect(result.notes).toEqual([
      "Waste heat from a dedicated cooling system or exhaust: suitable for heat-pump integration.",
      "Using user-provided waste heat level Q_waste ≈ 1000 kW.",
      "Waste heat available as hot water: highly suitable for heat-pump integration.",
      "Waste heat not yet captured: additional pipework/ducting or a heat exchanger may be needed.",
      "No existing waste-heat processor: a heat pump could be the main technology to use that heat.",
    ]);
  });

  it("returns identical results for repeated calls", () => {
    expect(evaluateFeasibility(site, wasteHeat)).toEqual(evaluateFeasibility(site, wasteHeat));
  });

  it.each([79, 79.9, 200.1, 250])("rejects process temperature %s°C", (temp) => {
    const result = evaluateFeasibility(
      { ...site, processTempC: celsius(temp) },
      { ...wasteHeat, hasWasteHeat: false },
    );

    expect(result.status).toBe("NotViable");
    expect(result.assumptions).toEqual({});
    expect(result.notes).toHaveLength(1);
  });

  it("accepts the window edges", () => {
    expect(evaluateFeasibility({ ...site, processTempC: celsius(80) }, wasteHeat).status).toBe(
      "Caution",
    );
    expect(evaluateFeasibility({ ...site, processTempC: celsius(200) }, wasteHeat).status).toBe(
      "Caution",
    );
  });

  it("asks for steam pressure when it is missing", () => {
    const result = evaluateFeasibility({ ...site, steamPressureBarA: undefined }, wasteHeat);

    expect(result.status).toBe("Caution");
    expect(result.notes).toEqual([
      "Provide steam pressure (barA) to check heat-pump feasibility.",
    ]);
    expect(result.assumptions).toEqual({});
  });

  it("rejects steam above 10 barA and lets 10.0 barA through", () => {
    const over = evaluateFeasibility({ ...site, steamPressureBarA: 10.1 }, wasteHeat);
    expect(over.status).toBe("NotViable");
    expect(over.notes).toEqual(["Steam pressure 10.1 barA > 10 barA: heat pump not possible."]);

    const atLimit = evaluateFeasibility({ ...site, steamPressureBarA: 10 }, wasteHeat);
    expect(atLimit.status).toBe("Caution");
    expect(atLimit.assumptions.wasteInletTempC).toBe(100);
  });

  it("rejects hot air above 180°C", () => {
    const result = evaluateFeasibility(
      { ...site, energyVector: "HotAir", targetSupplyTempC: celsius(190) },
      wasteHeat,
    );

    expect(result.status).toBe("NotViable");
    expect(result.notes).toEqual([
      "Required hot-air temperature 190°C > 180°C: heat pump not possible.",
    ]);
  });

  it("treats hot air between 150 and 180°C as terminal", () => {
    const result = evaluateFeasibility(
      { ...site, energyVector: "HotAir", targetSupplyTempC: celsius(160) },
      wasteHeat,
    );

    expect(result.status).toBe("NotViable");
    expect(result.notes).toEqual([
      "Hot air >150 °C: heat pump not recommended (consider heat exchangers).",
    ]);
  });

  it("adds a high-lift note for hot air between 110 and 150°C", () => {
    const result = evaluateFeasibility(
      { ...site, energyVector: "HotAir", targetSupplyTempC: celsius(150) },
      wasteHeat,
    );

    expect(result.status).toBe("Caution");
    expect(result.notes[0]).toBe("Hot air 110-150 °C: feasible but COP may be modest (high lift).");
  });

  it("rejects hot water above 180°C but applies no limit to other vectors", () => {
    expect(
      evaluateFeasibility(
        { ...site, energyVector: "HotWater", targetSupplyTempC: celsius(181) },
        wasteHeat,
      ).status,
    ).toBe("NotViable");
    expect(
      evaluateFeasibility(
        { ...site, energyVector: "Other", targetSupplyTempC: celsius(240) },
        wasteHeat,
      ).status,
    ).toBe("Caution");
  });

  it("suggests a heat exchanger when there is no waste heat", () => {
    const result = evaluateFeasibility(site, { ...wasteHeat, hasWasteHeat: false });

    expect(result.status).toBe("SuggestHeatExchanger");
    expect(isGateTerminal(result.status)).toBe(true);
  });

  it("rejects waste heat that only leaves through general ventilation", () => {
    const result = evaluateFeasibility(site, {
      ...wasteHeat,
      howReleased: "GeneralVentilation",
    });

    expect(result.status).toBe("NotViable");
    expect(isGateTerminal(result.status)).toBe(true);
  });

  it("assumes process temperature and band percentage when values are unknown", () => {
    const result = evaluateFeasibility(site, {
      ...wasteHeat,
      howReleased: "Unknown",
      tempKnown: false,
      amountKnown: false,
      amountPctBand: "51-80% (typical for processes without any control for minimising waste heat)",
      medium: "Unknown",
      alreadyCaptured: true,
      existingRecoveryEquipment: true,
    });

    expect(result.status).toBe("Caution");
    expect(result.assumptions).toEqual({ wasteInletTempC: 150, wastePercent: 80 });
    expect(result.notes).toEqual([
      "Waste-heat temperature unknown: assuming equal to process temperature.",
      "Waste-heat amount unknown: using upper estimate ≈ 80% of energy input.",
      "Waste heat is already captured: integration may be simpler and cheaper.",
      "There is already a waste-heat processing system on site (e.g. ORC or heat-recovery unit).",
    ]);
  });

  it("falls back to the band when the known amount is not positive", () => {
    const result = evaluateFeasibility(site, { ...wasteHeat, amountKw: kw(0) });

    expect(result.assumptions.wasteHeatKw).toBeUndefined();
    expect(result.assumptions.wastePercent).toBe(50);
  });

  it("cautions instead of throwing when a temperature is missing", () => {
    const result = evaluateFeasibility({ ...site, targetSupplyTempC: celsius(Number.NaN) }, wasteHeat);

    expect(result).toEqual({
      status: "Caution",
      notes: ["Please provide all required temperature values."],
      assumptions: {},
    });
  });
});

describe("parseBandUpperPercent", () => {
  it.each([
    ["10-30% (very efficient process)", 30],
    ["31–50% (average for modern processes)", 50],
    ["51-80% (typical for processes without any control)", 80],
    ["31 – 50 % of energy input", 50],
    ["60-40%", 60],
  ])("reads %s as %s", (band, expected) => {
    expect(parseBandUpperPercent(band)).toBe(expected);
  });

  it.each(["", "about half", "50%"])("defaults %j to 50", (band) => {
    expect(parseBandUpperPercent(band)).toBe(50);
  });
});

describe("isGateTerminal", () => {
  it("only stops on not-viable and heat-exchanger outcomes", () => {
    expect(isGateTerminal("NotViable")).toBe(true);
    expect(isGateTerminal("SuggestHeatExchanger")).toBe(true);
    expect(isGateTerminal("Caution")).toBe(false);
    expect(isGateTerminal("Proceed")).toBe(false);
  });
});
