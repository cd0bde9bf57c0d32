import {
  DEFAULT_EMISSION_FACTORS,
  computeEmissions,
  systemUsesFuel,
  type EmissionFactors,
} from "./emissionFactors";
import { type GateAssumptions } from "./feasibilityGate";
import {
  breakevenYear,
  cashFlowSeries,
  horizonRoiPct,
  irrFromSavings,
  simplePayback,
} from "./investmentEvaluator";
import { type PerformanceResult } from "./performanceModel";
import { baselineUnitPrice } from "./processDemand";
import {
  gbp,
  kw,
  mwh,
  operatingHours,
  type EnergyPrices,
  type GBP,
  type InvestmentAssumptions,
  type Kilowatts,
  type MegawattHours,
  type SiteInputs,
  type TonnesCO2,
} from "./siteModel";

/** Smallest heat pump quoted; smaller demands are rounded up to this size. */
export const MIN_HEAT_PUMP_SIZE_KW = 250;
export const HEAT_RECOVERY_RATIO = 0.66;
export const LOW_CASE_SAVINGS_FRACTION = 0.15;

export type AssumptionCategory = "operational" | "thermal" | "financial" | "environmental";

export type AssumptionSource = "input" | "gate" | "core-default";

export interface AssumptionTraceItem {
  name:
    | "processHeatKw"
    | "operatingHours"
    | "existingSystemEfficiency"
    | "baselineEnergyPricePerMwh"
    | "electricityPricePerMwh"
    | "electricityEmissionFactor"
    | "fuelEmissionFactor"
    | "designAndPm"
    | "fixedInstall"
    | "hpCostPerKw"
    | "hrCostPerKw"
    | "varInstallPerKw"
    | "minHeatPumpSizeKw"
    | "heatRecoveryRatio"
    | "lowCaseSavingsFraction"
    | "wasteInletTempC"
    | "wasteHeatKw"
    | "wastePercent";
  category: AssumptionCategory;
  unit: string;
  value: number;
  source: AssumptionSource;
}

export interface EconomicCase {
  hpSizeKw: Kilowatts;
  hrSizeKw: Kilowatts;
  capex: GBP;
  annualSavings: GBP;
  /** +Infinity when the case saves nothing. */
  simplePaybackYears: number;
  irrPct: number;
  cashFlow: number[];
  cumulativeCashFlow: number[];
  breakevenYear: number | null;
  netPositionYear10: GBP;
  tenYearRoiPct: number;
}

export interface EconomicsResult {
  operatingHours: number;
  usefulHeatMwh: MegawattHours;
  baselineInputMwh: MegawattHours;
  heatPumpInputMwh: MegawattHours;
  baselineUnitPrice: GBP;
  costCurrent: GBP;
  costHeatPump: GBP;
  co2Current: TonnesCO2;
  co2HeatPump: TonnesCO2;
  co2Savings: TonnesCO2;
  high: EconomicCase;
  low: EconomicCase;
  belowRecommendedSize: boolean;
  assumptionTrace: readonly AssumptionTraceItem[];
}

const validatePositive = (value: number, name: string): void => {
  if (!(value > 0)) {
    throw new Error(`${name} must be > 0`);
  }
};

const validateNonNegative = (value: number, name: string): void => {
  if (!(value >= 0)) {
    throw new Error(`${name} must be >= 0`);
  }
};

const validatePrices = (prices: EnergyPrices): void => {
  validateNonNegative(prices.fuelPricePerMwh, "fuelPricePerMwh");
  validateNonNegative(prices.electricityPricePerMwh, "electricityPricePerMwh");
  if (!(prices.existingSystemEfficiency > 0 && prices.existingSystemEfficiency <= 1)) {
    throw new Error("existingSystemEfficiency must be between 0 and 1");
  }
};

const validateInvestment = (investment: InvestmentAssumptions): void => {
  validateNonNegative(investment.designAndPm, "designAndPm");
  validateNonNegative(investment.fixedInstall, "fixedInstall");
  validateNonNegative(investment.hpCostPerKw, "hpCostPerKw");
  validateNonNegative(investment.hrCostPerKw, "hrCostPerKw");
  validateNonNegative(investment.varInstallPerKw, "varInstallPerKw");
};

export const capexFor = (
  hpKw: number,
  hrKw: number,
  investment: InvestmentAssumptions,
): GBP => {
  const variableCost =
    hpKw * investment.hpCostPerKw +
    hrKw * investment.hrCostPerKw +
    (hpKw + hrKw) * investment.varInstallPerKw;
  return gbp(investment.designAndPm + investment.fixedInstall + variableCost);
};

const buildCase = (
  hpKw: number,
  annualSavings: number,
  investment: InvestmentAssumptions,
): EconomicCase => {
  const hrKw = HEAT_RECOVERY_RATIO * hpKw;
  const capex = capexFor(hpKw, hrKw, investment);
  const { cashFlows, cumulativeCashFlow } = cashFlowSeries(capex, annualSavings);

  return {
    hpSizeKw: kw(hpKw),
    hrSizeKw: kw(hrKw),
    capex,
    annualSavings: gbp(annualSavings),
    simplePaybackYears: simplePayback(capex, annualSavings),
    irrPct: irrFromSavings(capex, annualSavings),
    cashFlow: cashFlows,
    cumulativeCashFlow,
    breakevenYear: breakevenYear(cumulativeCashFlow),
    netPositionYear10: gbp(cumulativeCashFlow[cumulativeCashFlow.length - 1]),
    tenYearRoiPct: horizonRoiPct(capex, cumulativeCashFlow),
  };
};

const traceGateAssumptions = (gate: Readonly<GateAssumptions>): AssumptionTraceItem[] => {
  const items: AssumptionTraceItem[] = [];
  if (gate.wasteInletTempC !== undefined) {
    items.push({
      name: "wasteInletTempC",
      category: "thermal",
      unit: "°C",
      value: gate.wasteInletTempC,
      source: "gate",
    });
  }
  if (gate.wasteHeatKw !== undefined) {
    items.push({
      name: "wasteHeatKw",
      category: "thermal",
      unit: "kW",
      value: gate.wasteHeatKw,
      source: "gate",
    });
  }
  if (gate.wastePercent !== undefined) {
    items.push({
      name: "wastePercent",
      category: "thermal",
      unit: "% of energy input",
      value: gate.wastePercent,
      source: "gate",
    });
  }
  return items;
};

const traceAssumptions = (
  processHeatKw: number,
  hours: number,
  prices: EnergyPrices,
  unitPrice: number,
  investment: InvestmentAssumptions,
  factors: EmissionFactors,
  factorSource: AssumptionSource,
  gate: Readonly<GateAssumptions>,
): AssumptionTraceItem[] => [
  { name: "processHeatKw", category: "operational", unit: "kW", value: processHeatKw, source: "input" },
  { name: "operatingHours", category: "operational", unit: "hours/year", value: hours, source: "input" },
  {
    name: "existingSystemEfficiency",
    category: "operational",
    unit: "fraction",
    value: prices.existingSystemEfficiency,
    source: "input",
  },
  {
    name: "baselineEnergyPricePerMwh",
    category: "financial",
    unit: "GBP/MWh",
    value: unitPrice,
    source: "input",
  },
  {
    name: "electricityPricePerMwh",
    category: "financial",
    unit: "GBP/MWh",
    value: prices.electricityPricePerMwh,
    source: "input",
  },
  { name: "designAndPm", category: "financial", unit: "GBP", value: investment.designAndPm, source: "input" },
  { name: "fixedInstall", category: "financial", unit: "GBP", value: investment.fixedInstall, source: "input" },
  { name: "hpCostPerKw", category: "financial", unit: "GBP/kW", value: investment.hpCostPerKw, source: "input" },
  { name: "hrCostPerKw", category: "financial", unit: "GBP/kW", value: investment.hrCostPerKw, source: "input" },
  {
    name: "varInstallPerKw",
    category: "financial",
    unit: "GBP/kW",
    value: investment.varInstallPerKw,
    source: "input",
  },
  {
    name: "minHeatPumpSizeKw",
    category: "operational",
    unit: "kW",
    value: MIN_HEAT_PUMP_SIZE_KW,
    source: "core-default",
  },
  {
    name: "heatRecoveryRatio",
    category: "operational",
    unit: "fraction of heat pump size",
    value: HEAT_RECOVERY_RATIO,
    source: "core-default",
  },
  {
    name: "lowCaseSavingsFraction",
    category: "financial",
    unit: "fraction of high-case savings",
    value: LOW_CASE_SAVINGS_FRACTION,
    source: "core-default",
  },
  {
    name: "electricityEmissionFactor",
    category: "environmental",
    unit: "kgCO2/MWh",
    value: factors.electricityKgPerMwh,
    source: factorSource,
  },
  ...(systemUsesFuel(prices.existingSystem)
    ? [
        {
          name: "fuelEmissionFactor",
          category: "environmental",
          unit: "kgCO2/kWh",
          value: factors.fuelKgPerKwh[prices.fuelType],
          source: factorSource,
        } satisfies AssumptionTraceItem,
      ]
    : []),
  ...traceGateAssumptions(gate),
];

/**
 * Annual energy, cost and CO2 balance of replacing the existing heat supply
 * with a heat pump, plus the high and low investment cases over ten years.
 * The high case sizes the heat pump to the full process demand; the low case
 * halves it and keeps a fixed share of the high-case savings.
 */
export const computeEconomics = (
  performance: PerformanceResult,
  site: Pick<SiteInputs, "productionDays" | "productionHoursPerDay">,
  prices: EnergyPrices,
  investment: InvestmentAssumptions,
  gateAssumptions: Readonly<GateAssumptions> = {},
  factorOverrides?: Partial<EmissionFactors>,
): EconomicsResult => {
  validatePositive(performance.copReal, "copReal");
  validatePositive(performance.processHeatKw, "processHeatKw");
  validatePrices(prices);
  validateInvestment(investment);

  const factors: EmissionFactors = { ...DEFAULT_EMISSION_FACTORS, ...factorOverrides };
  const hours = operatingHours(site);
  const processHeatKw = performance.processHeatKw;

  const usefulHeatMwh = (processHeatKw * hours) / 1000;
  const heatPumpInputMwh = usefulHeatMwh / performance.copReal;
  const baselineInputMwh = usefulHeatMwh / prices.existingSystemEfficiency;

  const unitPrice = baselineUnitPrice(prices);
  const costCurrent = baselineInputMwh * unitPrice;
  const costHeatPump = heatPumpInputMwh * prices.electricityPricePerMwh;

  const emissions = computeEmissions(
    {
      existingSystem: prices.existingSystem,
      fuelType: prices.fuelType,
      baselineInputMwh: mwh(baselineInputMwh),
      heatPumpInputMwh: mwh(heatPumpInputMwh),
    },
    factors,
  );

  const hpSizeHighKw = Math.max(MIN_HEAT_PUMP_SIZE_KW, performance.capacityMWth * 1000);
  const hpSizeLowKw = Math.max(MIN_HEAT_PUMP_SIZE_KW, hpSizeHighKw / 2);
  const savingsHigh = Math.max(costCurrent - costHeatPump, 0);
  const savingsLow = Math.max(LOW_CASE_SAVINGS_FRACTION * savingsHigh, 0);

  return {
    operatingHours: hours,
    usefulHeatMwh: mwh(usefulHeatMwh),
    baselineInputMwh: mwh(baselineInputMwh),
    heatPumpInputMwh: mwh(heatPumpInputMwh),
    baselineUnitPrice: gbp(unitPrice),
    costCurrent: gbp(costCurrent),
    costHeatPump: gbp(costHeatPump),
    ...emissions,
    high: buildCase(hpSizeHighKw, savingsHigh, investment),
    low: buildCase(hpSizeLowKw, savingsLow, investment),
    belowRecommendedSize: processHeatKw < MIN_HEAT_PUMP_SIZE_KW,
    assumptionTrace: traceAssumptions(
      processHeatKw,
      hours,
      prices,
      unitPrice,
      investment,
      factors,
      factorOverrides ? "input" : "core-default",
      gateAssumptions,
    ),
  };
};
