import { systemUsesFuel } from "./emissionFactors";
import { kw, type EnergyPrices, type Kilowatts } from "./siteModel";

export const MIN_ESTIMATED_DEMAND_KW = 10;
export const FALLBACK_DEMAND_KW = 100;

export interface DemandEstimateInput {
  /** £ per year spent on the existing heat supply. */
  annualEnergySpend: number;
  unitPricePerMwh: number;
  existingSystemEfficiency: number;
  operatingHours: number;
}

export type DemandSource = "input" | "spend-estimate";

export interface ResolvedDemand {
  processHeatKw: Kilowatts;
  source: DemandSource;
}

/**
 * Average process heat demand implied by the yearly energy bill: purchased
 * MWh times conversion efficiency, spread over the operating hours.
 */
export const estimateProcessHeatDemand = (input: DemandEstimateInput): Kilowatts => {
  if (!(input.unitPricePerMwh > 0) || !(input.operatingHours > 0)) {
    return kw(FALLBACK_DEMAND_KW);
  }
  const purchasedMwh = input.annualEnergySpend / input.unitPricePerMwh;
  const usefulMwh = purchasedMwh * input.existingSystemEfficiency;
  const demandKw = (usefulMwh * 1000) / input.operatingHours;
  return kw(Number.isFinite(demandKw) ? Math.max(MIN_ESTIMATED_DEMAND_KW, demandKw) : FALLBACK_DEMAND_KW);
};

export const baselineUnitPrice = (prices: EnergyPrices): number =>
  systemUsesFuel(prices.existingSystem) ? prices.fuelPricePerMwh : prices.electricityPricePerMwh;

/** A demand the user typed in wins over the spend-based estimate. */
export const resolveProcessHeatDemand = (
  supplied: number | undefined,
  annualEnergySpend: number,
  prices: EnergyPrices,
  operatingHours: number,
): ResolvedDemand => {
  if (supplied !== undefined) {
    return { processHeatKw: kw(supplied), source: "input" };
  }
  return {
    processHeatKw: estimateProcessHeatDemand({
      annualEnergySpend,
      unitPricePerMwh: baselineUnitPrice(prices),
      existingSystemEfficiency: prices.existingSystemEfficiency,
      operatingHours,
    }),
    source: "spend-estimate",
  };
};
