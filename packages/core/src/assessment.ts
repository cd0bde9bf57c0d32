import { computeEconomics, type EconomicsResult } from "./economicsEngine";
import { type EmissionFactors } from "./emissionFactors";
import {
  evaluateFeasibility,
  isGateTerminal,
  type GateAssumptions,
  type GateResult,
} from "./feasibilityGate";
import {
  computePerformance,
  type PerformanceOptions,
  type PerformanceResult,
} from "./performanceModel";
import { resolveProcessHeatDemand, type ResolvedDemand } from "./processDemand";
import {
  celsius,
  operatingHours,
  type Celsius,
  type EnergyPrices,
  type InvestmentAssumptions,
  type SiteInputs,
  type WasteHeatProfile,
} from "./siteModel";

/** Waste-heat share assumed when the gate did not settle on one. */
export const DEFAULT_BRACKET_CENTRE_PCT = 40;

export const INFEASIBLE_MESSAGE =
  "COP calculation failed. The temperature lift may be too high for a heat pump. Please review your temperature inputs.";

export type ThermalOverrides = Partial<
  Pick<
    PerformanceOptions,
    "condenserApproachK" | "evaporatorApproachK" | "minEvaporatingTempC" | "lorentzEfficiency"
  >
>;

export interface AssessmentInput {
  site: SiteInputs;
  wasteHeat: WasteHeatProfile;
  prices: EnergyPrices;
  /** Overrides the spend-based estimate when present. */
  processHeatKw?: number;
  annualEnergySpend: number;
  investment: InvestmentAssumptions;
  performance?: ThermalOverrides;
  emissionFactors?: Partial<EmissionFactors>;
}

export interface WasteHeatBracket {
  minPct: number;
  maxPct: number;
}

export type AssessmentOutcome =
  | { kind: "gate-stopped"; gate: GateResult }
  | {
      kind: "infeasible";
      gate: GateResult;
      demand: ResolvedDemand;
      performance: PerformanceResult;
      message: string;
    }
  | {
      kind: "complete";
      gate: GateResult;
      demand: ResolvedDemand;
      performance: PerformanceResult;
      economics: EconomicsResult;
    };

export type AssessmentKind = AssessmentOutcome["kind"];

export const wasteHeatBracket = (assumptions: Readonly<GateAssumptions>): WasteHeatBracket => {
  const pct = assumptions.wastePercent ?? DEFAULT_BRACKET_CENTRE_PCT;
  const minPct = Math.max(10, Math.min(90, pct - 10));
  const maxPct = Math.max(minPct + 5, Math.min(100, pct + 10));
  return { minPct, maxPct };
};

/**
 * Waste-heat inlet temperature for the performance model. The gate's value
 * is missing when it stopped early on a caution, e.g. an unknown steam pressure.
 */
export const resolveWasteInletTemp = (
  gate: GateResult,
  site: SiteInputs,
  wasteHeat: WasteHeatProfile,
): Celsius => {
  if (gate.assumptions.wasteInletTempC !== undefined) {
    return gate.assumptions.wasteInletTempC;
  }
  if (wasteHeat.tempKnown && wasteHeat.tempC !== undefined) {
    return celsius(wasteHeat.tempC);
  }
  return celsius(site.processTempC);
};

export const runAssessment = (input: AssessmentInput): AssessmentOutcome => {
  const gate = evaluateFeasibility(input.site, input.wasteHeat);
  if (isGateTerminal(gate.status)) {
    return { kind: "gate-stopped", gate };
  }

  const demand = resolveProcessHeatDemand(
    input.processHeatKw,
    input.annualEnergySpend,
    input.prices,
    operatingHours(input.site),
  );
  const bracket = wasteHeatBracket(gate.assumptions);
  const performance = computePerformance(
    {
      wasteInletTempC: resolveWasteInletTemp(gate, input.site, input.wasteHeat),
      supplyTempC: input.site.targetSupplyTempC,
      processHeatKw: demand.processHeatKw,
    },
    { ...input.performance, wasteHeatMinPct: bracket.minPct, wasteHeatMaxPct: bracket.maxPct },
  );

  if (performance.copReal <= 0) {
    return { kind: "infeasible", gate, demand, performance, message: INFEASIBLE_MESSAGE };
  }

  const economics = computeEconomics(
    performance,
    input.site,
    input.prices,
    input.investment,
    gate.assumptions,
    input.emissionFactors,
  );
  return { kind: "complete", gate, demand, performance, economics };
};

const stableNormalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(stableNormalize);
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, inner]) => [key, stableNormalize(inner)]),
    );
  }
  return value;
};

export const stableAssessmentJson = (input: AssessmentInput): string =>
  JSON.stringify(stableNormalize(input));

export const assessmentFingerprint = (input: AssessmentInput): string => {
  const text = stableAssessmentJson(input);
  let hash = 2166136261;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash +=
      (hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24);
  }
  return `fnv1a-${(hash >>> 0).toString(16).padStart(8, "0")}`;
};
