import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  DEFAULT_EMISSION_FACTORS,
  DEFAULT_INVESTMENT_ASSUMPTIONS,
  DEFAULT_PERFORMANCE_OPTIONS,
  ENERGY_VECTORS,
  FUEL_TYPES,
  GATE_STATUS_LABELS,
  HEAT_SUPPLY_TECHNOLOGIES,
  WASTE_AMOUNT_BANDS,
  WASTE_HEAT_MEDIA,
  WASTE_HEAT_RELEASES,
  assessmentFingerprint,
  buildCashFlowChart,
  celsius,
  defaultSystemEfficiency,
  gbp,
  kw,
  runAssessment,
  type AssessmentInput,
  type AssessmentKind,
  type AssessmentOutcome,
  type CashFlowChart,
  type DemandSource,
  type EconomicCase,
  type EconomicsResult,
  type GateAssumptions,
  type GateStatus,
  type InvestmentAssumptions,
  type PerformanceResult,
  type ThermalOverrides,
} from "@heatpump-screen/core";

const ROUTE_DEFAULTS = {
  annualEnergySpend: 500_000,
  amountPctBand: WASTE_AMOUNT_BANDS[1],
  fuelPricePerMwh: 30,
  electricityPricePerMwh: 90,
} as const;

const nonEmpty = <T extends string>(values: readonly T[]): [T, ...T[]] => {
  const [first, ...rest] = values;
  if (first === undefined) {
    throw new Error("enum values must not be empty");
  }
  return [first, ...rest];
};

export const siteSchema = z
  .object({
    processTempC: z.number().min(20).max(300),
    energyVector: z.enum(nonEmpty(ENERGY_VECTORS)),
    targetSupplyTempC: z.number().min(50).max(250),
    steamPressureBarA: z.number().positive().max(100).optional(),
    productionDays: z.number().int().min(1).max(365),
    productionHoursPerDay: z.number().min(1).max(24),
  })
  .strict();

export const wasteHeatSchema = z
  .object({
    hasWasteHeat: z.boolean(),
    howReleased: z.enum(nonEmpty(WASTE_HEAT_RELEASES)),
    tempKnown: z.boolean(),
    tempC: z.number().min(0).max(400).optional(),
    amountKnown: z.boolean(),
    amountKw: z.number().nonnegative().optional(),
    amountPctBand: z.string().min(1).optional(),
    medium: z.enum(nonEmpty(WASTE_HEAT_MEDIA)),
    alreadyCaptured: z.boolean(),
    existingRecoveryEquipment: z.boolean(),
  })
  .strict()
  .superRefine((value, context) => {
    if (value.tempKnown && value.tempC === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "wasteHeat.tempC is required when tempKnown is true",
      });
    }
    if (value.amountKnown && value.amountKw === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "wasteHeat.amountKw is required when amountKnown is true",
      });
    }
  });

export const pricesSchema = z
  .object({
    existingSystem: z.enum(nonEmpty(HEAT_SUPPLY_TECHNOLOGIES)),
    fuelType: z.enum(nonEmpty(FUEL_TYPES)),
    fuelPricePerMwh: z.number().min(0).max(300).optional(),
    electricityPricePerMwh: z.number().min(0).max(300).optional(),
    existingSystemEfficiency: z.number().gt(0).max(1).optional(),
  })
  .strict();

export const demandSchema = z
  .object({
    processHeatKw: z.number().min(10).max(50_000).optional(),
    annualEnergySpend: z.number().nonnegative().optional(),
  })
  .strict()
  .optional();

export const investmentSchema = z
  .object({
    designAndPm: z.number().min(0).max(10_000_000).optional(),
    fixedInstall: z.number().min(0).max(10_000_000).optional(),
    hpCostPerKw: z.number().min(0).max(5_000).optional(),
    hrCostPerKw: z.number().min(0).max(5_000).optional(),
    varInstallPerKw: z.number().min(0).max(5_000).optional(),
  })
  .strict()
  .optional();

export const performanceSchema = z
  .object({
    condenserApproachK: z.number().min(0).max(30).optional(),
    evaporatorApproachK: z.number().min(0).max(30).optional(),
    minEvaporatingTempC: z.number().min(-20).max(150).optional(),
    lorentzEfficiency: z.number().gt(0).max(1).optional(),
  })
  .strict()
  .optional();

export const emissionFactorsSchema = z
  .object({
    electricityKgPerMwh: z.number().nonnegative().optional(),
  })
  .strict()
  .optional();

export const assessRequestShape = {
  site: siteSchema,
  wasteHeat: wasteHeatSchema,
  prices: pricesSchema,
  demand: demandSchema,
  investment: investmentSchema,
  performance: performanceSchema,
  emissionFactors: emissionFactorsSchema,
};

export const assessRequestSchema = z.object(assessRequestShape).strict();

export type AssessRequestPayload = z.infer<typeof assessRequestSchema>;

export interface AssumptionUsed {
  name: string;
  value: number | string;
  source: "request" | "core-default" | "route-default";
}

export interface SerializedGate {
  status: GateStatus;
  statusLabel: string;
  notes: readonly string[];
  assumptions: Readonly<GateAssumptions>;
}

export type SerializedPerformance = Omit<PerformanceResult, "electricalMinKw" | "electricalMaxKw"> & {
  electricalMinKw: number | null;
  electricalMaxKw: number | null;
};

export type SerializedEconomicCase = Omit<EconomicCase, "simplePaybackYears"> & {
  simplePaybackYears: number | null;
};

export type SerializedEconomics = Omit<EconomicsResult, "high" | "low"> & {
  high: SerializedEconomicCase;
  low: SerializedEconomicCase;
};

export interface AssessResponse {
  outcome: AssessmentKind;
  gate: SerializedGate;
  message: string | null;
  demand: { processHeatKw: number; source: DemandSource } | null;
  performance: SerializedPerformance | null;
  economics: SerializedEconomics | null;
  chart: CashFlowChart | null;
  assumptionsUsed: AssumptionUsed[];
  inputFingerprint: string;
  traceId: string;
}

const finiteOrNull = (value: number): number | null =>
  Number.isFinite(value) ? value : null;

type OptionalNumbers<K extends string> = Partial<Record<K, number>>;

type DefaultSource = Exclude<AssumptionUsed["source"], "request">;

/** Picks the supplied value or its default and records which one was used. */
const resolveValue = <T extends number | string>(
  name: string,
  supplied: T | undefined,
  fallback: T,
  source: DefaultSource,
  assumptionsUsed: AssumptionUsed[],
): T => {
  if (supplied === undefined) {
    assumptionsUsed.push({ name, value: fallback, source });
    return fallback;
  }
  assumptionsUsed.push({ name, value: supplied, source: "request" });
  return supplied;
};

const resolveGroup = <K extends string>(
  prefix: string,
  supplied: OptionalNumbers<K> | undefined,
  defaults: Record<K, number>,
  source: DefaultSource,
  assumptionsUsed: AssumptionUsed[],
): Record<K, number> => {
  const resolved: Record<K, number> = { ...defaults };
  for (const key in defaults) {
    resolved[key] = resolveValue<number>(
      `${prefix}.${key}`,
      supplied?.[key],
      defaults[key],
      source,
      assumptionsUsed,
    );
  }
  return resolved;
};

const coreInvestmentDefaults: Record<keyof InvestmentAssumptions, number> = {
  designAndPm: DEFAULT_INVESTMENT_ASSUMPTIONS.designAndPm,
  fixedInstall: DEFAULT_INVESTMENT_ASSUMPTIONS.fixedInstall,
  hpCostPerKw: DEFAULT_INVESTMENT_ASSUMPTIONS.hpCostPerKw,
  hrCostPerKw: DEFAULT_INVESTMENT_ASSUMPTIONS.hrCostPerKw,
  varInstallPerKw: DEFAULT_INVESTMENT_ASSUMPTIONS.varInstallPerKw,
};

const coreThermalDefaults: Required<ThermalOverrides> = {
  condenserApproachK: DEFAULT_PERFORMANCE_OPTIONS.condenserApproachK,
  evaporatorApproachK: DEFAULT_PERFORMANCE_OPTIONS.evaporatorApproachK,
  minEvaporatingTempC: DEFAULT_PERFORMANCE_OPTIONS.minEvaporatingTempC,
  lorentzEfficiency: DEFAULT_PERFORMANCE_OPTIONS.lorentzEfficiency,
};

/**
 * Turns a validated request into core input. Every overridable value the
 * assessment reads is listed in `assumptionsUsed` with its origin; the waste
 * band and the energy spend are listed only when the assessment reads them.
 */
export const resolveNormalizedInput = (
  payload: AssessRequestPayload,
): { normalized: AssessmentInput; assumptionsUsed: AssumptionUsed[] } => {
  const assumptionsUsed: AssumptionUsed[] = [];
  const { site, wasteHeat, prices } = payload;

  // The gate reads the band unless a positive amount was supplied.
  const bandRead = !(wasteHeat.amountKnown && (wasteHeat.amountKw ?? 0) > 0);
  const amountPctBand = !bandRead
    ? (wasteHeat.amountPctBand ?? ROUTE_DEFAULTS.amountPctBand)
    : resolveValue<string>(
        "wasteHeat.amountPctBand",
        wasteHeat.amountPctBand,
        ROUTE_DEFAULTS.amountPctBand,
        "route-default",
        assumptionsUsed,
      );

  const resolvedPrices = resolveGroup(
    "prices",
    {
      fuelPricePerMwh: prices.fuelPricePerMwh,
      electricityPricePerMwh: prices.electricityPricePerMwh,
    },
    {
      fuelPricePerMwh: ROUTE_DEFAULTS.fuelPricePerMwh,
      electricityPricePerMwh: ROUTE_DEFAULTS.electricityPricePerMwh,
    },
    "route-default",
    assumptionsUsed,
  );
  const existingSystemEfficiency = resolveValue(
    "prices.existingSystemEfficiency",
    prices.existingSystemEfficiency,
    defaultSystemEfficiency(prices.existingSystem),
    "core-default",
    assumptionsUsed,
  );

  const processHeatKw = payload.demand?.processHeatKw;
  const annualEnergySpend =
    processHeatKw === undefined
      ? resolveValue(
          "demand.annualEnergySpend",
          payload.demand?.annualEnergySpend,
          ROUTE_DEFAULTS.annualEnergySpend,
          "route-default",
          assumptionsUsed,
        )
      : (payload.demand?.annualEnergySpend ?? ROUTE_DEFAULTS.annualEnergySpend);
  if (processHeatKw !== undefined) {
    assumptionsUsed.push({ name: "demand.processHeatKw", value: processHeatKw, source: "request" });
  }

  const investment = resolveGroup(
    "investment",
    payload.investment,
    coreInvestmentDefaults,
    "core-default",
    assumptionsUsed,
  );
  const performance = resolveGroup(
    "performance",
    payload.performance,
    coreThermalDefaults,
    "core-default",
    assumptionsUsed,
  );

  const suppliedFactor = payload.emissionFactors?.electricityKgPerMwh;
  const electricityKgPerMwh = resolveValue(
    "emissionFactors.electricityKgPerMwh",
    suppliedFactor,
    DEFAULT_EMISSION_FACTORS.electricityKgPerMwh,
    "core-default",
    assumptionsUsed,
  );

  return {
    normalized: {
      site: {
        ...site,
        processTempC: celsius(site.processTempC),
        targetSupplyTempC: celsius(site.targetSupplyTempC),
      },
      wasteHeat: {
        ...wasteHeat,
        tempC: wasteHeat.tempC === undefined ? undefined : celsius(wasteHeat.tempC),
        amountKw: wasteHeat.amountKw === undefined ? undefined : kw(wasteHeat.amountKw),
        amountPctBand,
      },
      prices: {
        existingSystem: prices.existingSystem,
        fuelType: prices.fuelType,
        fuelPricePerMwh: gbp(resolvedPrices.fuelPricePerMwh),
        electricityPricePerMwh: gbp(resolvedPrices.electricityPricePerMwh),
        existingSystemEfficiency,
      },
      processHeatKw,
      annualEnergySpend,
      investment: {
        designAndPm: gbp(investment.designAndPm),
        fixedInstall: gbp(investment.fixedInstall),
        hpCostPerKw: gbp(investment.hpCostPerKw),
        hrCostPerKw: gbp(investment.hrCostPerKw),
        varInstallPerKw: gbp(investment.varInstallPerKw),
      },
      performance,
      emissionFactors: suppliedFactor === undefined ? undefined : { electricityKgPerMwh },
    },
    assumptionsUsed,
  };
};

const serializeCase = (economicCase: EconomicCase): SerializedEconomicCase => ({
  ...economicCase,
  simplePaybackYears: finiteOrNull(economicCase.simplePaybackYears),
});

const serializePerformance = (performance: PerformanceResult): SerializedPerformance => ({
  ...performance,
  electricalMinKw: finiteOrNull(performance.electricalMinKw),
  electricalMaxKw: finiteOrNull(performance.electricalMaxKw),
});

export const serializeOutcome = (
  outcome: AssessmentOutcome,
): Pick<AssessResponse, "outcome" | "gate" | "message" | "demand" | "performance" | "economics" | "chart"> => {
  const gate: SerializedGate = {
    status: outcome.gate.status,
    statusLabel: GATE_STATUS_LABELS[outcome.gate.status],
    notes: outcome.gate.notes,
    assumptions: outcome.gate.assumptions,
  };

  switch (outcome.kind) {
    case "gate-stopped":
      return {
        outcome: outcome.kind,
        gate,
        message: null,
        demand: null,
        performance: null,
        economics: null,
        chart: null,
      };
    case "infeasible":
      return {
        outcome: outcome.kind,
        gate,
        message: outcome.message,
        demand: outcome.demand,
        performance: serializePerformance(outcome.performance),
        economics: null,
        chart: null,
      };
    case "complete":
      return {
        outcome: outcome.kind,
        gate,
        message: null,
        demand: outcome.demand,
        performance: serializePerformance(outcome.performance),
        economics: {
          ...outcome.economics,
          high: serializeCase(outcome.economics.high),
          low: serializeCase(outcome.economics.low),
        },
        chart: buildCashFlowChart(outcome.economics),
      };
  }
};

export const buildAssessmentResponse = (
  payload: AssessRequestPayload,
  traceId: string = randomUUID(),
): AssessResponse => {
  const { normalized, assumptionsUsed } = resolveNormalizedInput(payload);
  const outcome = runAssessment(normalized);

  return {
    ...serializeOutcome(outcome),
    assumptionsUsed,
    inputFingerprint: assessmentFingerprint(normalized),
    traceId,
  };
};

/** Message for a 400 response; zod issues are flattened to `path: message` pairs. */
export const describeRequestError = (error: unknown, fallback: string): string => {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return error instanceof Error ? error.message : fallback;
};
