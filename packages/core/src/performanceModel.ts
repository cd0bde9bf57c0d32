import { celsius, kw, type Celsius, type Kilowatts } from "./siteModel";

const KELVIN_OFFSET = 273.15;

/** Steam-side condensing margin applied on top of the condenser approach. */
export const CONDENSER_MARGIN_K = 2;

export interface PerformanceOptions {
  condenserApproachK: number;
  evaporatorApproachK: number;
  minEvaporatingTempC: number;
  lorentzEfficiency: number;
  wasteHeatMinPct: number;
  wasteHeatMaxPct: number;
}

export const DEFAULT_PERFORMANCE_OPTIONS: PerformanceOptions = {
  condenserApproachK: 8,
  evaporatorApproachK: 8,
  minEvaporatingTempC: 70,
  lorentzEfficiency: 0.6,
  wasteHeatMinPct: 30,
  wasteHeatMaxPct: 60,
};

export interface PerformanceInput {
  wasteInletTempC: Celsius;
  supplyTempC: Celsius;
  processHeatKw: Kilowatts;
}

export interface PerformanceResult {
  condensingTempC: Celsius;
  evaporatingTempC: Celsius;
  copCarnot: number;
  /** Zero when the condensing temperature does not exceed the evaporating one. */
  copReal: number;
  wasteHeatMinKw: Kilowatts;
  wasteHeatMaxKw: Kilowatts;
  /** +Infinity when copReal is zero. */
  electricalMinKw: Kilowatts;
  electricalMaxKw: Kilowatts;
  processHeatKw: Kilowatts;
  capacityMWth: number;
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

const validateFinite = (value: number, name: string): void => {
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a finite temperature`);
  }
};

const validateOptions = (options: PerformanceOptions): void => {
  validateNonNegative(options.condenserApproachK, "condenserApproachK");
  validateNonNegative(options.evaporatorApproachK, "evaporatorApproachK");
  validateFinite(options.minEvaporatingTempC, "minEvaporatingTempC");
  if (!(options.lorentzEfficiency > 0 && options.lorentzEfficiency <= 1)) {
    throw new Error("lorentzEfficiency must be between 0 and 1");
  }
  validateNonNegative(options.wasteHeatMinPct, "wasteHeatMinPct");
  validateNonNegative(options.wasteHeatMaxPct, "wasteHeatMaxPct");
};

export const carnotCop = (condensingTempC: number, evaporatingTempC: number): number => {
  if (condensingTempC <= evaporatingTempC) {
    return 0;
  }
  const hot = condensingTempC + KELVIN_OFFSET;
  const cold = evaporatingTempC + KELVIN_OFFSET;
  return hot / (hot - cold);
};

/**
 * Screening-level heat pump performance: Carnot COP de-rated by a fixed
 * Lorentz efficiency, waste-heat bounds as a share of process demand, and the
 * electrical draw that follows from the real COP.
 */
export const computePerformance = (
  input: PerformanceInput,
  overrides: Partial<PerformanceOptions> = {},
): PerformanceResult => {
  const options: PerformanceOptions = { ...DEFAULT_PERFORMANCE_OPTIONS, ...overrides };
  validateOptions(options);
  validateFinite(input.wasteInletTempC, "wasteInletTempC");
  validateFinite(input.supplyTempC, "supplyTempC");
  validatePositive(input.processHeatKw, "processHeatKw");

  const condensingTempC =
    input.supplyTempC + options.condenserApproachK - CONDENSER_MARGIN_K;
  const evaporatingTempC = Math.max(
    input.wasteInletTempC - options.evaporatorApproachK,
    options.minEvaporatingTempC,
  );

  const copCarnot = carnotCop(condensingTempC, evaporatingTempC);
  const copReal = Math.max(0, options.lorentzEfficiency * copCarnot);

  const processHeatKw = input.processHeatKw;
  const electricalMaxKw = copReal > 0 ? processHeatKw / copReal : Number.POSITIVE_INFINITY;
  const electricalMinKw = copReal > 0 ? electricalMaxKw / 2 : Number.POSITIVE_INFINITY;

  return {
    condensingTempC: celsius(condensingTempC),
    evaporatingTempC: celsius(evaporatingTempC),
    copCarnot,
    copReal,
    wasteHeatMinKw: kw((processHeatKw * options.wasteHeatMinPct) / 100),
    wasteHeatMaxKw: kw((processHeatKw * options.wasteHeatMaxPct) / 100),
    electricalMinKw: kw(electricalMinKw),
    electricalMaxKw: kw(electricalMaxKw),
    processHeatKw,
    capacityMWth: processHeatKw / 1000,
  };
};
