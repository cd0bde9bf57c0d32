import {
  tCO2,
  type FuelType,
  type HeatSupplyTechnology,
  type MegawattHours,
  type TonnesCO2,
} from "./siteModel";

export interface EmissionFactors {
  /** kg CO2 per MWh of grid electricity. */
  electricityKgPerMwh: number;
  /** kg CO2 per kWh of fuel burnt, net calorific value. */
  fuelKgPerKwh: Record<FuelType, number>;
}

export const DEFAULT_EMISSION_FACTORS: EmissionFactors = {
  electricityKgPerMwh: 50,
  fuelKgPerKwh: {
    Butane: 0.24107,
    LNG: 0.20489,
    LPG: 0.23032,
    "Natural gas": 0.2027,
    Propane: 0.23258,
    "Fuel oil": 0.28523,
    "Coal (industrial)": 0.33944,
  },
};

const ELECTRIC_SYSTEMS: readonly HeatSupplyTechnology[] = [
  "Electric boiler",
  "Industrial heat pump",
];

const DEFAULT_SYSTEM_EFFICIENCY: Record<HeatSupplyTechnology, number> = {
  "Electric boiler": 0.95,
  "Industrial heat pump": 0.9,
  "Combined heat and power": 0.9,
  "Fossil fuel boiler": 0.8,
  Other: 0.8,
};

export const systemUsesFuel = (system: HeatSupplyTechnology): boolean =>
  !ELECTRIC_SYSTEMS.includes(system);

export const defaultSystemEfficiency = (system: HeatSupplyTechnology): number =>
  DEFAULT_SYSTEM_EFFICIENCY[system];

const resolvedFactors = (overrides?: Partial<EmissionFactors>): EmissionFactors => ({
  ...DEFAULT_EMISSION_FACTORS,
  ...overrides,
});

const validateFactors = (factors: EmissionFactors): void => {
  if (factors.electricityKgPerMwh < 0) {
    throw new Error("electricityKgPerMwh must be >= 0");
  }
  for (const [fuel, factor] of Object.entries(factors.fuelKgPerKwh)) {
    if (factor < 0) {
      throw new Error(`fuelKgPerKwh.${fuel} must be >= 0`);
    }
  }
};

export interface EmissionsInput {
  existingSystem: HeatSupplyTechnology;
  fuelType: FuelType;
  baselineInputMwh: MegawattHours;
  heatPumpInputMwh: MegawattHours;
}

export interface EmissionsBalance {
  co2Current: TonnesCO2;
  co2HeatPump: TonnesCO2;
  co2Savings: TonnesCO2;
}

/**
 * Annual tonnes of CO2 before and after the heat pump.
 * MWh × kg/kWh gives tonnes directly; the electricity factor is per MWh so it
 * is scaled by 1/1000. Savings are floored at zero.
 */
export const computeEmissions = (
  input: EmissionsInput,
  factorOverrides?: Partial<EmissionFactors>,
): EmissionsBalance => {
  const factors = resolvedFactors(factorOverrides);
  validateFactors(factors);

  const co2Current = systemUsesFuel(input.existingSystem)
    ? input.baselineInputMwh * factors.fuelKgPerKwh[input.fuelType]
    : (input.baselineInputMwh * factors.electricityKgPerMwh) / 1000;
  const co2HeatPump = (input.heatPumpInputMwh * factors.electricityKgPerMwh) / 1000;

  return {
    co2Current: tCO2(co2Current),
    co2HeatPump: tCO2(co2HeatPump),
    co2Savings: tCO2(Math.max(0, co2Current - co2HeatPump)),
  };
};
