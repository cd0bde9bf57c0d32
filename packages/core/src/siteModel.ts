export type Brand<T, B extends string> = T & { readonly __brand: B };

export type Celsius = Brand<number, "Celsius">;
export type Kilowatts = Brand<number, "Kilowatts">;
export type MegawattHours = Brand<number, "MegawattHours">;
export type TonnesCO2 = Brand<number, "TonnesCO2">;
export type GBP = Brand<number, "GBP">;

export const celsius = (value: number): Celsius => value as Celsius;
export const kw = (value: number): Kilowatts => value as Kilowatts;
export const mwh = (value: number): MegawattHours => value as MegawattHours;
export const tCO2 = (value: number): TonnesCO2 => value as TonnesCO2;
export const gbp = (value: number): GBP => value as GBP;

export type EnergyVector = "Steam" | "HotWater" | "HotAir" | "Other";

export const ENERGY_VECTORS: readonly EnergyVector[] = ["Steam", "HotWater", "HotAir", "Other"];

export interface SiteInputs {
  processTempC: Celsius;
  energyVector: EnergyVector;
  targetSupplyTempC: Celsius;
  /** Only read when the energy vector is steam. */
  steamPressureBarA?: number;
  productionDays: number;
  productionHoursPerDay: number;
}

export type WasteHeatRelease = "DedicatedExhaust" | "GeneralVentilation" | "Unknown";

export type WasteHeatMedium = "HumidAir" | "DryAir" | "HotWater" | "Steam" | "Unknown";

export const WASTE_HEAT_RELEASES: readonly WasteHeatRelease[] = [
  "DedicatedExhaust",
  "GeneralVentilation",
  "Unknown",
];

export const WASTE_HEAT_MEDIA: readonly WasteHeatMedium[] = [
  "HumidAir",
  "DryAir",
  "HotWater",
  "Steam",
  "Unknown",
];

/**
 * Labels offered when the waste-heat amount is unknown. The gate reads the
 * upper percentage straight out of the label text.
 */
export const WASTE_AMOUNT_BANDS = [
  "10-30% (very efficient process)",
  "31–50% (average for modern processes)",
  "51-80% (typical for processes without any control for minimising waste heat)",
] as const;

export interface WasteHeatProfile {
  hasWasteHeat: boolean;
  howReleased: WasteHeatRelease;
  tempKnown: boolean;
  tempC?: Celsius;
  amountKnown: boolean;
  amountKw?: Kilowatts;
  /** Free text so that labels from older forms still reach the parser. */
  amountPctBand: string;
  medium: WasteHeatMedium;
  alreadyCaptured: boolean;
  existingRecoveryEquipment: boolean;
}

export type HeatSupplyTechnology =
  | "Fossil fuel boiler"
  | "Electric boiler"
  | "Industrial heat pump"
  | "Combined heat and power"
  | "Other";

export const HEAT_SUPPLY_TECHNOLOGIES: readonly HeatSupplyTechnology[] = [
  "Fossil fuel boiler",
  "Electric boiler",
  "Industrial heat pump",
  "Combined heat and power",
  "Other",
];

export type FuelType =
  | "Butane"
  | "LNG"
  | "LPG"
  | "Natural gas"
  | "Propane"
  | "Fuel oil"
  | "Coal (industrial)";

export const FUEL_TYPES: readonly FuelType[] = [
  "Butane",
  "LNG",
  "LPG",
  "Natural gas",
  "Propane",
  "Fuel oil",
  "Coal (industrial)",
];

export interface EnergyPrices {
  existingSystem: HeatSupplyTechnology;
  fuelType: FuelType;
  fuelPricePerMwh: GBP;
  electricityPricePerMwh: GBP;
  /** Fraction in (0, 1]. */
  existingSystemEfficiency: number;
}

export interface InvestmentAssumptions {
  designAndPm: GBP;
  fixedInstall: GBP;
  hpCostPerKw: GBP;
  hrCostPerKw: GBP;
  varInstallPerKw: GBP;
}

export const DEFAULT_INVESTMENT_ASSUMPTIONS: InvestmentAssumptions = {
  designAndPm: gbp(50000),
  fixedInstall: gbp(50000),
  hpCostPerKw: gbp(250),
  hrCostPerKw: gbp(50),
  varInstallPerKw: gbp(10),
};

export const operatingHours = (site: Pick<SiteInputs, "productionDays" | "productionHoursPerDay">): number =>
  Math.min(Math.max(site.productionDays * site.productionHoursPerDay, 100), 8760);
