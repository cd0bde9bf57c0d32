import {
  celsius,
  kw,
  type Celsius,
  type Kilowatts,
  type SiteInputs,
  type WasteHeatMedium,
  type WasteHeatProfile,
} from "./siteModel";

export type GateStatus = "NotViable" | "SuggestHeatExchanger" | "Caution" | "Proceed";

export interface GateAssumptions {
  wasteInletTempC?: Celsius;
  wasteHeatKw?: Kilowatts;
  wastePercent?: number;
  wasteMedium?: Exclude<WasteHeatMedium, "Unknown">;
}

export interface GateResult {
  status: GateStatus;
  notes: readonly string[];
  assumptions: Readonly<GateAssumptions>;
}

export const GATE_THRESHOLDS = {
  processTempMinC: 80,
  processTempMaxC: 200,
  heatPumpTargetMaxC: 180,
  steamPressureMaxBarA: 10,
  hotAirOkMaxC: 110,
  hotAirCautionMaxC: 150,
} as const;

export const DEFAULT_WASTE_PERCENT = 50;

const MEDIUM_NOTES: Record<Exclude<WasteHeatMedium, "Unknown">, string> = {
  HumidAir:
    "Waste heat available as humid air: heat pump integration possible, with final sizing refined at design stage.",
  DryAir:
    "Waste heat available as dry hot air: suitable for a heat pump via an air-to-refrigerant heat exchanger.",
  HotWater: "Waste heat available as hot water: highly suitable for heat-pump integration.",
  Steam:
    "Waste heat available as pure steam: heat pump integration possible with suitable condenser design.",
};

/**
 * Upper percentage of a band label such as "31–50% (average ...)".
 * Accepts a hyphen or an en-dash between the bounds and ignores trailing text.
 */
export const parseBandUpperPercent = (band: string): number => {
  const match = /(\d+(?:\.\d+)?)\s*%?\s*[-–]\s*(\d+(?:\.\d+)?)/.exec(band);
  if (!match) {
    return DEFAULT_WASTE_PERCENT;
  }
  const upper = Math.max(Number(match[1]), Number(match[2]));
  return Number.isFinite(upper) ? upper : DEFAULT_WASTE_PERCENT;
};

interface GateState {
  site: SiteInputs;
  wasteHeat: WasteHeatProfile;
  notes: string[];
  assumptions: GateAssumptions;
}

interface GateStop {
  status: Exclude<GateStatus, "Proceed">;
  note: string;
}

/** Returns a stop to end evaluation, or nothing to fall through to the next check. */
type GateCheck = (state: GateState) => GateStop | undefined;

const checkProcessWindow: GateCheck = ({ site }) => {
  const { processTempMinC, processTempMaxC } = GATE_THRESHOLDS;
  if (site.processTempC < processTempMinC || site.processTempC > processTempMaxC) {
    return {
      status: "NotViable",
      note: `Process temperature ${site.processTempC.toFixed(0)}°C is outside the ${processTempMinC}-${processTempMaxC} °C window: heat pump not viable.`,
    };
  }
  return undefined;
};

const checkEnergyVector: GateCheck = ({ site, notes }) => {
  const TH = GATE_THRESHOLDS;
  switch (site.energyVector) {
    case "Steam": {
      const pressure = site.steamPressureBarA;
      if (pressure === undefined || !Number.isFinite(pressure)) {
        return {
          status: "Caution",
          note: "Provide steam pressure (barA) to check heat-pump feasibility.",
        };
      }
      if (pressure > TH.steamPressureMaxBarA) {
        return {
          status: "NotViable",
          note: `Steam pressure ${pressure.toFixed(1)} barA > ${TH.steamPressureMaxBarA} barA: heat pump not possible.`,
        };
      }
      return undefined;
    }
    case "HotAir": {
      const target = site.targetSupplyTempC;
      if (target > TH.heatPumpTargetMaxC) {
        return {
          status: "NotViable",
          note: `Required hot-air temperature ${target.toFixed(0)}°C > ${TH.heatPumpTargetMaxC}°C: heat pump not possible.`,
        };
      }
      if (target > TH.hotAirCautionMaxC) {
        return {
          status: "NotViable",
          note: "Hot air >150 °C: heat pump not recommended (consider heat exchangers).",
        };
      }
      if (target > TH.hotAirOkMaxC) {
        notes.push("Hot air 110-150 °C: feasible but COP may be modest (high lift).");
      }
      return undefined;
    }
    case "HotWater": {
      const target = site.targetSupplyTempC;
      if (target > TH.heatPumpTargetMaxC) {
        return {
          status: "NotViable",
          note: `Required hot-water temperature ${target.toFixed(0)}°C > ${TH.heatPumpTargetMaxC}°C: heat pump not possible.`,
        };
      }
      return undefined;
    }
    default:
      // Other vectors carry no supply constraint.
      return undefined;
  }
};

const checkWasteHeatAvailable: GateCheck = ({ wasteHeat }) =>
  wasteHeat.hasWasteHeat
    ? undefined
    : {
        status: "SuggestHeatExchanger",
        note: "No waste heat identified: this may be better suited to direct heat recovery via heat exchangers.",
      };

const checkReleasePath: GateCheck = ({ wasteHeat, notes }) => {
  switch (wasteHeat.howReleased) {
    case "GeneralVentilation":
      return {
        status: "NotViable",
        note: "Waste heat only available via general room ventilation: better suited to heat recovery through heat exchangers than a heat pump.",
      };
    case "DedicatedExhaust":
      notes.push(
        "Waste heat from a dedicated cooling system or exhaust: suitable for heat-pump integration.",
      );
      return undefined;
    case "Unknown":
      return undefined;
  }
};

const resolveWasteTemperature: GateCheck = ({ site, wasteHeat, notes, assumptions }) => {
  if (wasteHeat.tempKnown && wasteHeat.tempC !== undefined) {
    assumptions.wasteInletTempC = celsius(wasteHeat.tempC);
  } else {
    assumptions.wasteInletTempC = celsius(site.processTempC);
    notes.push("Waste-heat temperature unknown: assuming equal to process temperature.");
  }
  return undefined;
};

const resolveWasteQuantity: GateCheck = ({ wasteHeat, notes, assumptions }) => {
  const amountKw = wasteHeat.amountKw;
  if (wasteHeat.amountKnown && amountKw !== undefined && amountKw > 0) {
    assumptions.wasteHeatKw = kw(amountKw);
    notes.push(`Using user-provided waste heat level Q_waste ≈ ${amountKw.toFixed(0)} kW.`);
  } else {
    const upper = parseBandUpperPercent(wasteHeat.amountPctBand);
    assumptions.wastePercent = upper;
    notes.push(
      `Waste-heat amount unknown: using upper estimate ≈ ${upper.toFixed(0)}% of energy input.`,
    );
  }
  return undefined;
};

const noteMedium: GateCheck = ({ wasteHeat, notes, assumptions }) => {
  const medium = wasteHeat.medium;
  if (medium !== "Unknown") {
    assumptions.wasteMedium = medium;
    notes.push(MEDIUM_NOTES[medium]);
  }
  return undefined;
};

const noteExistingRecovery: GateCheck = ({ wasteHeat, notes }) => {
  notes.push(
    wasteHeat.alreadyCaptured
      ? "Waste heat is already captured: integration may be simpler and cheaper."
      : "Waste heat not yet captured: additional pipework/ducting or a heat exchanger may be needed.",
  );
  notes.push(
    wasteHeat.existingRecoveryEquipment
      ? "There is already a waste-heat processing system on site (e.g. ORC or heat-recovery unit)."
      : "No existing waste-heat processor: a heat pump could be the main technology to use that heat.",
  );
  return undefined;
};

/** Order matters: later checks rely on earlier ones having passed. */
const GATE_CHECKS: readonly GateCheck[] = [
  checkProcessWindow,
  checkEnergyVector,
  checkWasteHeatAvailable,
  checkReleasePath,
  resolveWasteTemperature,
  resolveWasteQuantity,
  noteMedium,
  noteExistingRecovery,
];

export const evaluateFeasibility = (
  site: SiteInputs,
  wasteHeat: WasteHeatProfile,
): GateResult => {
  if (!Number.isFinite(site.processTempC) || !Number.isFinite(site.targetSupplyTempC)) {
    return {
      status: "Caution",
      notes: ["Please provide all required temperature values."],
      assumptions: {},
    };
  }

  const state: GateState = { site, wasteHeat, notes: [], assumptions: {} };
  for (const check of GATE_CHECKS) {
    const stop = check(state);
    if (stop) {
      return { status: stop.status, notes: [stop.note], assumptions: {} };
    }
  }

  return {
    status: state.notes.length === 0 ? "Proceed" : "Caution",
    notes: state.notes,
    assumptions: state.assumptions,
  };
};

export const isGateTerminal = (status: GateStatus): boolean =>
  status === "NotViable" || status === "SuggestHeatExchanger";
