import { type AssessmentInput, type AssessmentOutcome } from "../assessment";
import { type EconomicCase } from "../economicsEngine";
import { type GateStatus } from "../feasibilityGate";
import { operatingHours, type EnergyVector, type WasteHeatMedium, type WasteHeatRelease } from "../siteModel";

export type ReportVariant = "quick" | "detailed";

export type ReportSectionId =
  | "contact"
  | "summary"
  | "siteInputs"
  | "feasibility"
  | "performance"
  | "highCase"
  | "lowCase"
  | "environmentalImpact"
  | "energyCosts"
  | "disclaimer";

export interface ReportEntry {
  label: string;
  value: string;
}

export interface EstimateReportSection {
  id: ReportSectionId;
  title: string;
  entries: readonly ReportEntry[];
}

export interface ReportContact {
  name: string;
  email: string;
  company?: string;
  phone?: string;
  consent: boolean;
}

export type CompletedAssessment = Extract<AssessmentOutcome, { kind: "complete" }>;

export interface EstimateReportInput {
  variant: ReportVariant;
  input: AssessmentInput;
  outcome: CompletedAssessment;
  contact?: ReportContact;
  /** Rendered verbatim under the title when present. */
  generatedAt?: string;
}

export interface EstimateReport {
  variant: ReportVariant;
  title: string;
  sections: readonly EstimateReportSection[];
  markdown: string;
}

export const GATE_STATUS_LABELS: Record<GateStatus, string> = {
  NotViable: "Not viable for a heat pump",
  SuggestHeatExchanger: "Heat exchanger recommended",
  Caution: "Feasible, with points to check",
  Proceed: "Feasible",
};

export const ENERGY_VECTOR_LABELS: Record<EnergyVector, string> = {
  Steam: "Steam",
  HotWater: "Hot water",
  HotAir: "Hot air",
  Other: "Other",
};

export const RELEASE_LABELS: Record<WasteHeatRelease, string> = {
  DedicatedExhaust: "Dedicated cooling system or exhaust pipe",
  GeneralVentilation: "General room ventilation",
  Unknown: "Unknown",
};

export const MEDIUM_LABELS: Record<WasteHeatMedium, string> = {
  HumidAir: "Humid air",
  DryAir: "Dry air",
  HotWater: "Hot water",
  Steam: "Steam",
  Unknown: "Unknown",
};

const DISCLAIMER_LINES = [
  "This estimate is based on the information you provided and uses indicative assumptions.",
  "Actual performance and costs may vary; a detailed feasibility study is needed before investment.",
];

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

const groupedInteger = (value: number): string =>
  Math.round(Math.abs(value)).toLocaleString("en-GB");

/** Whole pounds with comma grouping, e.g. "£1,234" or "-£1,234". */
export const formatGbp = (value: number): string => {
  const digits = groupedInteger(value);
  return value < 0 && digits !== "0" ? `-£${digits}` : `£${digits}`;
};

export const formatGbpPerMwh = (value: number): string => `£${value.toFixed(2)}/MWh`;

export const formatPercent = (value: number): string => {
  const text = value.toFixed(0);
  return `${text === "-0" ? "0" : text}%`;
};

export const formatPayback = (years: number): string =>
  Number.isFinite(years) && years <= 10 ? `${years.toFixed(1)} years` : ">10 years";

export const formatTonnes = (value: number): string => {
  const digits = groupedInteger(value);
  return `${value < 0 && digits !== "0" ? "-" : ""}${digits} tonnes/year`;
};

const formatTemp = (value: number): string => `${value.toFixed(0)}°C`;

const formatKw = (value: number): string =>
  Number.isFinite(value) ? `${groupedInteger(value)} kW` : "n/a";

const yesNo = (value: boolean): string => (value ? "Yes" : "No");

const validateContact = (contact: ReportContact | undefined): ReportContact => {
  if (!contact || contact.name.trim() === "") {
    throw new Error("contact.name is required for a detailed report");
  }
  if (!EMAIL_PATTERN.test(contact.email)) {
    throw new Error("contact.email must be a valid email address");
  }
  if (!contact.consent) {
    throw new Error("contact.consent is required for a detailed report");
  }
  return contact;
};

const contactSection = (contact: ReportContact): EstimateReportSection => {
  const entries: ReportEntry[] = [{ label: "Name", value: contact.name }];
  if (contact.company) {
    entries.push({ label: "Company", value: contact.company });
  }
  entries.push({ label: "Email", value: contact.email });
  if (contact.phone) {
    entries.push({ label: "Phone", value: contact.phone });
  }
  entries.push({ label: "Consent to contact", value: yesNo(contact.consent) });
  return { id: "contact", title: "Contact Details", entries };
};

const summarySection = (outcome: CompletedAssessment): EstimateReportSection => ({
  id: "summary",
  title: "Results Summary",
  entries: [
    { label: "Annual cost savings (high case)", value: formatGbp(outcome.economics.high.annualSavings) },
    { label: "CO₂ reduction", value: formatTonnes(outcome.economics.co2Savings) },
    { label: "Simple payback (high case)", value: formatPayback(outcome.economics.high.simplePaybackYears) },
  ],
});

const siteInputsSection = (input: AssessmentInput): EstimateReportSection => {
  const { site, wasteHeat, prices } = input;
  const entries: ReportEntry[] = [
    { label: "Process temperature", value: formatTemp(site.processTempC) },
    { label: "Energy vector", value: ENERGY_VECTOR_LABELS[site.energyVector] },
    { label: "Heat supply technology", value: prices.existingSystem },
    { label: "Fuel type", value: prices.fuelType },
    { label: "Required supply temperature", value: formatTemp(site.targetSupplyTempC) },
  ];
  if (site.energyVector === "Steam" && site.steamPressureBarA !== undefined) {
    entries.push({ label: "Steam supply pressure", value: `${site.steamPressureBarA.toFixed(1)} barA` });
  }
  entries.push(
    { label: "Operating hours", value: `${operatingHours(site).toLocaleString("en-GB")} hours/year` },
    { label: "System efficiency", value: formatPercent(prices.existingSystemEfficiency * 100) },
    { label: "Fuel cost", value: formatGbpPerMwh(prices.fuelPricePerMwh) },
    { label: "Electricity cost", value: formatGbpPerMwh(prices.electricityPricePerMwh) },
    { label: "Has waste heat", value: yesNo(wasteHeat.hasWasteHeat) },
  );
  if (wasteHeat.hasWasteHeat) {
    entries.push({ label: "How released", value: RELEASE_LABELS[wasteHeat.howReleased] });
    if (wasteHeat.tempKnown && wasteHeat.tempC !== undefined) {
      entries.push({ label: "Waste heat temperature", value: formatTemp(wasteHeat.tempC) });
    }
    entries.push(
      wasteHeat.amountKnown && wasteHeat.amountKw !== undefined
        ? { label: "Waste heat available", value: formatKw(wasteHeat.amountKw) }
        : { label: "Waste heat estimate", value: wasteHeat.amountPctBand },
    );
    entries.push(
      { label: "Existing recovery equipment", value: yesNo(wasteHeat.existingRecoveryEquipment) },
      { label: "Waste heat medium", value: MEDIUM_LABELS[wasteHeat.medium] },
    );
  }
  return { id: "siteInputs", title: "Your Inputs", entries };
};

const caseSection = (
  id: "highCase" | "lowCase",
  title: string,
  economicCase: EconomicCase,
): EstimateReportSection => ({
  id,
  title,
  entries: [
    { label: "Heat pump size", value: formatKw(economicCase.hpSizeKw) },
    { label: "Annual savings", value: formatGbp(economicCase.annualSavings) },
    { label: "Investment cost", value: formatGbp(economicCase.capex) },
    { label: "Payback period", value: formatPayback(economicCase.simplePaybackYears) },
    { label: "IRR (10 years)", value: formatPercent(economicCase.irrPct) },
    { label: "Net position (year 10)", value: formatGbp(economicCase.netPositionYear10) },
    {
      label: "Break-even",
      value: economicCase.breakevenYear === null ? "Not within 10 years" : `Year ${economicCase.breakevenYear}`,
    },
  ],
});

export const generateEstimateReport = (reportInput: EstimateReportInput): EstimateReport => {
  const { variant, input, outcome } = reportInput;
  const { economics, performance, gate } = outcome;

  const feasibilityEntries: ReportEntry[] = [
    { label: "Status", value: GATE_STATUS_LABELS[gate.status] },
    ...gate.notes.map((note) => ({ label: "Note", value: note })),
  ];
  if (economics.belowRecommendedSize) {
    feasibilityEntries.push({
      label: "Note",
      value: "For projects below ~250 kW, alternative solutions may be more suitable.",
    });
  }

  const sections: EstimateReportSection[] = [];
  if (variant === "detailed") {
    sections.push(contactSection(validateContact(reportInput.contact)), summarySection(outcome));
  }
  sections.push(
    siteInputsSection(input),
    { id: "feasibility", title: "Feasibility", entries: feasibilityEntries },
    {
      id: "performance",
      title: "Heat Pump Performance",
      entries: [
        { label: "Process heat demand", value: formatKw(performance.processHeatKw) },
        { label: "Condensing temperature", value: formatTemp(performance.condensingTempC) },
        { label: "Evaporating temperature", value: formatTemp(performance.evaporatingTempC) },
        { label: "COP (real)", value: performance.copReal.toFixed(2) },
        {
          label: "Waste heat used",
          value: `${formatKw(performance.wasteHeatMinKw)} to ${formatKw(performance.wasteHeatMaxKw)}`,
        },
        { label: "Electrical input", value: formatKw(performance.electricalMaxKw) },
      ],
    },
    caseSection("highCase", "Investment and Returns - High Case", economics.high),
    caseSection("lowCase", "Investment and Returns - Low Case", economics.low),
    {
      id: "environmentalImpact",
      title: "Environmental Impact",
      entries: [
        { label: "CO₂ reduction", value: formatTonnes(economics.co2Savings) },
        { label: "Current CO₂ emissions", value: formatTonnes(economics.co2Current) },
        { label: "With heat pump CO₂", value: formatTonnes(economics.co2HeatPump) },
      ],
    },
    {
      id: "energyCosts",
      title: "Energy Costs Comparison",
      entries: [
        { label: "Current annual energy cost", value: formatGbp(economics.costCurrent) },
        { label: "With heat pump energy cost", value: formatGbp(economics.costHeatPump) },
      ],
    },
    {
      id: "disclaimer",
      title: "Disclaimer",
      entries: DISCLAIMER_LINES.map((line) => ({ label: "", value: line })),
    },
  );

  const title =
    variant === "detailed"
      ? "Industrial Heat Pump Estimation Report"
      : "Heat Pump Assessment - Quick Estimate";
  const header = reportInput.generatedAt
    ? `# ${title}\n\nGenerated: ${reportInput.generatedAt}`
    : `# ${title}`;
  const body = sections
    .map((section) => {
      const lines = section.entries.map((entry) =>
        entry.label ? `- **${entry.label}:** ${entry.value}` : entry.value,
      );
      return `## ${section.title}\n\n${lines.join("\n")}`;
    })
    .join("\n\n");

  return { variant, title, sections, markdown: `${header}\n\n${body}` };
};
