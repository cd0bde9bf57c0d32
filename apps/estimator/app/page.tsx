"use client";

import { FormEvent, useMemo, useState } from "react";
import {
  ENERGY_VECTORS,
  ENERGY_VECTOR_LABELS,
  FUEL_TYPES,
  HEAT_SUPPLY_TECHNOLOGIES,
  MEDIUM_LABELS,
  RELEASE_LABELS,
  WASTE_AMOUNT_BANDS,
  WASTE_HEAT_MEDIA,
  WASTE_HEAT_RELEASES,
  formatGbp,
  formatPayback,
  formatPercent,
  formatTonnes,
  type EnergyVector,
  type FuelType,
  type GateStatus,
  type HeatSupplyTechnology,
  type WasteHeatMedium,
  type WasteHeatRelease,
} from "@heatpump-screen/core";
import type { AssessResponse, SerializedEconomicCase } from "./api/assess/assessment";
import type { ReportResponse } from "./api/report/report";
import styles from "./page.module.css";

interface EstimatorFormState {
  processTempC: number;
  energyVector: EnergyVector;
  targetSupplyTempC: number;
  steamPressureBarA: number;
  productionDays: number;
  productionHoursPerDay: number;
  hasWasteHeat: boolean;
  howReleased: WasteHeatRelease;
  tempKnown: boolean;
  wasteTempC: number;
  amountKnown: boolean;
  amountKw: number;
  amountPctBand: string;
  medium: WasteHeatMedium;
  alreadyCaptured: boolean;
  existingRecoveryEquipment: boolean;
  existingSystem: HeatSupplyTechnology;
  fuelType: FuelType;
  fuelPricePerMwh: number;
  electricityPricePerMwh: number;
  demandKnown: boolean;
  processHeatKw: number;
  annualEnergySpend: number;
}

type KeysOfType<V> = {
  [K in keyof EstimatorFormState]: EstimatorFormState[K] extends V ? K : never;
}[keyof EstimatorFormState];

const DEFAULT_FORM: EstimatorFormState = {
  processTempC: 150,
  energyVector: "Steam",
  targetSupplyTempC: 150,
  steamPressureBarA: 5,
  productionDays: 250,
  productionHoursPerDay: 12,
  hasWasteHeat: true,
  howReleased: "DedicatedExhaust",
  tempKnown: true,
  wasteTempC: 100,
  amountKnown: false,
  amountKw: 500,
  amountPctBand: WASTE_AMOUNT_BANDS[1],
  medium: "HotWater",
  alreadyCaptured: false,
  existingRecoveryEquipment: false,
  existingSystem: "Fossil fuel boiler",
  fuelType: "Natural gas",
  fuelPricePerMwh: 30,
  electricityPricePerMwh: 90,
  demandKnown: false,
  processHeatKw: 1000,
  annualEnergySpend: 500000,
};

const GATE_MESSAGES: Record<GateStatus, string> = {
  NotViable: "A heat pump is not viable for this process.",
  SuggestHeatExchanger: "Direct heat recovery with heat exchangers looks like the better fit.",
  Caution: "A heat pump looks feasible. Review the points below before relying on the figures.",
  Proceed: "A heat pump looks feasible for this process.",
};

const GATE_CLASSES: Record<GateStatus, string> = {
  NotViable: styles.gateStop,
  SuggestHeatExchanger: styles.gateStop,
  Caution: styles.gateCaution,
  Proceed: styles.gateProceed,
};

const buildAssessPayload = (form: EstimatorFormState) => ({
  site: {
    processTempC: form.processTempC,
    energyVector: form.energyVector,
    targetSupplyTempC: form.targetSupplyTempC,
    steamPressureBarA: form.energyVector === "Steam" ? form.steamPressureBarA : undefined,
    productionDays: form.productionDays,
    productionHoursPerDay: form.productionHoursPerDay,
  },
  wasteHeat: {
    hasWasteHeat: form.hasWasteHeat,
    howReleased: form.howReleased,
    tempKnown: form.tempKnown,
    tempC: form.tempKnown ? form.wasteTempC : undefined,
    amountKnown: form.amountKnown,
    amountKw: form.amountKnown ? form.amountKw : undefined,
    amountPctBand: form.amountKnown ? undefined : form.amountPctBand,
    medium: form.medium,
    alreadyCaptured: form.alreadyCaptured,
    existingRecoveryEquipment: form.existingRecoveryEquipment,
  },
  prices: {
    existingSystem: form.existingSystem,
    fuelType: form.fuelType,
    fuelPricePerMwh: form.fuelPricePerMwh,
    electricityPricePerMwh: form.electricityPricePerMwh,
  },
  demand: form.demandKnown
    ? { processHeatKw: form.processHeatKw }
    : { annualEnergySpend: form.annualEnergySpend },
});

const errorMessage = (body: unknown, failure: string): string =>
  typeof body === "object" && body !== null && "error" in body && typeof body.error === "string"
    ? body.error
    : failure;

const postJson = async <T,>(url: string, payload: unknown, failure: string): Promise<T> => {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify(payload),
  });

  const body: unknown = await response.json();
  if (!response.ok) {
    throw new Error(errorMessage(body, failure));
  }
  return body as T;
};

const caseCards = (title: string, economicCase: SerializedEconomicCase) => (
  <div className={styles.case}>
    <h3>{title}</h3>
    <dl className={styles.resultsGrid}>
      <div>
        <dt>Heat pump size</dt>
        <dd>{economicCase.hpSizeKw.toLocaleString("en-GB")} kW</dd>
      </div>
      <div>
        <dt>Annual savings</dt>
        <dd>{formatGbp(economicCase.annualSavings)}</dd>
      </div>
      <div>
        <dt>Investment cost</dt>
        <dd>{formatGbp(economicCase.capex)}</dd>
      </div>
      <div>
        <dt>Payback</dt>
        <dd>{formatPayback(economicCase.simplePaybackYears ?? Number.POSITIVE_INFINITY)}</dd>
      </div>
      <div>
        <dt>IRR (10 years)</dt>
        <dd>{formatPercent(economicCase.irrPct)}</dd>
      </div>
      <div>
        <dt>Net position (year 10)</dt>
        <dd>{formatGbp(economicCase.netPositionYear10)}</dd>
      </div>
    </dl>
  </div>
);

export default function Page() {
  const [form, setForm] = useState<EstimatorFormState>(DEFAULT_FORM);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<AssessResponse | null>(null);
  const [report, setReport] = useState<string | null>(null);

  const cumulativeRows = useMemo(() => result?.chart?.points ?? [], [result]);

  const onSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setLoading(true);
    setError(null);
    setReport(null);

    try {
      setResult(
        await postJson<AssessResponse>("/api/assess", buildAssessPayload(form), "Assessment failed"),
      );
    } catch (caught) {
      setError(caught instanceof Error ? caught.message : "Assessment failed");
    } finally {
      setLoading(false);
    }
  };

  const onReport = async () => {
    setError(null);
    try {
      const body = await postJson<ReportResponse>(
        "/api/report",
        { ...buildAssessPayload(form), variant: "quick", generatedAt: new Date().toLocaleString("en-GB") },
        "Report failed",
      );
      setReport(body.report.markdown);
    } catch (caught) {
      setError(caught instanceof Error ? caught.message : "Report failed");
    }
  };

  const numberInput = (label: string, key: KeysOfType<number>, value: number) => (
    <label>
      {label}
      <input
        type="number"
        value={value}
        onChange={(e) => setForm({ ...form, [key]: Number(e.target.value) })}
      />
    </label>
  );

  const toggle = (label: string, key: KeysOfType<boolean>, checked: boolean) => (
    <label className={styles.toggleRow}>
      <input
        type="checkbox"
        checked={checked}
        onChange={(e) => setForm({ ...form, [key]: e.target.checked })}
      />
      {label}
    </label>
  );

  return (
    <main className={styles.page}>
      <h1 className={styles.title}>Industrial Heat Pump Estimator</h1>

      <div className={styles.topGrid}>
        <section className={styles.panel}>
          <h2>Your process</h2>
          <form onSubmit={onSubmit} className={styles.form}>
            {numberInput("Process temperature (°C)", "processTempC", form.processTempC)}
            <label>
              Energy vector
              <select
                value={form.energyVector}
                onChange={(e) => {
                  const energyVector = ENERGY_VECTORS.find((v) => v === e.target.value);
                  if (energyVector) {
                    setForm({ ...form, energyVector });
                  }
                }}
              >
                {ENERGY_VECTORS.map((vector) => (
                  <option key={vector} value={vector}>
                    {ENERGY_VECTOR_LABELS[vector]}
                  </option>
                ))}
              </select>
            </label>
            {numberInput("Required supply temperature (°C)", "targetSupplyTempC", form.targetSupplyTempC)}
            {form.energyVector === "Steam"
              ? numberInput("Steam pressure (barA)", "steamPressureBarA", form.steamPressureBarA)
              : null}
            {numberInput("Production days per year", "productionDays", form.productionDays)}
            {numberInput("Production hours per day", "productionHoursPerDay", form.productionHoursPerDay)}

            <h3>Waste heat</h3>
            {toggle("Waste heat is available", "hasWasteHeat", form.hasWasteHeat)}
            <label>
              How is it released?
              <select
                value={form.howReleased}
                onChange={(e) => {
                  const howReleased = WASTE_HEAT_RELEASES.find((v) => v === e.target.value);
                  if (howReleased) {
                    setForm({ ...form, howReleased });
                  }
                }}
              >
                {WASTE_HEAT_RELEASES.map((release) => (
                  <option key={release} value={release}>
                    {RELEASE_LABELS[release]}
                  </option>
                ))}
              </select>
            </label>
            {toggle("Temperature is known", "tempKnown", form.tempKnown)}
            {form.tempKnown ? numberInput("Waste heat temperature (°C)", "wasteTempC", form.wasteTempC) : null}
            {toggle("Amount is known", "amountKnown", form.amountKnown)}
            {form.amountKnown ? (
              numberInput("Waste heat available (kW)", "amountKw", form.amountKw)
            ) : (
              <label>
                Share of energy input lost as waste heat
                <select
                  value={form.amountPctBand}
                  onChange={(e) => setForm({ ...form, amountPctBand: e.target.value })}
                >
                  {WASTE_AMOUNT_BANDS.map((band) => (
                    <option key={band} value={band}>
                      {band}
                    </option>
                  ))}
                </select>
              </label>
            )}
            <label>
              Medium
              <select
                value={form.medium}
                onChange={(e) => {
                  const medium = WASTE_HEAT_MEDIA.find((v) => v === e.target.value);
                  if (medium) {
                    setForm({ ...form, medium });
                  }
                }}
              >
                {WASTE_HEAT_MEDIA.map((medium) => (
                  <option key={medium} value={medium}>
                    {MEDIUM_LABELS[medium]}
                  </option>
                ))}
              </select>
            </label>
            {toggle("Already captured", "alreadyCaptured", form.alreadyCaptured)}
            {toggle(
              "Existing recovery equipment on site",
              "existingRecoveryEquipment",
              form.existingRecoveryEquipment,
            )}

            <h3>Energy and costs</h3>
            <label>
              Current heat supply
              <select
                value={form.existingSystem}
                onChange={(e) => {
                  const existingSystem = HEAT_SUPPLY_TECHNOLOGIES.find((v) => v === e.target.value);
                  if (existingSystem) {
                    setForm({ ...form, existingSystem });
                  }
                }}
              >
                {HEAT_SUPPLY_TECHNOLOGIES.map((system) => (
                  <option key={system} value={system}>
                    {system}
                  </option>
                ))}
              </select>
            </label>
            <label>
              Fuel type
              <select
                value={form.fuelType}
                onChange={(e) => {
                  const fuelType = FUEL_TYPES.find((v) => v === e.target.value);
                  if (fuelType) {
                    setForm({ ...form, fuelType });
                  }
                }}
              >
                {FUEL_TYPES.map((fuel) => (
                  <option key={fuel} value={fuel}>
                    {fuel}
                  </option>
                ))}
              </select>
            </label>
            {numberInput("Fuel price (£/MWh)", "fuelPricePerMwh", form.fuelPricePerMwh)}
            {numberInput("Electricity price (£/MWh)", "electricityPricePerMwh", form.electricityPricePerMwh)}
            {toggle("Process heat demand is known", "demandKnown", form.demandKnown)}
            {form.demandKnown
              ? numberInput("Process heat demand (kW)", "processHeatKw", form.processHeatKw)
              : numberInput("Annual energy spend (£)", "annualEnergySpend", form.annualEnergySpend)}

            <button type="submit" disabled={loading}>
              {loading ? "Assessing..." : "Assess"}
            </button>
            {error ? <p className={styles.error}>{error}</p> : null}
          </form>
        </section>

        <section className={styles.panel}>
          <h2>Feasibility</h2>
          {result ? (
            <>
              <p className={GATE_CLASSES[result.gate.status]}>
                <strong>{result.gate.statusLabel}.</strong> {GATE_MESSAGES[result.gate.status]}
              </p>
              <ul>
                {result.gate.notes.map((note) => (
                  <li key={note}>{note}</li>
                ))}
              </ul>
              {result.message ? <p className={styles.error}>{result.message}</p> : null}
              {result.performance ? (
                <dl className={styles.resultsGrid}>
                  <div>
                    <dt>COP (real)</dt>
                    <dd>{result.performance.copReal.toFixed(2)}</dd>
                  </div>
                  <div>
                    <dt>Condensing / evaporating</dt>
                    <dd>
                      {result.performance.condensingTempC.toFixed(0)}°C /{" "}
                      {result.performance.evaporatingTempC.toFixed(0)}°C
                    </dd>
                  </div>
                  <div>
                    <dt>Process heat demand</dt>
                    <dd>{result.performance.processHeatKw.toLocaleString("en-GB")} kW</dd>
                  </div>
                </dl>
              ) : null}
            </>
          ) : (
            <p className={styles.placeholder}>Assess your process to see whether a heat pump fits.</p>
          )}
        </section>
      </div>

      {result?.economics ? (
        <section className={styles.panel}>
          <h2>Investment cases</h2>
          <div className={styles.topGrid}>
            {caseCards("High case", result.economics.high)}
            {caseCards("Low case", result.economics.low)}
          </div>
          <p>
            CO₂ savings: {formatTonnes(result.economics.co2Savings)} · Current energy cost:{" "}
            {formatGbp(result.economics.costCurrent)} · With heat pump:{" "}
            {formatGbp(result.economics.costHeatPump)}
          </p>
          <table className={styles.table}>
            <thead>
              <tr>
                <th>Year</th>
                <th>High case cumulative</th>
                <th>Low case cumulative</th>
              </tr>
            </thead>
            <tbody>
              {cumulativeRows.map((point) => (
                <tr key={point.year}>
                  <td>{point.year}</td>
                  <td>{formatGbp(point.highCumulative)}</td>
                  <td>{formatGbp(point.lowCumulative)}</td>
                </tr>
              ))}
            </tbody>
          </table>
          <button type="button" onClick={onReport}>
            Build quick estimate report
          </button>
        </section>
      ) : null}

      <section className={styles.panel}>
        <h2>Assumptions</h2>
        <details>
          <summary>Values used for this estimate</summary>
          <pre className={styles.pre}>
            {result ? JSON.stringify(result.assumptionsUsed, null, 2) : "No assessment yet."}
          </pre>
        </details>
        {report ? <pre className={styles.pre}>{report}</pre> : null}
      </section>
    </main>
  );
}
