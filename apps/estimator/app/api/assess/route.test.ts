import { describe, expect, it } from "vitest";
import { POST } from "./route";

const validPayload = {
  site: {
    processTempC: 150,
    energyVector: "Steam",
    targetSupplyTempC: 150,
    steamPressureBarA: 5,
    productionDays: 250,
    productionHoursPerDay: 12,
  },
  wasteHeat: {
    hasWasteHeat: true,
    howReleased: "DedicatedExhaust",
    tempKnown: true,
    tempC: 100,
    amountKnown: true,
    amountKw: 1000,
    medium: "HotWater",
    alreadyCaptured: false,
    existingRecoveryEquipment: false,
  },
  prices: {
    existingSystem: "Fossil fuel boiler",
    fuelType: "Natural gas",
  },
  demand: {
    processHeatKw: 1000,
  },
};

const post = (body: string): Promise<Response> =>
  POST(
    new Request("http://localhost/api/assess", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
    }),
  );

describe("POST /api/assess", () => {
  it("returns 200 for valid payload", async () => {
    const response = await post(JSON.stringify(validPayload));
    const body = (await response.json()) as {
      traceId: string;
      outcome: string;
      economics: { high: { capex: number } };
    };

    expect(response.status).toBe(200);
    expect(body.traceId.length).toBeGreaterThan(0);
    expect(body.outcome).toBe("complete");
    expect(body.economics.high.capex).toBe(399600);
  });

  it("returns 200 with a gate outcome when the site is not viable", async () => {
    const response = await post(
      JSON.stringify({ ...validPayload, site: { ...validPayload.site, steamPressureBarA: 12 } }),
    );
    const body = (await response.json()) as {
      outcome: string;
      gate: { status: string; notes: string[] };
    };

    expect(response.status).toBe(200);
    expect(body.outcome).toBe("gate-stopped");
    expect(body.gate).toEqual({
      status: "NotViable",
      statusLabel: "Not viable for a heat pump",
      notes: ["Steam pressure 12.0 barA > 10 barA: heat pump not possible."],
      assumptions: {},
    });
  });

  it("lists the band default the gate falls back to for a zero amount", async () => {
    const response = await post(
      JSON.stringify({ ...validPayload, wasteHeat: { ...validPayload.wasteHeat, amountKw: 0 } }),
    );
    const body = (await response.json()) as {
      gate: { assumptions: { wastePercent?: number } };
      assumptionsUsed: { name: string; value: number | string; source: string }[];
    };

    expect(response.status).toBe(200);
    expect(body.gate.assumptions.wastePercent).toBe(50);
    expect(body.assumptionsUsed.filter((item) => item.name === "wasteHeat.amountPctBand")).toEqual([
      {
        name: "wasteHeat.amountPctBand",
        value: "31–50% (average for modern processes)",
        source: "route-default",
      },
    ]);
  });

  it("returns 400 for invalid payload", async () => {
    const response = await post(JSON.stringify({ site: {} }));
    const body = (await response.json()) as { error: string };

    expect(response.status).toBe(400);
    expect(typeof body.error).toBe("string");
  });

  it("names the field that failed the cross-field check", async () => {
    const response = await post(
      JSON.stringify({
        ...validPayload,
        wasteHeat: { ...validPayload.wasteHeat, tempC: undefined },
      }),
    );
    const body = (await response.json()) as { error: string };

    expect(response.status).toBe(400);
    expect(body.error).toBe("wasteHeat: wasteHeat.tempC is required when tempKnown is true");
  });

  it("returns 400 for a body that is not JSON", async () => {
    const response = await post("{not json");

    expect(response.status).toBe(400);
  });
});
