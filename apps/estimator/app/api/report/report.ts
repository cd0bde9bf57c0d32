import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  assessmentFingerprint,
  generateEstimateReport,
  runAssessment,
  type AssessmentKind,
  type EstimateReport,
} from "@heatpump-screen/core";
import {
  assessRequestShape,
  resolveNormalizedInput,
  serializeOutcome,
  type AssessResponse,
  type AssumptionUsed,
} from "../assess/assessment";

export const contactSchema = z
  .object({
    name: z.string(),
    email: z.string(),
    company: z.string().optional(),
    phone: z.string().optional(),
    consent: z.boolean(),
  })
  .strict();

export const reportRequestSchema = z
  .object({
    ...assessRequestShape,
    variant: z.enum(["quick", "detailed"]),
    contact: contactSchema.optional(),
    generatedAt: z.string().min(1).optional(),
  })
  .strict();

export type ReportRequestPayload = z.infer<typeof reportRequestSchema>;

export interface ReportResponse {
  report: EstimateReport;
  assumptionsUsed: AssumptionUsed[];
  inputFingerprint: string;
  traceId: string;
}

/** Returned with a 422 when the assessment ends before any economics exist. */
export interface ReportUnavailable {
  error: string;
  outcome: Exclude<AssessmentKind, "complete">;
  gate: AssessResponse["gate"];
  message: string | null;
}

export type ReportResult =
  | { kind: "report"; body: ReportResponse }
  | { kind: "unavailable"; body: ReportUnavailable };

export const buildReportResponse = (
  payload: ReportRequestPayload,
  traceId: string = randomUUID(),
): ReportResult => {
  const { normalized, assumptionsUsed } = resolveNormalizedInput(payload);
  const outcome = runAssessment(normalized);

  if (outcome.kind !== "complete") {
    const serialized = serializeOutcome(outcome);
    return {
      kind: "unavailable",
      body: {
        error: "A report needs a completed assessment",
        outcome: outcome.kind,
        gate: serialized.gate,
        message: serialized.message,
      },
    };
  }

  const report = generateEstimateReport({
    variant: payload.variant,
    input: normalized,
    outcome,
    contact: payload.contact,
    generatedAt: payload.generatedAt,
  });

  return {
    kind: "report",
    body: {
      report,
      assumptionsUsed,
      inputFingerprint: assessmentFingerprint(normalized),
      traceId,
    },
  };
};
