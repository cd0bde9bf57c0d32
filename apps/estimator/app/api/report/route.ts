import { NextResponse } from "next/server";
import { describeRequestError } from "../assess/assessment";
import {
  buildReportResponse,
  reportRequestSchema,
  type ReportRequestPayload,
} from "./report";

export async function POST(request: Request) {
  try {
    const json: unknown = await request.json();
    const payload: ReportRequestPayload = reportRequestSchema.parse(json);
    const result = buildReportResponse(payload);

    return result.kind === "report"
      ? NextResponse.json(result.body)
      : NextResponse.json(result.body, { status: 422 });
  } catch (error) {
    if (!(error instanceof Error)) {
      console.error("report: unexpected failure", error);
    }
    return NextResponse.json(
      { error: describeRequestError(error, "Invalid report request") },
      { status: 400 },
    );
  }
}
