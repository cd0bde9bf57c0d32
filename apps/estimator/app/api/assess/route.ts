import { NextResponse } from "next/server";
import {
  assessRequestSchema,
  buildAssessmentResponse,
  describeRequestError,
  type AssessRequestPayload,
} from "./assessment";

export async function POST(request: Request) {
  try {
    const json: unknown = await request.json();
    const payload: AssessRequestPayload = assessRequestSchema.parse(json);

    return NextResponse.json(buildAssessmentResponse(payload));
  } catch (error) {
    if (!(error instanceof Error)) {
      console.error("assess: unexpected failure", error);
    }
    return NextResponse.json(
      { error: describeRequestError(error, "Invalid assessment request") },
      { status: 400 },
    );
  }
}
