/**
 * FX projection API.
 * POST { params?: Partial<ProjectionParams>, scenarios?: FxScenario[] } → projection (params merged over defaults).
 * GET → projection for the defaults. Successful responses carry a fresh `requestId`.
 */
import { NextResponse } from "next/server";
import { handleProjectionRequest } from "@/lib/projectionRequest";
import { createLogger } from "@/lib/debug";

const log = createLogger("api/projection");

export async function POST(req: Request) {
  try {
    log.log("POST called");
    let body: unknown;
    try {
      body = await req.json();
    } catch {
      return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
    }

    const outcome = handleProjectionRequest(body);
    if (!outcome.ok) {
      log.warn("rejected", outcome.body.issues);
      return NextResponse.json(outcome.body, { status: outcome.status });
    }

    log.log("ok", {
      requestId: outcome.body.requestId,
      horizonMonths: outcome.body.params.horizonMonths,
      runwayUnhedged: outcome.body.metrics.runwayUnhedged,
      runwayHedged: outcome.body.metrics.runwayHedged,
    });
    return NextResponse.json(outcome.body, { status: 200 });
  } catch (e) {
    log.error("unexpected error", e);
    return NextResponse.json({ error: "Unexpected error during projection" }, { status: 500 });
  }
}

export async function GET() {
  try {
    log.log("GET called");
    const outcome = handleProjectionRequest({});
    return NextResponse.json(outcome.body, { status: outcome.status });
  } catch (e) {
    log.error("unexpected error", e);
    return NextResponse.json({ error: "Unexpected error during projection" }, { status: 500 });
  }
}
