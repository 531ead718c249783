import { NextResponse } from "next/server";
import {
  getInterpreterSettings,
  parseMarkerMatching,
  parseNumericParsing,
} from "@/lib/config/passFail";
import {
  hasPendingMarkers,
  joinLines,
  scanDocument,
  splitLines,
  type InterpreterSettings,
} from "@/lib/passFail";

export const runtime = "nodejs";

export async function GET() {
  return NextResponse.json(
    { ok: false, message: 'Use POST with a JSON body: { "text": "<log contents>" }' },
    { status: 405 }
  );
}

function badRequest(error: string) {
  return NextResponse.json({ ok: false, error }, { status: 400 });
}

/**
 * Resolve PASS/FAIL markers in pasted log text.
 *
 * Body: { text: string, numericParsing?: "UNIT_AWARE" | "STRICT", markerMatching?: "DECORATED" | "EXACT" }
 * Settings not given in the body come from the environment.
 */
export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return badRequest("Request body must be JSON");
  }

  if (typeof body !== "object" || body === null) {
    return badRequest("Request body must be a JSON object");
  }
  const fields = new Map<string, unknown>(Object.entries(body));

  const text = fields.get("text");
  if (typeof text !== "string") {
    return badRequest("Field 'text' must be a string");
  }

  const settings: InterpreterSettings = { ...getInterpreterSettings() };

  const numericParsing = fields.get("numericParsing");
  if (numericParsing !== undefined) {
    const parsed = parseNumericParsing(numericParsing);
    if (!parsed) return badRequest("Field 'numericParsing' must be UNIT_AWARE or STRICT");
    settings.numericParsing = parsed;
  }

  const markerMatching = fields.get("markerMatching");
  if (markerMatching !== undefined) {
    const parsed = parseMarkerMatching(markerMatching);
    if (!parsed) return badRequest("Field 'markerMatching' must be DECORATED or EXACT");
    settings.markerMatching = parsed;
  }

  const lines = splitLines(text);
  const pending = hasPendingMarkers(lines, settings);
  const result = scanDocument(lines, settings);

  console.log("[PassFail API] Scanned text:", {
    lineCount: lines.length,
    settings,
    total: result.stats.total,
    passed: result.stats.passed,
    failed: result.stats.failed,
    unchanged: result.stats.unchanged,
  });

  return NextResponse.json({
    ok: true,
    hasPendingMarkers: pending,
    text: joinLines(result.lines),
    stats: result.stats,
    details: result.details,
  });
}
