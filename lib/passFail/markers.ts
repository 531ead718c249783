import type { InterpreterSettings, MarkerMatching } from "./types";

export const PENDING_MARKER = "PASS/FAIL";

export const DEFAULT_INTERPRETER_SETTINGS: InterpreterSettings = {
  numericParsing: "UNIT_AWARE",
  markerMatching: "DECORATED",
};

// Backward-scan windows. Each bound is exclusive: a window of 10 looks at the
// 9 lines above the pending line.
export const CRITERIA_SEARCH_WINDOW = 10;
export const CROSS_REFERENCE_VALUE_WINDOW = 20;
export const MEASUREMENT_SEARCH_WINDOW = 20;

/** Criteria text that only stands in for an explanation on the next line. */
export const PLACEHOLDER_CRITERIA: readonly string[] = ["X", "XX", "XXX"] as const;

// Decoration that may follow the marker in DECORATED mode: asterisks and
// whitespace, e.g. "PASS/FAIL **".
const DECORATION = "[*\\s]*";

const PENDING_LINE_PATTERNS: Record<MarkerMatching, RegExp> = {
  DECORATED: new RegExp(`^(.+?)\\s+${PENDING_MARKER}${DECORATION}$`),
  EXACT: new RegExp(`^(.+?)\\s+${PENDING_MARKER}\\s*$`),
};

const TRAILING_MARKER_PATTERNS: Record<MarkerMatching, RegExp> = {
  DECORATED: new RegExp(`\\s+${PENDING_MARKER}${DECORATION}$`),
  EXACT: new RegExp(`\\s+${PENDING_MARKER}\\s*$`),
};

// The rewrite drops the same decoration detection accepts and keeps the line
// terminator. EXACT lines carry only whitespace after the marker, which stays.
const REWRITE_PATTERNS: Record<MarkerMatching, RegExp> = {
  DECORATED: new RegExp(`${PENDING_MARKER}${DECORATION}?(?=(?:\\r?\\n)?$)`),
  EXACT: new RegExp(`${PENDING_MARKER}(?=\\s*$)`),
};

export const CRITERIA_PATTERN = /S\/B\s+(.+)$/i;

/**
 * Returns the content before the marker when `line` is a pending-result line,
 * otherwise null.
 */
export function matchPendingLine(line: string, matching: MarkerMatching): string | null {
  const match = line.trimEnd().match(PENDING_LINE_PATTERNS[matching]);
  return match ? match[1] : null;
}

export function stripTrailingMarker(line: string, matching: MarkerMatching): string {
  return line.trimEnd().replace(TRAILING_MARKER_PATTERNS[matching], "");
}

export function rewriteMarker(
  line: string,
  result: "PASS" | "FAIL",
  matching: MarkerMatching
): string {
  return line.replace(REWRITE_PATTERNS[matching], result);
}

/** Criteria text following "S/B" on a line, or null. */
export function matchCriteria(line: string): string | null {
  const match = line.trimEnd().match(CRITERIA_PATTERN);
  if (!match) return null;
  const text = match[1].trim();
  return text.length > 0 ? text : null;
}
