/**
 * Pass/fail resolver configuration.
 *
 * The interpreter itself takes an explicit InterpreterSettings record; these
 * helpers build one (and the file-handling options) from environment
 * variables for the CLI and the web route.
 */

import { DEFAULT_INTERPRETER_SETTINGS } from "@/lib/passFail/markers";
import type { InterpreterSettings, MarkerMatching, NumericParsing } from "@/lib/passFail/types";

type Env = Record<string, string | undefined>;

export type LogEncoding = "latin1" | "utf8";

export const NUMERIC_PARSING_OPTIONS: readonly NumericParsing[] = ["UNIT_AWARE", "STRICT"] as const;
export const MARKER_MATCHING_OPTIONS: readonly MarkerMatching[] = ["DECORATED", "EXACT"] as const;
const LOG_ENCODINGS: readonly LogEncoding[] = ["latin1", "utf8"] as const;

export const DEFAULT_OUTPUT_SUFFIX = "_processed";

/**
 * Parse a numeric parsing mode from unknown input.
 * Returns null if missing or invalid (does not throw).
 */
export function parseNumericParsing(value: unknown): NumericParsing | null {
  if (typeof value !== "string") return null;
  const upper = value.trim().toUpperCase();
  return NUMERIC_PARSING_OPTIONS.find((option) => option === upper) ?? null;
}

export function parseMarkerMatching(value: unknown): MarkerMatching | null {
  if (typeof value !== "string") return null;
  const upper = value.trim().toUpperCase();
  return MARKER_MATCHING_OPTIONS.find((option) => option === upper) ?? null;
}

function readOption<T>(
  env: Env,
  name: string,
  parse: (value: unknown) => T | null,
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parse(raw);
  if (parsed === null) {
    console.warn(`[PassFail Config] Ignoring invalid ${name}:`, { value: raw, using: fallback });
    return fallback;
  }
  return parsed;
}

/**
 * Interpreter settings from PASS_FAIL_NUMERIC_PARSING and
 * PASS_FAIL_MARKER_MATCHING. Defaults: UNIT_AWARE, DECORATED.
 */
export function getInterpreterSettings(env: Env = process.env): InterpreterSettings {
  return {
    numericParsing: readOption(
      env,
      "PASS_FAIL_NUMERIC_PARSING",
      parseNumericParsing,
      DEFAULT_INTERPRETER_SETTINGS.numericParsing
    ),
    markerMatching: readOption(
      env,
      "PASS_FAIL_MARKER_MATCHING",
      parseMarkerMatching,
      DEFAULT_INTERPRETER_SETTINGS.markerMatching
    ),
  };
}

/**
 * Encoding used to read and write log files. latin1 maps every byte to one
 * character and back, so Windows-1252 logs are written out byte-for-byte
 * except for the rewritten markers.
 */
export function getLogEncoding(env: Env = process.env): LogEncoding {
  return readOption(
    env,
    "PASS_FAIL_ENCODING",
    (value) => LOG_ENCODINGS.find((encoding) => encoding === value) ?? null,
    "latin1"
  );
}

export function getOutputSuffix(env: Env = process.env): string {
  return env.PASS_FAIL_OUTPUT_SUFFIX?.trim() || DEFAULT_OUTPUT_SUFFIX;
}
