/**
 * Measurement line parsing: "PARAM = VALUE [PASS/FAIL]".
 */

import { stripTrailingMarker } from "./markers";
import type { MarkerMatching, NumericParsing } from "./types";

const VALUE_PATTERN = /=\s*(.*)$/;
const KEY_PATTERN = /^(.+?)\s*=/;
const LEADING_NUMBER_PATTERN = /^([+-]?\d+(?:\.\d+)?)/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Measured value on a line, with any trailing pending marker removed first.
 *
 * Returns "" for "PARAM =" (an empty measurement) and null when the line has
 * no "=" at all.
 */
export function extractValue(line: string, matching: MarkerMatching = "DECORATED"): string | null {
  const content = stripTrailingMarker(line, matching);
  const match = content.match(VALUE_PATTERN);
  return match ? match[1].trim() : null;
}

/**
 * Parameter key of a measurement line, e.g. "MP 214" from "MP 214 = 425790".
 */
export function extractKey(line: string): string | null {
  const match = line.match(KEY_PATTERN);
  if (!match) return null;
  const key = match[1].trim();
  return key.length > 0 ? key : null;
}

/**
 * Leading signed decimal of a value, ignoring spaces and trailing units.
 * "136.974944 Deg" -> 136.974944, "- 22.5" -> -22.5, "Deg 5" -> null
 */
export function extractLeadingNumber(text: string): number | null {
  const match = text.replace(/ /g, "").match(LEADING_NUMBER_PATTERN);
  return match ? parseFloat(match[1]) : null;
}

/**
 * Whole-string decimal parse (spaces removed). Anything else after the number
 * makes it non-numeric: "27.5 Hz" -> null.
 */
export function parseStrictNumber(text: string): number | null {
  const compact = text.replace(/ /g, "");
  return DECIMAL_PATTERN.test(compact) ? parseFloat(compact) : null;
}

export function readNumber(text: string, parsing: NumericParsing): number | null {
  return parsing === "UNIT_AWARE" ? extractLeadingNumber(text) : parseStrictNumber(text);
}

/**
 * Whole-string hexadecimal parse (spaces removed). BigInt keeps long register
 * dumps exact.
 */
export function parseHex(text: string): bigint | null {
  const compact = text.replace(/ /g, "");
  return /^[0-9a-f]+$/i.test(compact) ? BigInt(`0x${compact}`) : null;
}
