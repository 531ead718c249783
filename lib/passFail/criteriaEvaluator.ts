/**
 * Criteria Evaluator
 *
 * Decides PASS, FAIL or INCONCLUSIVE for one measured value against one
 * criteria form. INCONCLUSIVE is reserved for "not enough information"
 * (unresolved cross-reference, unsupported construct, no comparable history);
 * a value that is present but does not satisfy the form is a FAIL.
 */

import { matchesReference, resolveReference } from "./crossReference";
import { DEFAULT_INTERPRETER_SETTINGS } from "./markers";
import type {
  ComplexRangeCriteria,
  CriteriaForm,
  InterpreterSettings,
  ParameterHistory,
  RangeCriteria,
  SetCriteria,
  Verdict,
} from "./types";
import { extractLeadingNumber, parseHex, parseStrictNumber, readNumber } from "./valueExtractor";

export interface EvaluationContext {
  history: ParameterHistory;
  /** Needed by CROSS_REFERENCE lookups. */
  document: readonly string[];
  /** 0-indexed line of the pending marker. */
  position: number;
  settings?: InterpreterSettings;
}

const OCTET_MAX = 255;

function toVerdict(passed: boolean): Verdict {
  return passed ? "PASS" : "FAIL";
}

export function evaluateCriteria(
  value: string,
  form: CriteriaForm,
  context: EvaluationContext
): Verdict {
  const settings = context.settings ?? DEFAULT_INTERPRETER_SETTINGS;

  if (form.kind === "UNVALIDATABLE") {
    return "INCONCLUSIVE";
  }

  if (value.trim() === "") {
    if (form.kind === "SET" && form.members.some((m) => m.toLowerCase() === "blank")) {
      return "PASS";
    }
    return "FAIL";
  }

  switch (form.kind) {
    case "EXACT":
      return toVerdict(value.toUpperCase() === form.value.toUpperCase());

    case "SET":
      return toVerdict(isSetMember(value, form));

    case "RANGE":
      return toVerdict(isWithinRange(value, form));

    case "TOLERANCE": {
      const reading = readNumber(value, settings.numericParsing);
      if (reading === null) return "FAIL";
      return toVerdict(
        reading >= form.target - form.tolerance && reading <= form.target + form.tolerance
      );
    }

    case "GREATER_THAN": {
      const reading = readNumber(value, settings.numericParsing);
      if (reading === null) return "FAIL";
      return toVerdict(reading > form.threshold);
    }

    case "GREATER_THAN_PREVIOUS": {
      const current = extractLeadingNumber(value);
      if (current === null) return "INCONCLUSIVE";
      const previous = context.history.get(form.paramKey);
      if (previous === undefined) return "PASS";
      if (typeof previous !== "number") return "INCONCLUSIVE";
      return toVerdict(current > previous);
    }

    case "CROSS_REFERENCE": {
      const reference = resolveReference(context.document, context.position, form.paramKey);
      if (reference === null) return "INCONCLUSIVE";
      return toVerdict(matchesReference(value, reference));
    }

    case "COMPLEX_RANGE":
      return toVerdict(isPackedOctetPair(value, form));
  }
}

/**
 * Listed members compare case-insensitively. Sub-ranges accept the plain
 * decimal spelling of an integer inside the bounds ("7", not "07").
 */
function isSetMember(value: string, form: SetCriteria): boolean {
  const normalized = value.trim().toUpperCase();
  if (form.members.some((m) => m.trim().toUpperCase() === normalized)) {
    return true;
  }
  if (!form.ranges || !/^(?:0|[1-9]\d*)$/.test(normalized)) {
    return false;
  }
  const candidate = parseInt(normalized, 10);
  return form.ranges.some(({ start, end }) => start <= candidate && candidate <= end);
}

/**
 * Inclusive range check, trying decimal, then hexadecimal, then plain string
 * ordering ("0000 to FFFF", "AA to ZZ").
 */
function isWithinRange(value: string, range: RangeCriteria): boolean {
  const decimal = [value, range.min, range.max].map(parseStrictNumber);
  const [val, min, max] = decimal;
  if (val !== null && min !== null && max !== null) {
    return min <= val && val <= max;
  }

  const [hexVal, hexMin, hexMax] = [value, range.min, range.max].map(parseHex);
  if (hexVal !== null && hexMin !== null && hexMax !== null) {
    return hexMin <= hexVal && hexVal <= hexMax;
  }

  return range.min <= value && value <= range.max;
}

function parseOctet(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  const octet = parseInt(trimmed, 10);
  return octet >= 0 && octet <= OCTET_MAX ? octet : null;
}

/**
 * Two octets packed into 3-character fields ("192168", "255  0"). Leading
 * padding may have been trimmed, so 4-5 character values are split at the
 * first point where both halves are valid octets.
 */
function isPackedOctetPair(value: string, form: ComplexRangeCriteria): boolean {
  if (form.alternative && value.trim().toUpperCase() === form.alternative.toUpperCase()) {
    return true;
  }

  const packed = value.trim();
  if (packed.length < 4 || packed.length > 6) return false;

  if (packed.length === 6) {
    return parseOctet(packed.slice(0, 3)) !== null && parseOctet(packed.slice(3)) !== null;
  }

  for (let split = 1; split < packed.length; split++) {
    if (parseOctet(packed.slice(0, split)) !== null && parseOctet(packed.slice(split)) !== null) {
      return true;
    }
  }
  return false;
}
