/**
 * Criteria Classifier
 *
 * Turns free-form S/B text ("0 to 604799", "27535 +/- 5", "May be 1 - 9, A, B or C",
 * "= VEN2.01/02", ...) into a typed CriteriaForm. Classification is total: text
 * that matches nothing else becomes an EXACT criteria.
 *
 * Rule order matters because the surface forms overlap. For example
 * "May be 0 to 9" contains " to " but must reach the "may be" rule, and
 * "in range of 0 to 255" must not be read as a plain range.
 */

import type { CriteriaForm, SubRange } from "./types";

const OR_SEPARATOR = /\s+or\s+/i;
const NUMERIC_RANGE = /^\s*([+-]?\d+(?:\.\d+)?)\s*-\s*([+-]?\d+(?:\.\d+)?)\s*$/;
const TOLERANCE = /^([+-]?\s*\d+(?:\.\d+)?)\s*(?:\+\/-|±)\s*(\d+(?:\.\d+)?)/;
const GREATER_THAN = /^>\s*([+-]?\d+(?:\.\d+)?)/;
const EMBEDDED_SUB_RANGE = /(\d+)\s*-+\s*(\d+)/;

// Words that only describe the field width ("XX May be ...") and are never
// acceptable values themselves.
const DESCRIPTIVE_TOKENS = ["may be", "x x", "xx ", " xx", "xxx"];

export function classifyCriteria(text: string): CriteriaForm {
  const criteria = text.trim();
  const lower = criteria.toLowerCase();

  if (criteria.startsWith("=")) {
    const reference = criteria.slice(1).trim();
    if (/[A-Za-z]/.test(reference) || reference.includes("/") || reference.includes(".")) {
      return { kind: "CROSS_REFERENCE", paramKey: reference };
    }
    return { kind: "EXACT", value: reference };
  }

  if (lower.includes("in range of")) {
    const escape = criteria.match(/\s+or\s+(\w+)\s*$/i);
    return { kind: "COMPLEX_RANGE", alternative: escape ? escape[1] : null };
  }

  if (lower.includes(" to ") && !lower.includes("may be")) {
    const match = criteria.match(/^(.+?)\s+to\s+(.+)$/i);
    if (match) {
      return { kind: "RANGE", min: match[1].trim(), max: match[2].trim() };
    }
  }

  const numericRange = criteria.match(NUMERIC_RANGE);
  if (numericRange) {
    return { kind: "RANGE", min: numericRange[1], max: numericRange[2] };
  }

  if (lower.includes("greater than previous")) {
    const match = criteria.match(/greater than previous\s+(.*)$/i);
    const paramKey = match ? match[1].trim() : "";
    if (paramKey.length > 0) {
      return { kind: "GREATER_THAN_PREVIOUS", paramKey };
    }
    return { kind: "UNVALIDATABLE" };
  }

  if (criteria.startsWith(">")) {
    const match = criteria.match(GREATER_THAN);
    if (match) {
      return { kind: "GREATER_THAN", threshold: parseFloat(match[1]) };
    }
  }

  if (criteria.includes("+/-") || criteria.includes("±")) {
    const match = criteria.match(TOLERANCE);
    if (match) {
      return {
        kind: "TOLERANCE",
        target: parseFloat(match[1].replace(/ /g, "")),
        tolerance: parseFloat(match[2]),
      };
    }
  }

  if (lower.includes("may be")) {
    const mayBe = classifyMayBe(criteria);
    if (mayBe) return mayBe;
  }

  if (lower.includes(" or ")) {
    return { kind: "SET", members: criteria.split(OR_SEPARATOR).map((v) => v.trim()) };
  }

  return { kind: "EXACT", value: criteria };
}

/**
 * Sub-classifies the text after "may be". Returns null when none of the
 * may-be shapes apply so the caller can keep going down the rule list.
 */
function classifyMayBe(criteria: string): CriteriaForm | null {
  const match = criteria.match(/may be\s+(.+)$/i);
  if (!match) return null;
  const rangeText = match[1].trim();
  const lower = rangeText.toLowerCase();

  const hasSubRange = rangeText.includes(" - ") || lower.includes(" to ");
  const hasList = rangeText.includes(",") || lower.includes(" or ");

  if (hasSubRange && hasList) {
    const members: string[] = [];
    const ranges: SubRange[] = [];
    for (const part of splitList(rangeText)) {
      const subRange = part.match(EMBEDDED_SUB_RANGE);
      if (subRange) {
        ranges.push({ start: parseInt(subRange[1], 10), end: parseInt(subRange[2], 10) });
      } else if (!isDescriptive(part)) {
        members.push(part);
      }
    }
    return { kind: "SET", members, ranges };
  }

  if (hasList) {
    return { kind: "SET", members: splitList(rangeText) };
  }

  if (lower.includes(" to ")) {
    const bounds = rangeText.match(/^(\d+)\s+to\s+(\d+)/i);
    return bounds ? { kind: "RANGE", min: bounds[1], max: bounds[2] } : null;
  }

  if (rangeText.includes("-")) {
    const parts = rangeText.split(/\s*-\s*/);
    if (parts.length === 2) {
      return { kind: "RANGE", min: parts[0].trim(), max: parts[1].trim() };
    }
  }

  return null;
}

function isDescriptive(part: string): boolean {
  const lower = part.toLowerCase();
  return /^x+$/.test(lower) || DESCRIPTIVE_TOKENS.some((token) => lower.includes(token));
}

/** Splits on "or" first, then on commas; empty items are dropped. */
function splitList(text: string): string[] {
  return text
    .split(OR_SEPARATOR)
    .flatMap((orPart) => orPart.split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
