/**
 * Document Scanner
 *
 * Walks a test log once, pairing every line that ends in the pending marker
 * ("PASS/FAIL") with its governing S/B criteria, evaluating the measured value
 * and rewriting the marker to PASS or FAIL.
 *
 * Usage:
 * ```typescript
 * const result = scanDocument(["MP 1 = 50", "S/B 0 to 100", "MP 1 PASS/FAIL"]);
 * // result.lines[2] === "MP 1 PASS"
 * // result.stats => { total: 1, passed: 1, failed: 0, unchanged: 0, ... }
 * ```
 *
 * Each call owns its parameter history, so documents in a batch never see each
 * other's "greater than previous" values.
 */

import { classifyCriteria } from "./criteriaClassifier";
import { evaluateCriteria } from "./criteriaEvaluator";
import {
  CRITERIA_SEARCH_WINDOW,
  CROSS_REFERENCE_VALUE_WINDOW,
  DEFAULT_INTERPRETER_SETTINGS,
  MEASUREMENT_SEARCH_WINDOW,
  PLACEHOLDER_CRITERIA,
  matchCriteria,
  matchPendingLine,
  rewriteMarker,
} from "./markers";
import type {
  CriteriaForm,
  InterpreterSettings,
  LineResolution,
  ParameterHistory,
  ScanResult,
  ScanStats,
  UnchangedReason,
} from "./types";
import { extractKey, extractLeadingNumber, extractValue } from "./valueExtractor";

export function createParameterHistory(): ParameterHistory {
  return new Map();
}

function emptyStats(): ScanStats {
  return {
    total: 0,
    passed: 0,
    failed: 0,
    failedLineNumbers: [],
    unchanged: 0,
    unchangedLineNumbers: [],
  };
}

export function hasPendingMarkers(
  lines: readonly string[],
  settings: InterpreterSettings = DEFAULT_INTERPRETER_SETTINGS
): boolean {
  return lines.some((line) => matchPendingLine(line, settings.markerMatching) !== null);
}

/**
 * Criteria governing the pending line at `index`: inline "S/B" on the line
 * itself, else the nearest S/B line above it within the search window.
 */
export function findCriteria(
  lines: readonly string[],
  index: number,
  content: string
): { text: string; inline: boolean } | null {
  const inline = matchCriteria(content);
  if (inline) {
    return { text: inline, inline: true };
  }

  const stop = Math.max(index - CRITERIA_SEARCH_WINDOW, -1);
  for (let j = index - 1; j > stop; j--) {
    const found = matchCriteria(lines[j]);
    if (!found) continue;

    let text = found;
    // "S/B XX" on one line, "May be 1 - 9, A, B or C" on the next
    if (j + 1 < lines.length) {
      const next = lines[j + 1].trim();
      if (next.toLowerCase().includes("may be") || (PLACEHOLDER_CRITERIA.includes(text) && next)) {
        text = `${text} ${next}`;
      }
    }
    return { text, inline: false };
  }
  return null;
}

interface Measurement {
  /** Parameter key the value is recorded under in the history. */
  key: string | null;
  value: string;
}

/**
 * Measured value for a cross-referenced parameter. The pending line reads
 * "MP 285 S/B = VEN2.01/02 PASS/FAIL", so the value lives on an earlier
 * "MP 285 = ..." (or "MP 285: ...") line.
 */
export function findCrossReferencedValue(
  lines: readonly string[],
  index: number,
  content: string
): Measurement | null {
  const param = content.match(/^(.+?)\s+S\/B\s*=/i);
  if (!param) return null;
  const paramName = param[1].trim();

  const stop = Math.max(index - CROSS_REFERENCE_VALUE_WINDOW, -1);
  for (let j = index - 1; j > stop; j--) {
    const line = lines[j];
    if (!line.includes(paramName) || line.includes("S/B")) continue;
    const match = line.trim().match(/[=:]\s*(.*)$/);
    if (match) {
      return { key: paramName, value: match[1].trim() };
    }
  }
  return null;
}

/**
 * Value for a bare sentinel such as "MP 1 PASS/FAIL" whose measurement was
 * logged earlier as "MP 1 = 50".
 */
export function findMeasurementAbove(
  lines: readonly string[],
  index: number,
  content: string,
  settings: InterpreterSettings
): Measurement | null {
  const paramName = content.trim().toLowerCase();
  if (!paramName) return null;

  const stop = Math.max(index - MEASUREMENT_SEARCH_WINDOW, -1);
  for (let j = index - 1; j > stop; j--) {
    const line = lines[j];
    if (matchCriteria(line)) continue;
    const key = extractKey(line);
    if (key === null || key.toLowerCase() !== paramName) continue;
    const value = extractValue(line, settings.markerMatching);
    if (value !== null) {
      return { key, value };
    }
  }
  return null;
}

/**
 * An inline cross-reference ("MP 285 S/B = VEN2.01 PASS/FAIL") leaves no value
 * on the pending line, so it is looked up above. Criteria found on an earlier
 * S/B line fall through to the ordinary "PARAM = VALUE" reading.
 */
function resolveMeasurement(
  lines: readonly string[],
  index: number,
  content: string,
  criteria: { form: CriteriaForm; inline: boolean },
  settings: InterpreterSettings
): Measurement | null {
  if (criteria.form.kind === "CROSS_REFERENCE" && criteria.inline) {
    return findCrossReferencedValue(lines, index, content);
  }

  const line = lines[index];
  const value = extractValue(line, settings.markerMatching);
  if (value !== null) {
    return { key: extractKey(line), value };
  }
  return findMeasurementAbove(lines, index, content, settings);
}

function recordHistory(history: ParameterHistory, measurement: Measurement): void {
  const { key, value } = measurement;
  if (!key || !value) return;
  history.set(key, extractLeadingNumber(value) ?? value);
}

export function scanDocument(
  lines: readonly string[],
  settings: InterpreterSettings = DEFAULT_INTERPRETER_SETTINGS
): ScanResult {
  const history = createParameterHistory();
  const stats = emptyStats();
  const details: LineResolution[] = [];
  const output: string[] = [];

  const leaveUnchanged = (resolution: Omit<LineResolution, "verdict">, reason: UnchangedReason) => {
    stats.unchanged += 1;
    stats.unchangedLineNumbers.push(resolution.lineNumber);
    details.push({ ...resolution, verdict: "INCONCLUSIVE", reason });
  };

  lines.forEach((line, index) => {
    const content = matchPendingLine(line, settings.markerMatching);
    if (content === null) {
      output.push(line);
      return;
    }

    stats.total += 1;
    const lineNumber = index + 1;
    const criteria = findCriteria(lines, index, content);

    if (!criteria) {
      output.push(line);
      leaveUnchanged(
        { lineNumber, criteriaText: null, criteriaKind: null, measuredValue: null },
        "NO_CRITERIA"
      );
      return;
    }

    const form = classifyCriteria(criteria.text);
    const measurement = resolveMeasurement(
      lines,
      index,
      content,
      { form, inline: criteria.inline },
      settings
    );
    const trace = {
      lineNumber,
      criteriaText: criteria.text,
      criteriaKind: form.kind,
      measuredValue: measurement ? measurement.value : null,
    };

    if (!measurement) {
      output.push(line);
      leaveUnchanged(trace, "NO_VALUE");
      return;
    }

    const verdict = evaluateCriteria(measurement.value, form, {
      history,
      document: lines,
      position: index,
      settings,
    });

    if (verdict === "INCONCLUSIVE") {
      output.push(line);
      leaveUnchanged(trace, "INCONCLUSIVE");
      return;
    }

    if (verdict === "PASS") {
      stats.passed += 1;
    } else {
      stats.failed += 1;
      stats.failedLineNumbers.push(lineNumber);
    }
    details.push({ ...trace, verdict });
    output.push(rewriteMarker(line, verdict, settings.markerMatching));
    recordHistory(history, measurement);
  });

  return { lines: output, stats, details };
}
