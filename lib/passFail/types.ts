/**
 * Types shared by the pass/fail criteria interpreter.
 *
 * A criteria form is derived from the S/B text alone. Verdicts are produced by
 * the evaluator; INCONCLUSIVE means the marker is left as-is.
 */

export type Verdict = "PASS" | "FAIL" | "INCONCLUSIVE";

export type CriteriaKind =
  | "EXACT"
  | "SET"
  | "RANGE"
  | "TOLERANCE"
  | "GREATER_THAN"
  | "GREATER_THAN_PREVIOUS"
  | "CROSS_REFERENCE"
  | "COMPLEX_RANGE"
  | "UNVALIDATABLE";

export type ExactCriteria = { kind: "EXACT"; value: string };
/** Inclusive integer bounds from a "may be" list item such as "1 - 9". */
export type SubRange = { start: number; end: number };
/**
 * Members may include the literal "blank", which matches an empty value.
 * `ranges` holds numeric sub-ranges of a mixed "may be" list.
 */
export type SetCriteria = { kind: "SET"; members: string[]; ranges?: SubRange[] };
/** Bounds stay as text: they may be decimal, hexadecimal or plain strings. */
export type RangeCriteria = { kind: "RANGE"; min: string; max: string };
export type ToleranceCriteria = { kind: "TOLERANCE"; target: number; tolerance: number };
export type GreaterThanCriteria = { kind: "GREATER_THAN"; threshold: number };
export type GreaterThanPreviousCriteria = { kind: "GREATER_THAN_PREVIOUS"; paramKey: string };
export type CrossReferenceCriteria = { kind: "CROSS_REFERENCE"; paramKey: string };
/** Two packed 3-digit octets, e.g. "192168". `alternative` is an escape literal such as "DSABLD". */
export type ComplexRangeCriteria = { kind: "COMPLEX_RANGE"; alternative: string | null };
export type UnvalidatableCriteria = { kind: "UNVALIDATABLE" };

export type CriteriaForm =
  | ExactCriteria
  | SetCriteria
  | RangeCriteria
  | ToleranceCriteria
  | GreaterThanCriteria
  | GreaterThanPreviousCriteria
  | CrossReferenceCriteria
  | ComplexRangeCriteria
  | UnvalidatableCriteria;

/** Last value seen per parameter key within one document scan. */
export type ParameterHistory = Map<string, number | string>;

/**
 * How numeric forms (TOLERANCE, GREATER_THAN) read the measured value.
 * - UNIT_AWARE: leading signed decimal, trailing units ignored ("27.5 Hz" -> 27.5)
 * - STRICT: the whole value must be a number ("27.5 Hz" -> no number)
 */
export type NumericParsing = "UNIT_AWARE" | "STRICT";

/**
 * How the pending marker is recognized at the end of a line.
 * - DECORATED: "PASS/FAIL" optionally followed by asterisks/spaces
 * - EXACT: "PASS/FAIL" followed only by whitespace
 */
export type MarkerMatching = "DECORATED" | "EXACT";

export interface InterpreterSettings {
  numericParsing: NumericParsing;
  markerMatching: MarkerMatching;
}

export interface ScanStats {
  total: number;
  passed: number;
  failed: number;
  /** 1-indexed */
  failedLineNumbers: number[];
  unchanged: number;
  /** 1-indexed */
  unchangedLineNumbers: number[];
}

export type UnchangedReason =
  | "NO_CRITERIA"
  | "NO_VALUE"
  | "INCONCLUSIVE";

/** Per-marker trace, used by the web form and batch logging. */
export interface LineResolution {
  lineNumber: number;
  criteriaText: string | null;
  criteriaKind: CriteriaKind | null;
  measuredValue: string | null;
  verdict: Verdict;
  reason?: UnchangedReason;
}

export interface ScanResult {
  lines: string[];
  stats: ScanStats;
  details: LineResolution[];
}
