export { classifyCriteria } from "./criteriaClassifier";
export { evaluateCriteria, type EvaluationContext } from "./criteriaEvaluator";
export { resolveReference, matchesReference } from "./crossReference";
export {
  extractValue,
  extractKey,
  extractLeadingNumber,
  parseStrictNumber,
} from "./valueExtractor";
export { scanDocument, hasPendingMarkers, createParameterHistory } from "./documentScanner";
export { splitLines, joinLines } from "./lines";
export { PENDING_MARKER, DEFAULT_INTERPRETER_SETTINGS } from "./markers";
export type * from "./types";
