/**
 * Evaluation engine — pure deterministic stages plus the sealing step.
 */

export type {
  NormalizedScore,
  BandMatch,
  RationaleStep,
  RationaleStatement,
  Rationale,
  DraftEvaluation,
  ScoredEvaluation,
  ClassifiedEvaluation,
  DecidedEvaluation,
  EvaluationStage,
  Clock,
  AuditRecord,
  FieldDifference,
  NotComparable,
  RecordComparison,
} from "./types";

export { normalize, validateConfidence, scoreInput } from "./scorer";
export { aggregate } from "./aggregator";
export { classify } from "./classifier";
export { baselineDecision, validateOverride, decide } from "./decisionRules";
export { explain, formatNumber } from "./explainability";
export { canonicalInput, fingerprint, fingerprintPolicy } from "./fingerprint";
export { seal, compare, systemClock } from "./auditTrail";
export {
  createDraft,
  scoreDraft,
  classifyScored,
  decideClassified,
  sealDecided,
  evaluateRisk,
} from "./pipeline";
export type { EvaluateOptions } from "./pipeline";
