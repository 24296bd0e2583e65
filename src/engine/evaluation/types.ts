/**
 * Evaluation engine — types.
 * Stages: draft → scored → classified → decided → sealed.
 */

import type { RiskCategory, RiskInput } from "@/domain/risk/risk.schema";
import type { Decision, DecisionOutcome, DecisionOverride, DecisionResolution } from "@/domain/decision/decision.types";
import type { DeepReadonly } from "@/lib/deepFreeze";

/** Both dimensions rescaled onto [0,1]. */
export type NormalizedScore = {
  likelihood: number;
  impact: number;
};

/** Band that matched the overall score; `upperClosed` only for the top band. */
export type BandMatch = {
  category: RiskCategory;
  min: number;
  max: number;
  upperClosed: boolean;
};

export type RationaleStep =
  | "normalize.likelihood"
  | "normalize.impact"
  | "aggregate"
  | "classify"
  | "decide"
  | "override";

export type RationaleStatement = {
  step: RationaleStep;
  text: string;
};

export type Rationale = readonly RationaleStatement[];

/** Inputs collected and validated; a private copy of what the caller supplied. */
export type DraftEvaluation = {
  readonly stage: "draft";
  readonly input: RiskInput;
};

export type ScoredEvaluation = {
  readonly stage: "scored";
  readonly input: RiskInput;
  readonly normalized: NormalizedScore;
  readonly overall: number;
};

export type ClassifiedEvaluation = {
  readonly stage: "classified";
  readonly input: RiskInput;
  readonly normalized: NormalizedScore;
  readonly overall: number;
  readonly band: BandMatch;
};

export type DecidedEvaluation = {
  readonly stage: "decided";
  readonly input: RiskInput;
  readonly normalized: NormalizedScore;
  readonly overall: number;
  readonly band: BandMatch;
  readonly decision: DecisionOutcome;
  readonly rationale: Rationale;
};

export type EvaluationStage =
  | DraftEvaluation
  | ScoredEvaluation
  | ClassifiedEvaluation
  | DecidedEvaluation;

/** Source of the seal timestamp. Read exactly once per evaluation. */
export type Clock = () => Date;

/**
 * Sealed evaluation. Deep-frozen at runtime and read-only at the type level;
 * corrections produce a new record.
 */
export type AuditRecord = {
  readonly policyVersion: string;
  /** SHA-256 of the canonical policy configuration the record was computed under. */
  readonly policyHash: string;
  /** UTC, ISO-8601. */
  readonly sealedAt: string;
  /** SHA-256 of the canonical risk input. */
  readonly inputHash: string;
  readonly input: DeepReadonly<RiskInput>;
  readonly normalized: Readonly<NormalizedScore>;
  readonly overall: number;
  readonly category: RiskCategory;
  readonly band: Readonly<BandMatch>;
  readonly computedDecision: Decision;
  readonly appliedDecision: Decision;
  readonly resolvedBy: DecisionResolution;
  readonly override?: Readonly<DecisionOverride>;
  readonly rationale: readonly Readonly<RationaleStatement>[];
};

export type FieldDifference = {
  path: string;
  left: unknown;
  right: unknown;
};

export type NotComparable = {
  comparable: false;
  reason: "NotComparable";
  leftVersion: string;
  rightVersion: string;
};

export type RecordComparison =
  | { comparable: true; policyVersion: string; differences: FieldDifference[] }
  | NotComparable;
