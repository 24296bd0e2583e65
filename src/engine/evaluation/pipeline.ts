/**
 * Evaluation pipeline — Draft → Scored → Classified → Decided → Sealed.
 * Each transition takes only its predecessor; the policy is always passed in, never ambient.
 */

import { RiskInputSchema } from "@/domain/risk/risk.schema";
import type { Policy } from "@/domain/policy/policy.schema";
import type { DecisionOverride } from "@/domain/decision/decision.types";
import { DEBUG_EVALUATION } from "@/config/debug";
import { dlog } from "@/lib/debug";
import { InvalidInputError, InvariantViolationError } from "@/lib/errors";
import { formatZodIssues } from "@/lib/zodIssues";
import { scoreInput } from "./scorer";
import { aggregate } from "./aggregator";
import { classify } from "./classifier";
import { decide } from "./decisionRules";
import { explain } from "./explainability";
import { seal, systemClock } from "./auditTrail";
import type {
  AuditRecord,
  ClassifiedEvaluation,
  Clock,
  DecidedEvaluation,
  DraftEvaluation,
  EvaluationStage,
  ScoredEvaluation,
} from "./types";

function assertStage<S extends EvaluationStage["stage"]>(
  evaluation: EvaluationStage,
  expected: S
): asserts evaluation is Extract<EvaluationStage, { stage: S }> {
  if (evaluation.stage !== expected) {
    throw new InvariantViolationError(`Expected a ${expected} evaluation, got ${evaluation.stage}`, {
      expected,
      actual: evaluation.stage,
    });
  }
}

/**
 * Validates the raw structure and takes a private copy. Nothing is scored if this throws.
 */
export function createDraft(raw: unknown): DraftEvaluation {
  const parsed = RiskInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid risk input: ${formatZodIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }
  return { stage: "draft", input: parsed.data };
}

export function scoreDraft(draft: DraftEvaluation, policy: Policy): ScoredEvaluation {
  assertStage(draft, "draft");
  const normalized = scoreInput(draft.input, policy.normalization);
  const overall = aggregate(normalized.likelihood, normalized.impact, policy.aggregation);
  return { stage: "scored", input: draft.input, normalized, overall };
}

export function classifyScored(scored: ScoredEvaluation, policy: Policy): ClassifiedEvaluation {
  assertStage(scored, "scored");
  const band = classify(scored.overall, policy.bands);
  return { stage: "classified", input: scored.input, normalized: scored.normalized, overall: scored.overall, band };
}

export function decideClassified(
  classified: ClassifiedEvaluation,
  policy: Policy,
  override?: DecisionOverride
): DecidedEvaluation {
  assertStage(classified, "classified");
  const decision = decide(classified.band.category, policy.tieBreaks, override);
  const rationale = explain(
    classified.input,
    classified.normalized,
    classified.overall,
    classified.band,
    decision,
    policy
  );
  return {
    stage: "decided",
    input: classified.input,
    normalized: classified.normalized,
    overall: classified.overall,
    band: classified.band,
    decision,
    rationale,
  };
}

export function sealDecided(decided: DecidedEvaluation, policy: Policy, clock: Clock = systemClock): AuditRecord {
  const record = seal(decided, policy, clock);
  if (DEBUG_EVALUATION) {
    dlog("[evaluation] sealed", {
      policyVersion: record.policyVersion,
      inputHash: record.inputHash,
      category: record.category,
      computed: record.computedDecision,
      applied: record.appliedDecision,
    });
  }
  return record;
}

export type EvaluateOptions = {
  override?: DecisionOverride;
  clock?: Clock;
};

/** Runs every stage in order and returns the sealed record. */
export function evaluateRisk(raw: unknown, policy: Policy, options: EvaluateOptions = {}): AuditRecord {
  const draft = createDraft(raw);
  const scored = scoreDraft(draft, policy);
  const classified = classifyScored(scored, policy);
  const decided = decideClassified(classified, policy, options.override);
  return sealDecided(decided, policy, options.clock);
}
