export * from "@/engine/evaluation";
export { assessAcceptance, authorityMaxScore } from "@/engine/governance/acceptance";
export type { AcceptanceAssessment, AcceptanceResult } from "@/engine/governance/types";

export {
  RiskInputSchema,
  RiskCategorySchema,
  RISK_CATEGORIES,
  RATING_MIN,
  RATING_MAX,
} from "@/domain/risk/risk.schema";
export type {
  RiskInput,
  LikelihoodInput,
  ImpactInput,
  RiskCategory,
  LikelihoodBasis,
  ImpactDomain,
  Reversibility,
  AcceptabilityHint,
} from "@/domain/risk/risk.schema";
export { DecisionSchema } from "@/domain/decision/decision.types";
export type { Decision, DecisionOverride, DecisionOutcome, TieBreaks } from "@/domain/decision/decision.types";
export { PolicySchema } from "@/domain/policy/policy.schema";
export type { Policy, PolicyConfig, Band } from "@/domain/policy/policy.schema";

export { parsePolicy, loadPolicyFile } from "@/lib/loadPolicy";
export { BASELINE_POLICY_V1, BASELINE_POLICY_V1_FILE } from "@/config/policyBaseline";
export {
  EvaluationError,
  InvalidInputError,
  InvalidOverrideError,
  InvariantViolationError,
  InvalidPolicyError,
  isEvaluationError,
} from "@/lib/errors";
export type { EvaluationErrorCode } from "@/lib/errors";
