import type { ImpactInput, LikelihoodInput, RiskInput } from "./risk.schema";

const DEFAULT_LIKELIHOOD: LikelihoodInput = {
  rating: 3,
  confidence: 3,
  basis: "expert_judgement",
  signals: ["Supplier lead times slipping"],
};

const DEFAULT_IMPACT: ImpactInput = {
  domains: ["operational"],
  worstCredibleOutcome: "Commissioning delayed by one quarter",
  reversibility: "partially",
  severity: 3,
  confidence: 3,
  acceptabilityHint: "only_under_conditions",
};

export type RiskInputOverrides = {
  likelihood?: Partial<LikelihoodInput>;
  impact?: Partial<ImpactInput>;
};

/**
 * Builds a complete RiskInput from partial dimensions. Returns fresh arrays so
 * callers never share state with the defaults.
 */
export function createRiskInput(partial?: RiskInputOverrides): RiskInput {
  const likelihood = { ...DEFAULT_LIKELIHOOD, ...partial?.likelihood };
  const impact = { ...DEFAULT_IMPACT, ...partial?.impact };

  return {
    likelihood: {
      rating: likelihood.rating,
      confidence: likelihood.confidence,
      basis: likelihood.basis,
      signals: [...likelihood.signals],
    },
    impact: {
      domains: [...impact.domains],
      worstCredibleOutcome: impact.worstCredibleOutcome,
      reversibility: impact.reversibility,
      severity: impact.severity,
      confidence: impact.confidence,
      acceptabilityHint: impact.acceptabilityHint,
    },
  };
}
