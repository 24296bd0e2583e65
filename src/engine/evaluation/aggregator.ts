/**
 * Aggregator — overall = likelihood × impact.
 * Zero in either dimension forces zero; only both at 1 reaches 1. No weights, no clamping.
 */

import type { Aggregation } from "@/domain/policy/policy.schema";
import { assertClosed01 } from "@/lib/invariants";

const OPERATORS: Record<Aggregation, (likelihood: number, impact: number) => number> = {
  product: (likelihood, impact) => likelihood * impact,
};

export function aggregate(likelihoodNorm: number, impactNorm: number, operator: Aggregation = "product"): number {
  assertClosed01("likelihood_norm", likelihoodNorm);
  assertClosed01("impact_norm", impactNorm);
  const overall = OPERATORS[operator](likelihoodNorm, impactNorm);
  assertClosed01("overall", overall);
  return overall;
}
