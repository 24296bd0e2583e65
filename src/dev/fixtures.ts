/**
 * Dev-only fixtures for the reproducibility check and tests.
 * Deterministic inputs and a fixed clock — same every run.
 */

import type { RiskInput } from "@/domain/risk/risk.schema";
import { createRiskInput } from "@/domain/risk/risk.factory";
import type { Clock } from "@/engine/evaluation/types";

export const FIXED_SEAL_TIME = "2026-01-15T12:00:00.000Z";

export const fixedClock: Clock = () => new Date(FIXED_SEAL_TIME);

/** Likelihood 4, severity 3: overall 0.375, Medium. */
export const mediumInput: RiskInput = createRiskInput({
  likelihood: { rating: 4 },
  impact: { severity: 3 },
});

/** Likelihood 3, severity 5: overall 0.5, High. */
export const highInput: RiskInput = createRiskInput({
  likelihood: { rating: 3, basis: "historical_data", signals: ["Two outages last year", "Vendor under review"] },
  impact: {
    domains: ["financial", "operational"],
    worstCredibleOutcome: "Plant offline for two weeks",
    reversibility: "partially",
    severity: 5,
    acceptabilityHint: "no",
  },
});

/** Every legal rating pair, likelihood-major. */
export const ratingGridInputs: RiskInput[] = [1, 2, 3, 4, 5].flatMap((likelihood) =>
  [1, 2, 3, 4, 5].map((severity) =>
    createRiskInput({ likelihood: { rating: likelihood }, impact: { severity } })
  )
);
