/**
 * Content hashes for audit identity. Canonical JSON (sorted keys) + SHA-256.
 * Impact domains are a set, so they are sorted; every other field hashes as given,
 * confidence included.
 */

import type { RiskInput } from "@/domain/risk/risk.schema";
import type { Policy } from "@/domain/policy/policy.schema";
import type { DeepReadonly } from "@/lib/deepFreeze";
import { sha256Canonical } from "@/lib/canonicalJson";

export function canonicalInput(input: DeepReadonly<RiskInput>): RiskInput {
  return {
    likelihood: {
      rating: input.likelihood.rating,
      confidence: input.likelihood.confidence,
      basis: input.likelihood.basis,
      signals: [...input.likelihood.signals],
    },
    impact: {
      domains: [...input.impact.domains].sort(),
      worstCredibleOutcome: input.impact.worstCredibleOutcome,
      reversibility: input.impact.reversibility,
      severity: input.impact.severity,
      confidence: input.impact.confidence,
      acceptabilityHint: input.impact.acceptabilityHint,
    },
  };
}

export function fingerprint(input: DeepReadonly<RiskInput>): string {
  return sha256Canonical(canonicalInput(input));
}

export function fingerprintPolicy(policy: Policy): string {
  return sha256Canonical(policy);
}
