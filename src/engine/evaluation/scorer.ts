/**
 * Scorer — raw 1–5 ratings onto [0,1]. Pure; confidence is validated and passed through untouched.
 */

import { RATING_MAX, RATING_MIN } from "@/domain/risk/risk.schema";
import type { RiskInput } from "@/domain/risk/risk.schema";
import type { Policy } from "@/domain/policy/policy.schema";
import { InvalidInputError, InvariantViolationError } from "@/lib/errors";
import type { NormalizedScore } from "./types";

function isRating(value: number): boolean {
  return Number.isInteger(value) && value >= RATING_MIN && value <= RATING_MAX;
}

/** (raw - min) / (max - min); 1 → 0, 5 → 1 under the baseline parameters. */
export function normalize(raw: number, normalization: Policy["normalization"]): number {
  if (!isRating(raw)) {
    throw new InvalidInputError(`Rating must be an integer in ${RATING_MIN}..${RATING_MAX}, got ${raw}`, { raw });
  }
  const { min, max } = normalization;
  if (max <= min || raw < min || raw > max) {
    throw new InvariantViolationError(`Normalization range ${min}..${max} does not cover rating ${raw}`, {
      raw,
      min,
      max,
    });
  }
  return (raw - min) / (max - min);
}

/** Returns the confidence unchanged once it is known to be an integer in 1..5. */
export function validateConfidence(value: number): number {
  if (!isRating(value)) {
    throw new InvalidInputError(`Confidence must be an integer in ${RATING_MIN}..${RATING_MAX}, got ${value}`, {
      confidence: value,
    });
  }
  return value;
}

/** Validates both confidences before normalizing either rating. */
export function scoreInput(input: RiskInput, normalization: Policy["normalization"]): NormalizedScore {
  validateConfidence(input.likelihood.confidence);
  validateConfidence(input.impact.confidence);
  return {
    likelihood: normalize(input.likelihood.rating, normalization),
    impact: normalize(input.impact.severity, normalization),
  };
}
