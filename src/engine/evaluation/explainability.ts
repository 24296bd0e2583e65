/**
 * Explainability — one statement per computation step, in pipeline order.
 * Text depends only on (input, policy); the same pair always renders the same sequence.
 */

import type { RiskInput } from "@/domain/risk/risk.schema";
import type { Policy, ScaleLabels } from "@/domain/policy/policy.schema";
import type { DecisionOutcome } from "@/domain/decision/decision.types";
import type { BandMatch, NormalizedScore, Rationale, RationaleStatement } from "./types";

const RATING_KEYS = ["1", "2", "3", "4", "5"] as const;

const ADMISSIBLE = {
  High: "REDUCE, MITIGATE",
  Critical: "STOP, ESCALATE",
} as const;

/** Fixed-precision rendering with trailing zeros dropped: 0.3750 → "0.375". */
export function formatNumber(value: number, precision: number): string {
  return String(Number(value.toFixed(precision)));
}

function labelFor(labels: Readonly<ScaleLabels>, rating: number): string {
  const key = RATING_KEYS.find((k) => Number(k) === rating);
  return key === undefined ? String(rating) : labels[key];
}

export function explain(
  input: RiskInput,
  normalized: NormalizedScore,
  overall: number,
  band: BandMatch,
  decision: DecisionOutcome,
  policy: Policy
): Rationale {
  const fmt = (value: number) => formatNumber(value, policy.precision);
  const { min, max } = policy.normalization;
  const { likelihood, impact } = input;

  const statements: RationaleStatement[] = [
    {
      step: "normalize.likelihood",
      text:
        `Likelihood rated ${likelihood.rating}/${max} "${labelFor(policy.labels.likelihood, likelihood.rating)}" ` +
        `-> ${fmt(normalized.likelihood)} via (${likelihood.rating} - ${min}) / (${max} - ${min}); ` +
        `basis ${likelihood.basis}; ${likelihood.signals.length} signal(s); ` +
        `confidence ${likelihood.confidence}/${max} (not scored).`,
    },
    {
      step: "normalize.impact",
      text:
        `Impact severity ${impact.severity}/${max} "${labelFor(policy.labels.impact, impact.severity)}" ` +
        `-> ${fmt(normalized.impact)} via (${impact.severity} - ${min}) / (${max} - ${min}); ` +
        `domains ${[...impact.domains].sort().join(", ")}; reversibility ${impact.reversibility}; ` +
        `acceptability hint ${impact.acceptabilityHint}; confidence ${impact.confidence}/${max} (not scored).`,
    },
    {
      step: "aggregate",
      text: `Overall risk = ${fmt(normalized.likelihood)} x ${fmt(normalized.impact)} = ${fmt(overall)} (${policy.aggregation}).`,
    },
    {
      step: "classify",
      text: `Overall ${fmt(overall)} falls in ${band.category} band [${fmt(band.min)}, ${fmt(band.max)}${band.upperClosed ? "]" : ")"}.`,
    },
    {
      step: "decide",
      text:
        decision.category === "High" || decision.category === "Critical"
          ? `${decision.category} maps to ${decision.computed} (tie-break default of policy ${policy.policyVersion}; admissible: ${ADMISSIBLE[decision.category]}).`
          : `${decision.category} maps to ${decision.computed} (fixed mapping).`,
    },
    {
      step: "override",
      text: decision.override
        ? `Override by ${decision.override.owner} applied: ${decision.applied} replaces computed ${decision.computed}; justification: "${decision.override.justification}".`
        : `No override; applied decision is ${decision.applied}.`,
    },
  ];
  return statements;
}
