/**
 * DecisionRules — category → decision.
 * Low and Medium are fixed; High and Critical take the policy's tie-break default.
 * An override changes the applied decision only and is never remembered.
 */

import { z } from "zod";
import type { RiskCategory } from "@/domain/risk/risk.schema";
import type { Policy } from "@/domain/policy/policy.schema";
import { DecisionSchema } from "@/domain/decision/decision.types";
import type {
  Decision,
  DecisionOutcome,
  DecisionOverride,
  DecisionResolution,
} from "@/domain/decision/decision.types";
import { InvalidOverrideError } from "@/lib/errors";
import { formatZodIssues } from "@/lib/zodIssues";

const DecisionOverrideSchema = z.object({
  decision: DecisionSchema,
  justification: z.string().trim().min(1, "Override justification must not be empty"),
  owner: z.string().trim().min(1, "Override owner must not be empty"),
});

export function baselineDecision(
  category: RiskCategory,
  tieBreaks: Policy["tieBreaks"]
): { decision: Decision; resolvedBy: DecisionResolution } {
  switch (category) {
    case "Low":
      return { decision: "ACCEPT", resolvedBy: "fixed" };
    case "Medium":
      return { decision: "REDUCE", resolvedBy: "fixed" };
    case "High":
      return { decision: tieBreaks.high, resolvedBy: "tie-break" };
    case "Critical":
      return { decision: tieBreaks.critical, resolvedBy: "tie-break" };
  }
}

/** Rejects an override with a blank justification or owner, or with an unknown decision. */
export function validateOverride(override: DecisionOverride): DecisionOverride {
  const parsed = DecisionOverrideSchema.safeParse(override);
  if (!parsed.success) {
    throw new InvalidOverrideError(`Invalid override: ${formatZodIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }
  const { decision, justification, owner } = parsed.data;
  return { decision, justification, owner };
}

export function decide(
  category: RiskCategory,
  tieBreaks: Policy["tieBreaks"],
  override?: DecisionOverride
): DecisionOutcome {
  const { decision: computed, resolvedBy } = baselineDecision(category, tieBreaks);
  if (override === undefined) {
    return { category, computed, applied: computed, resolvedBy };
  }
  const valid = validateOverride(override);
  return { category, computed, applied: valid.decision, resolvedBy, override: valid };
}
