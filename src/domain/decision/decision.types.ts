/**
 * Decision types — category → recommended action, with optional human override.
 */

import { z } from "zod";
import type { RiskCategory } from "@/domain/risk/risk.schema";

export const DecisionSchema = z.enum(["ACCEPT", "REDUCE", "MITIGATE", "STOP", "ESCALATE"]);
export type Decision = z.infer<typeof DecisionSchema>;

/** Admissible tie-break defaults for the two categories with a choice. */
export const HighDecisionSchema = z.enum(["REDUCE", "MITIGATE"]);
export type HighDecision = z.infer<typeof HighDecisionSchema>;

export const CriticalDecisionSchema = z.enum(["STOP", "ESCALATE"]);
export type CriticalDecision = z.infer<typeof CriticalDecisionSchema>;

export type TieBreaks = {
  high: HighDecision;
  critical: CriticalDecision;
};

/** Human override: replaces the applied decision, never the computed one. */
export type DecisionOverride = {
  decision: Decision;
  justification: string;
  /** Who took the decision. */
  owner: string;
};

/** How the computed decision was reached. */
export type DecisionResolution = "fixed" | "tie-break";

export type DecisionOutcome = {
  category: RiskCategory;
  /** Baseline mapping for the category under the policy's tie-breaks. */
  computed: Decision;
  /** Equals `computed` unless a valid override was supplied. */
  applied: Decision;
  resolvedBy: DecisionResolution;
  override?: DecisionOverride;
};
