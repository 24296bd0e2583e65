/**
 * Governance engine — acceptance authority types.
 */

import type { NotComparable } from "@/engine/evaluation/types";

/** Outcome of checking whether a role may accept a sealed record's risk. */
export type AcceptanceAssessment = {
  comparable: true;
  role: string;
  overall: number;
  /** Overall at or above the escalation threshold: acceptance needs sign-off above the assessor. */
  requiresEscalation: boolean;
  /** Overall at or above the hard block threshold: no role may accept. */
  hardBlocked: boolean;
  /** The role's ceiling from the authority matrix; 0 for an unknown role. */
  roleMaxScore: number;
  withinAuthority: boolean;
  permitted: boolean;
};

export type AcceptanceResult = AcceptanceAssessment | NotComparable;
