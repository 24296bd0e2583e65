/**
 * Acceptance authority — who may accept a sealed risk under a policy's thresholds.
 * Reads a record; never changes it or the computed decision.
 */

import type { Policy } from "@/domain/policy/policy.schema";
import type { AuditRecord } from "@/engine/evaluation/types";
import type { AcceptanceResult } from "./types";

/** Highest overall score the role may accept; roles missing from the matrix get 0. */
export function authorityMaxScore(policy: Policy, role: string): number {
  return policy.acceptance.authority.find((row) => row.role === role)?.maxScoreToAccept ?? 0;
}

export function assessAcceptance(record: AuditRecord, policy: Policy, role: string): AcceptanceResult {
  if (record.policyVersion !== policy.policyVersion) {
    return {
      comparable: false,
      reason: "NotComparable",
      leftVersion: record.policyVersion,
      rightVersion: policy.policyVersion,
    };
  }
  const { overall } = record;
  const { escalationThreshold, hardBlockThreshold } = policy.acceptance;
  const roleMaxScore = authorityMaxScore(policy, role);
  const hardBlocked = overall >= hardBlockThreshold;
  const withinAuthority = overall <= roleMaxScore;

  return {
    comparable: true,
    role,
    overall,
    requiresEscalation: overall >= escalationThreshold,
    hardBlocked,
    roleMaxScore,
    withinAuthority,
    permitted: !hardBlocked && withinAuthority,
  };
}
