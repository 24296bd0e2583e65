/**
 * Audit trail — seals a decided evaluation into an immutable record and compares
 * records computed under the same policy version.
 */

import type { Policy } from "@/domain/policy/policy.schema";
import { deepFreeze } from "@/lib/deepFreeze";
import { InvariantViolationError } from "@/lib/errors";
import { canonicalInput, fingerprint, fingerprintPolicy } from "./fingerprint";
import type { AuditRecord, Clock, DecidedEvaluation, FieldDifference, RecordComparison } from "./types";

export const systemClock: Clock = () => new Date();

/**
 * Binds policy version, a single timestamp read, the input hash and the full snapshot.
 * Everything is computed before the record exists, so no partial record is ever visible.
 */
export function seal(decided: DecidedEvaluation, policy: Policy, clock: Clock = systemClock): AuditRecord {
  const { stage } = decided;
  if (stage !== "decided") {
    throw new InvariantViolationError(`Only a decided evaluation can be sealed, got stage "${String(stage)}"`);
  }
  const inputHash = fingerprint(decided.input);
  const policyHash = fingerprintPolicy(policy);
  const sealedAt = clock().toISOString();
  const { decision } = decided;

  const record: AuditRecord = {
    policyVersion: policy.policyVersion,
    policyHash,
    sealedAt,
    inputHash,
    input: canonicalInput(decided.input),
    normalized: { ...decided.normalized },
    overall: decided.overall,
    category: decided.band.category,
    band: { ...decided.band },
    computedDecision: decision.computed,
    appliedDecision: decision.applied,
    resolvedBy: decision.resolvedBy,
    ...(decision.override ? { override: { ...decision.override } } : {}),
    rationale: decided.rationale.map((statement) => ({ ...statement })),
  };
  return deepFreeze(record);
}

function flatten(value: unknown, path: string, out: Map<string, unknown>): void {
  if (value !== null && typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value);
    for (const [key, member] of entries) flatten(member, path ? `${path}.${key}` : key, out);
    return;
  }
  out.set(path, value);
}

function leaves(record: AuditRecord): Map<string, unknown> {
  const out = new Map<string, unknown>();
  flatten({ ...record, input: canonicalInput(record.input) }, "", out);
  return out;
}

/**
 * Field-level differences between two records of the same policy version, sorted by path.
 * Records from different versions are not comparable; callers branch on `comparable`.
 */
export function compare(a: AuditRecord, b: AuditRecord): RecordComparison {
  if (a.policyVersion !== b.policyVersion) {
    return { comparable: false, reason: "NotComparable", leftVersion: a.policyVersion, rightVersion: b.policyVersion };
  }
  const left = leaves(a);
  const right = leaves(b);
  const paths = [...new Set([...left.keys(), ...right.keys()])].sort();
  const differences: FieldDifference[] = [];
  for (const path of paths) {
    const l = left.get(path);
    const r = right.get(path);
    if (!Object.is(l, r)) differences.push({ path, left: l, right: r });
  }
  return { comparable: true, policyVersion: a.policyVersion, differences };
}
