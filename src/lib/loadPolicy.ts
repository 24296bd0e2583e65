/**
 * Policy configuration loading. Every policy is parsed through PolicySchema and deep-frozen,
 * so evaluations in flight can share it without copying.
 */

import { readFileSync } from "node:fs";
import { PolicySchema } from "@/domain/policy/policy.schema";
import type { Policy } from "@/domain/policy/policy.schema";
import { DEBUG_POLICY } from "@/config/debug";
import { dlog, dwarn } from "@/lib/debug";
import { deepFreeze } from "@/lib/deepFreeze";
import { InvalidPolicyError } from "@/lib/errors";
import { formatZodIssues } from "@/lib/zodIssues";
import { fingerprintPolicy } from "@/engine/evaluation/fingerprint";

export function parsePolicy(raw: unknown): Policy {
  const parsed = PolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidPolicyError(`Invalid policy: ${formatZodIssues(parsed.error.issues)}`, {
      issues: parsed.error.issues,
    });
  }
  return deepFreeze(parsed.data);
}

/** Reads a JSON policy file (path or file URL) and parses it. */
export function loadPolicyFile(path: string | URL): Policy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    if (DEBUG_POLICY) dwarn("[policy] unreadable", String(path), reason);
    throw new InvalidPolicyError(`Could not read policy file ${String(path)}: ${reason}`, { path: String(path) });
  }
  const policy = parsePolicy(raw);
  if (DEBUG_POLICY) dlog("[policy] loaded", policy.policyVersion, fingerprintPolicy(policy));
  return policy;
}
