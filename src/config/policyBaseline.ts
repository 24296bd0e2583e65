/**
 * Named baseline policy "v1". Numbers live in policies/v1.json; nothing here is a fallback:
 * callers pass a policy into every evaluation.
 */

import { loadPolicyFile } from "@/lib/loadPolicy";

export const BASELINE_POLICY_V1_FILE = new URL("../../policies/v1.json", import.meta.url);

export const BASELINE_POLICY_V1 = loadPolicyFile(BASELINE_POLICY_V1_FILE);
