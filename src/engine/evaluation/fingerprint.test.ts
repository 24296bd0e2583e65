import { describe, it } from "node:test";
import assert from "node:assert";
import { fingerprint, fingerprintPolicy } from "./fingerprint";
import { BASELINE_POLICY_V1 } from "@/config/policyBaseline";
import { parsePolicy } from "@/lib/loadPolicy";
import { highInput } from "@/dev/fixtures";
import type { RiskInput } from "@/domain/risk/risk.schema";

describe("fingerprint", () => {
  it("is a SHA-256 hex digest and stable across calls", () => {
    const hash = fingerprint(highInput);
    assert.match(hash, /^[0-9a-f]{64}$/);
    assert.strictEqual(fingerprint(highInput), hash);
  });

  it("ignores key order and impact domain order", () => {
    const reordered: RiskInput = {
      impact: {
        acceptabilityHint: highInput.impact.acceptabilityHint,
        confidence: highInput.impact.confidence,
        severity: highInput.impact.severity,
        reversibility: highInput.impact.reversibility,
        worstCredibleOutcome: highInput.impact.worstCredibleOutcome,
        domains: [...highInput.impact.domains].reverse(),
      },
      likelihood: {
        signals: [...highInput.likelihood.signals],
        basis: highInput.likelihood.basis,
        confidence: highInput.likelihood.confidence,
        rating: highInput.likelihood.rating,
      },
    };
    assert.strictEqual(fingerprint(reordered), fingerprint(highInput));
  });

  it("changes when any single field changes, confidence included", () => {
    const base = fingerprint(highInput);
    const variants: RiskInput[] = [
      { ...highInput, likelihood: { ...highInput.likelihood, rating: 4 } },
      { ...highInput, likelihood: { ...highInput.likelihood, confidence: 4 } },
      { ...highInput, likelihood: { ...highInput.likelihood, basis: "assumption" } },
      { ...highInput, likelihood: { ...highInput.likelihood, signals: [...highInput.likelihood.signals].reverse() } },
      { ...highInput, impact: { ...highInput.impact, confidence: 1 } },
      { ...highInput, impact: { ...highInput.impact, severity: 4 } },
      { ...highInput, impact: { ...highInput.impact, domains: ["financial"] } },
      { ...highInput, impact: { ...highInput.impact, reversibility: "not_reversible" } },
      { ...highInput, impact: { ...highInput.impact, worstCredibleOutcome: "Plant offline for three weeks" } },
      { ...highInput, impact: { ...highInput.impact, acceptabilityHint: "yes" } },
    ];
    const hashes = variants.map(fingerprint);
    for (const hash of hashes) assert.notStrictEqual(hash, base);
    assert.strictEqual(new Set(hashes).size, variants.length);
  });
});

describe("fingerprintPolicy", () => {
  it("differs between policy versions with otherwise equal settings", () => {
    const v2 = parsePolicy({ ...BASELINE_POLICY_V1, policyVersion: "v2" });
    assert.notStrictEqual(fingerprintPolicy(v2), fingerprintPolicy(BASELINE_POLICY_V1));
    assert.strictEqual(fingerprintPolicy(BASELINE_POLICY_V1), fingerprintPolicy(parsePolicy({ ...BASELINE_POLICY_V1 })));
  });
});
