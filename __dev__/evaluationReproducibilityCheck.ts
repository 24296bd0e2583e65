/**
 * Minimal check: every rating pair evaluates to the same record twice under v1,
 * categories never fall as either rating rises, and hashes ignore construction order.
 * Run from repo root: npx tsx __dev__/evaluationReproducibilityCheck.ts
 */

import { BASELINE_POLICY_V1 } from "../src/config/policyBaseline";
import { RISK_CATEGORIES } from "../src/domain/risk/risk.schema";
import { fixedClock, ratingGridInputs } from "../src/dev/fixtures";
import { compare, evaluateRisk, fingerprint } from "../src/engine/evaluation";

function run(): number {
  const records = ratingGridInputs.map((input) => evaluateRisk(input, BASELINE_POLICY_V1, { clock: fixedClock }));

  for (const [i, input] of ratingGridInputs.entries()) {
    const again = evaluateRisk(input, BASELINE_POLICY_V1, { clock: fixedClock });
    const first = records[i];
    if (!first) continue;
    const result = compare(first, again);
    if (!result.comparable || result.differences.length > 0) {
      console.error("[evaluationReproducibilityCheck] FAIL: re-evaluation differs for input", i);
      return 1;
    }
  }
  console.log("[evaluationReproducibilityCheck] OK: re-evaluation is field-identical.");

  const rank = (i: number) => RISK_CATEGORIES.indexOf(records[i]?.category ?? "Low");
  for (let l = 0; l < 5; l++) {
    for (let s = 0; s < 5; s++) {
      const here = rank(l * 5 + s);
      if ((s < 4 && rank(l * 5 + s + 1) < here) || (l < 4 && rank((l + 1) * 5 + s) < here)) {
        console.error("[evaluationReproducibilityCheck] FAIL: category inversion at", { likelihood: l + 1, severity: s + 1 });
        return 1;
      }
    }
  }
  console.log("[evaluationReproducibilityCheck] OK: categories are monotonic in both ratings.");

  const sample = ratingGridInputs[7];
  if (sample) {
    const reordered = {
      impact: { ...sample.impact, domains: [...sample.impact.domains].reverse() },
      likelihood: { signals: sample.likelihood.signals, basis: sample.likelihood.basis, confidence: sample.likelihood.confidence, rating: sample.likelihood.rating },
    };
    if (fingerprint(reordered) !== fingerprint(sample)) {
      console.error("[evaluationReproducibilityCheck] FAIL: fingerprint depends on construction order.");
      return 1;
    }
  }
  console.log("[evaluationReproducibilityCheck] OK: fingerprint ignores construction order.");
  return 0;
}

process.exit(run());
