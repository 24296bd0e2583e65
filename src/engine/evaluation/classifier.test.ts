import { describe, it } from "node:test";
import assert from "node:assert";
import { classify } from "./classifier";
import { BASELINE_POLICY_V1 } from "@/config/policyBaseline";
import { RISK_CATEGORIES } from "@/domain/risk/risk.schema";
import { InvariantViolationError } from "@/lib/errors";

const bands = BASELINE_POLICY_V1.bands;

describe("classify", () => {
  it("matches the band containing the score", () => {
    assert.deepStrictEqual(classify(0.375, bands), { category: "Medium", min: 0.2, max: 0.4, upperClosed: false });
    assert.strictEqual(classify(0.45, bands).category, "High");
    assert.strictEqual(classify(0.1875, bands).category, "Low");
  });

  it("uses half-open bands with the top band closed", () => {
    assert.strictEqual(classify(0, bands).category, "Low");
    assert.strictEqual(classify(0.2, bands).category, "Medium");
    assert.strictEqual(classify(0.4, bands).category, "High");
    assert.strictEqual(classify(0.7, bands).category, "Critical");
    assert.deepStrictEqual(classify(1, bands), { category: "Critical", min: 0.7, max: 1, upperClosed: true });
  });

  it("is total and monotonic over [0,1]", () => {
    let previous = 0;
    for (let i = 0; i <= 1000; i++) {
      const rank = RISK_CATEGORIES.indexOf(classify(i / 1000, bands).category);
      assert(rank >= previous, `category fell at ${i / 1000}`);
      previous = rank;
    }
    assert.strictEqual(previous, RISK_CATEGORIES.length - 1);
  });

  it("rejects scores outside [0,1] without clamping", () => {
    for (const overall of [-0.01, 1.01, Number.NaN]) {
      assert.throws(() => classify(overall, bands), InvariantViolationError);
    }
  });
});
