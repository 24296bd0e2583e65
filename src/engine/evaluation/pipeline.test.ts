import { describe, it } from "node:test";
import assert from "node:assert";
import { classifyScored, createDraft, decideClassified, evaluateRisk, scoreDraft, sealDecided } from "./pipeline";
import { BASELINE_POLICY_V1 } from "@/config/policyBaseline";
import { parsePolicy } from "@/lib/loadPolicy";
import { FIXED_SEAL_TIME, fixedClock, highInput, mediumInput } from "@/dev/fixtures";
import { createRiskInput } from "@/domain/risk/risk.factory";
import { InvalidInputError, InvalidOverrideError, isEvaluationError } from "@/lib/errors";

const policy = BASELINE_POLICY_V1;

describe("createDraft", () => {
  it("takes a private copy of the input", () => {
    const raw = createRiskInput({ likelihood: { rating: 2 } });
    const draft = createDraft(raw);
    raw.likelihood.rating = 5;
    raw.impact.domains.push("safety");
    assert.strictEqual(draft.stage, "draft");
    assert.strictEqual(draft.input.likelihood.rating, 2);
    assert.deepStrictEqual(draft.input.impact.domains, ["operational"]);
  });

  it("rejects out-of-range ratings and confidence before scoring", () => {
    const cases: unknown[] = [
      createRiskInput({ likelihood: { rating: 6 } }),
      createRiskInput({ impact: { severity: 0 } }),
      createRiskInput({ likelihood: { confidence: 2.5 } }),
      createRiskInput({ impact: { confidence: 9 } }),
    ];
    for (const raw of cases) {
      assert.throws(() => createDraft(raw), InvalidInputError);
    }
  });

  it("rejects malformed structure", () => {
    const { impact: _impact, ...missingImpact } = mediumInput;
    const cases: unknown[] = [
      null,
      "likelihood=4",
      missingImpact,
      { ...mediumInput, extra: true },
      { ...mediumInput, impact: { ...mediumInput.impact, domains: [] } },
      { ...mediumInput, impact: { ...mediumInput.impact, domains: ["financial", "financial"] } },
      { ...mediumInput, impact: { ...mediumInput.impact, reversibility: "sometimes" } },
    ];
    for (const raw of cases) {
      assert.throws(() => createDraft(raw), (err: unknown) => isEvaluationError(err) && err.code === "INVALID_INPUT");
    }
  });

  it("names the offending field", () => {
    assert.throws(
      () => createDraft(createRiskInput({ likelihood: { rating: 6 } })),
      /likelihood\.rating: Number must be less than or equal to 5/
    );
  });
});

describe("stage transitions", () => {
  it("moves through draft, scored, classified and decided in order", () => {
    const scored = scoreDraft(createDraft(mediumInput), policy);
    assert.strictEqual(scored.stage, "scored");
    assert.deepStrictEqual(scored.normalized, { likelihood: 0.75, impact: 0.5 });
    assert.strictEqual(scored.overall, 0.375);

    const classified = classifyScored(scored, policy);
    assert.strictEqual(classified.stage, "classified");
    assert.strictEqual(classified.band.category, "Medium");

    const decided = decideClassified(classified, policy);
    assert.strictEqual(decided.stage, "decided");
    assert.strictEqual(decided.decision.computed, "REDUCE");

    const record = sealDecided(decided, policy, fixedClock);
    assert.strictEqual(record.sealedAt, FIXED_SEAL_TIME);
  });
});

describe("evaluateRisk", () => {
  it("scores 4/3 as Medium with REDUCE", () => {
    const record = evaluateRisk(mediumInput, policy, { clock: fixedClock });
    assert.deepStrictEqual(record.normalized, { likelihood: 0.75, impact: 0.5 });
    assert.strictEqual(record.overall, 0.375);
    assert.deepStrictEqual(record.band, { category: "Medium", min: 0.2, max: 0.4, upperClosed: false });
    assert.strictEqual(record.computedDecision, "REDUCE");
    assert.strictEqual(record.appliedDecision, "REDUCE");
    assert.deepStrictEqual(
      record.rationale.map((s) => s.step),
      ["normalize.likelihood", "normalize.impact", "aggregate", "classify", "decide", "override"]
    );
    assert.strictEqual(record.rationale[2]?.text, "Overall risk = 0.75 x 0.5 = 0.375 (product).");
    assert.strictEqual(record.rationale[3]?.text, "Overall 0.375 falls in Medium band [0.2, 0.4).");
  });

  it("records both decisions when a High result is overridden", () => {
    const record = evaluateRisk(highInput, policy, {
      clock: fixedClock,
      override: { decision: "REDUCE", justification: "insurance already in place", owner: "Plant manager" },
    });
    assert.strictEqual(record.category, "High");
    assert.strictEqual(record.computedDecision, "MITIGATE");
    assert.strictEqual(record.appliedDecision, "REDUCE");
    assert.deepStrictEqual(record.override, {
      decision: "REDUCE",
      justification: "insurance already in place",
      owner: "Plant manager",
    });
    assert.strictEqual(
      record.rationale[5]?.text,
      'Override by Plant manager applied: REDUCE replaces computed MITIGATE; justification: "insurance already in place".'
    );
  });

  it("rejects an override without justification or owner and produces no record", () => {
    const overrides = [
      { decision: "ACCEPT" as const, justification: "", owner: "Plant manager" },
      { decision: "ACCEPT" as const, justification: "board sign-off", owner: "  " },
    ];
    for (const override of overrides) {
      assert.throws(() => evaluateRisk(highInput, policy, { clock: fixedClock, override }), InvalidOverrideError);
    }
  });

  it("stores and hashes free text exactly as supplied", () => {
    const padded = createRiskInput({
      likelihood: { signals: [" Two outages last year", "Vendor under review"] },
      impact: { worstCredibleOutcome: "Plant offline for two weeks  " },
    });
    const plain = createRiskInput({
      likelihood: { signals: ["Two outages last year", "Vendor under review"] },
      impact: { worstCredibleOutcome: "Plant offline for two weeks" },
    });
    const a = evaluateRisk(padded, policy, { clock: fixedClock });
    const b = evaluateRisk(plain, policy, { clock: fixedClock });
    assert.notStrictEqual(a.inputHash, b.inputHash);
    assert.deepStrictEqual(a.input.likelihood.signals, [" Two outages last year", "Vendor under review"]);
    assert.strictEqual(a.input.impact.worstCredibleOutcome, "Plant offline for two weeks  ");
  });

  it("rejects blank free text", () => {
    assert.throws(
      () => createDraft(createRiskInput({ impact: { worstCredibleOutcome: "   " } })),
      /impact\.worstCredibleOutcome: Must not be blank/
    );
    assert.throws(() => createDraft(createRiskInput({ likelihood: { signals: [""] } })), InvalidInputError);
  });

  it("produces field-identical records for identical inputs and clock", () => {
    const a = evaluateRisk(highInput, policy, { clock: fixedClock });
    const b = evaluateRisk(createRiskInput({ ...highInput }), policy, { clock: fixedClock });
    assert.deepStrictEqual(a, b);
  });

  it("never lets confidence move the score", () => {
    const confident = evaluateRisk(
      createRiskInput({ likelihood: { rating: 4, confidence: 5 }, impact: { severity: 4, confidence: 5 } }),
      policy,
      { clock: fixedClock }
    );
    const doubtful = evaluateRisk(
      createRiskInput({ likelihood: { rating: 4, confidence: 1 }, impact: { severity: 4, confidence: 1 } }),
      policy,
      { clock: fixedClock }
    );
    assert.strictEqual(confident.overall, doubtful.overall);
    assert.strictEqual(confident.category, doubtful.category);
    assert.notStrictEqual(confident.inputHash, doubtful.inputHash);
  });

  it("follows the policy passed in, not a shared default", () => {
    const strictPolicy = parsePolicy({
      ...policy,
      policyVersion: "v1-strict",
      tieBreaks: { high: "REDUCE", critical: "STOP" },
    });
    const strict = evaluateRisk(highInput, strictPolicy, { clock: fixedClock });
    assert.strictEqual(strict.policyVersion, "v1-strict");
    const baseline = evaluateRisk(highInput, policy, { clock: fixedClock });
    assert.strictEqual(strict.computedDecision, "REDUCE");
    assert.strictEqual(baseline.computedDecision, "MITIGATE");
  });
});
