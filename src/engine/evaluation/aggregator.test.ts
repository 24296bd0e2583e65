import { describe, it } from "node:test";
import assert from "node:assert";
import { aggregate } from "./aggregator";
import { InvariantViolationError } from "@/lib/errors";

const LEVELS = [0, 0.25, 0.5, 0.75, 1];

describe("aggregate", () => {
  it("is the product of the two normalized dimensions", () => {
    assert.strictEqual(aggregate(0.75, 0.5), 0.375);
    assert.strictEqual(aggregate(0.5, 1), 0.5);
  });

  it("is zero whenever either dimension is zero", () => {
    for (const x of LEVELS) {
      assert.strictEqual(aggregate(0, x), 0);
      assert.strictEqual(aggregate(x, 0), 0);
    }
  });

  it("reaches 1 only when both dimensions are 1", () => {
    assert.strictEqual(aggregate(1, 1), 1);
    for (const a of LEVELS) {
      for (const b of LEVELS) {
        if (a === 1 && b === 1) continue;
        assert(aggregate(a, b) < 1, `aggregate(${a}, ${b}) should be below 1`);
      }
    }
  });

  it("does not let one elevated dimension produce a high score alone", () => {
    assert.strictEqual(aggregate(1, 0.25), 0.25);
    assert.strictEqual(aggregate(0.25, 1), 0.25);
  });

  it("treats out-of-range inputs as invariant violations instead of clamping", () => {
    assert.throws(() => aggregate(1.2, 0.5), InvariantViolationError);
    assert.throws(() => aggregate(0.5, -0.1), InvariantViolationError);
    assert.throws(() => aggregate(Number.NaN, 0.5), /likelihood_norm must lie in \[0,1\], got NaN/);
  });
});
