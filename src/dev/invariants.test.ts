import { describe, it } from "node:test";
import assert from "node:assert";
import { allSameLength, approxEqual, inClosedRange, isConstantAt, isNonDecreasing, seriesApproxEqual } from "./invariants";

describe("invariants", () => {
  it("approxEqual is relative for large magnitudes", () => {
    assert.ok(approxEqual(1_000_000, 1_000_000.0001));
    assert.ok(!approxEqual(1, 1.001));
  });

  it("series predicates", () => {
    assert.ok(allSameLength([[1, 2], [3, 4]], 2));
    assert.ok(!allSameLength([[1, 2], [3]], 2));
    assert.ok(isConstantAt([3.6, 3.6], 3.6));
    assert.ok(isNonDecreasing([1, 1, 2]));
    assert.ok(!isNonDecreasing([2, 1]));
    assert.ok(seriesApproxEqual([0.1 + 0.2], [0.3]));
    assert.ok(!seriesApproxEqual([1], [1, 2]));
  });

  it("inClosedRange includes both ends and rejects NaN", () => {
    assert.ok(inClosedRange(0, 0, 6));
    assert.ok(inClosedRange(6, 0, 6));
    assert.ok(!inClosedRange(Number.NaN, 0, 6));
  });
});
