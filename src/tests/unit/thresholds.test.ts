import assert from "node:assert/strict";
import { test } from "node:test";
import {
  ACCURACY_BASELINE,
  ACCURACY_BASELINE_FLOOR,
  READINESS_TIERS,
  SUGGESTION_LEVELS,
  pickCeiling,
  pickThreshold,
} from "../../scoring/thresholds";
import { clampToRange, mean, ratio, round1, round2, roundTo } from "../../shared/utils/math";

test("pickThreshold returns the first lower bound reached", () => {
  assert.equal(pickThreshold(ACCURACY_BASELINE, 0.5, ACCURACY_BASELINE_FLOOR), 9);
  assert.equal(pickThreshold(ACCURACY_BASELINE, 0.49, ACCURACY_BASELINE_FLOOR), 7.5);
  assert.equal(pickThreshold(ACCURACY_BASELINE, 0.05, ACCURACY_BASELINE_FLOOR), 3);
  assert.equal(pickThreshold(ACCURACY_BASELINE, 0.04, ACCURACY_BASELINE_FLOOR), 1.5);
  assert.equal(pickThreshold(READINESS_TIERS, 7.5, "needs_preparation"), "strong_candidate");
  assert.equal(pickThreshold(READINESS_TIERS, 4.9, "needs_preparation"), "needs_preparation");
});

test("pickCeiling returns the first upper bound not exceeded", () => {
  assert.equal(pickCeiling(SUGGESTION_LEVELS, 3, "high"), "low");
  assert.equal(pickCeiling(SUGGESTION_LEVELS, 3.1, "high"), "medium");
  assert.equal(pickCeiling(SUGGESTION_LEVELS, 6, "high"), "medium");
  assert.equal(pickCeiling(SUGGESTION_LEVELS, 6.1, "high"), "high");
});

test("rounding helpers round exact ties to even", () => {
  assert.equal(round1(7.25), 7.2);
  assert.equal(round1(7.75), 7.8);
  assert.equal(round2(0.125), 0.12);
  assert.equal(round2(0.375), 0.38);
  assert.equal(roundTo(38.5, 0), 38);
  assert.equal(roundTo(39.5, 0), 40);
  assert.equal(roundTo(-2.5, 0), -2);
  assert.equal(round1(9.125), 9.1);
  assert.equal(ratio(2, 3), 0.67);
  assert.equal(ratio(5, 0), 0);
});

test("rounding follows the stored binary value, not the literal", () => {
  assert.equal(round1(1.05), 1.1);
  assert.equal(round1(0.35), 0.3);
  assert.equal(round2(2.675), 2.67);
});

test("clampToRange and mean", () => {
  assert.equal(clampToRange(-1, 0, 10), 0);
  assert.equal(clampToRange(11.5, 0, 10), 10);
  assert.equal(clampToRange(4.2, 0, 10), 4.2);
  assert.equal(mean([8, 9]), 8.5);
  assert.equal(mean([]), 0);
});
