import test from "node:test";
import assert from "node:assert/strict";
import { createSeededRandom } from "../src/common/random.js";
import {
  buildSeededSequence,
  buildSequence,
  countAdjacentRepeats,
  minimumAdjacentRepeats,
  shuffleKeepingSpacing,
  spreadByRemainingCount,
} from "../src/sequence/sequenceBuilder.js";

function occurrences(order: readonly number[], optionCount: number): number[] {
  const counts = new Array<number>(optionCount).fill(0);
  for (const index of order) {
    counts[index] += 1;
  }
  return counts;
}

test("three options repeated exactly three times give nine spaced flashes", () => {
  for (const seed of ["alpha", "beta", "gamma", "delta"]) {
    const { order, repeatPlan } = buildSeededSequence(3, 3, 3, seed);
    assert.deepEqual(repeatPlan, [3, 3, 3]);
    assert.equal(order.length, 9);
    assert.deepEqual(occurrences(order, 3), [3, 3, 3]);
    assert.equal(countAdjacentRepeats(order), 0, `seed ${seed}: ${order.join(",")}`);
  }
});

test("order length and per-option counts always match the repeat plan", () => {
  for (let run = 0; run < 60; run += 1) {
    const random = createSeededRandom(`plan-${run}`);
    const optionCount = 1 + (run % 8);
    const minRepeat = 1 + (run % 3);
    const maxRepeat = minRepeat + (run % 5);
    const { order, repeatPlan } = buildSequence(optionCount, minRepeat, maxRepeat, random);

    assert.equal(repeatPlan.length, optionCount);
    for (const count of repeatPlan) {
      assert.ok(count >= minRepeat && count <= maxRepeat);
    }
    assert.equal(
      order.length,
      repeatPlan.reduce((sum, count) => sum + count, 0),
    );
    assert.deepEqual(occurrences(order, optionCount), [...repeatPlan]);
    assert.equal(countAdjacentRepeats(order), minimumAdjacentRepeats(repeatPlan));
  }
});

test("spreadByRemainingCount cycles evenly through balanced plans", () => {
  assert.deepEqual(spreadByRemainingCount([3, 3, 3]), [0, 1, 2, 0, 1, 2, 0, 1, 2]);
  assert.deepEqual(spreadByRemainingCount([2, 1]), [0, 1, 0]);
  assert.deepEqual(spreadByRemainingCount([3, 3, 1]), [0, 1, 0, 1, 0, 1, 2]);
});

test("spreadByRemainingCount runs the last remaining option back to back", () => {
  assert.deepEqual(spreadByRemainingCount([5, 1]), [0, 1, 0, 0, 0, 0]);
  assert.deepEqual(spreadByRemainingCount([4, 1, 1]), [0, 1, 0, 2, 0, 0]);
  assert.equal(minimumAdjacentRepeats([5, 1]), 3);
  assert.equal(minimumAdjacentRepeats([4, 1, 1]), 1);
});

test("shuffleKeepingSpacing never adds adjacent repeats", () => {
  const spread = spreadByRemainingCount([4, 3, 3, 2]);
  assert.equal(countAdjacentRepeats(spread), 0);
  for (let run = 0; run < 20; run += 1) {
    const shuffled = shuffleKeepingSpacing(spread, createSeededRandom(`shuffle-${run}`));
    assert.equal(countAdjacentRepeats(shuffled), 0);
    assert.deepEqual(occurrences(shuffled, 4), [4, 3, 3, 2]);
  }

  const lopsided = spreadByRemainingCount([6, 1]);
  const shuffled = shuffleKeepingSpacing(lopsided, createSeededRandom("lopsided"));
  assert.ok(countAdjacentRepeats(shuffled) <= countAdjacentRepeats(lopsided));
});

test("a single option is flashed back to back", () => {
  const { order, repeatPlan } = buildSequence(1, 2, 2, () => 0.3);
  assert.deepEqual(repeatPlan, [2]);
  assert.deepEqual(order, [0, 0]);
});

test("buildSequence clamps repeat bounds and rejects an empty option set", () => {
  const { repeatPlan } = buildSequence(2, 0, -5, createSeededRandom("clamp"));
  assert.deepEqual(repeatPlan, [1, 1]);
  assert.throws(() => buildSequence(0, 1, 2), RangeError);
  assert.throws(() => buildSequence(1.5, 1, 2), RangeError);
});
