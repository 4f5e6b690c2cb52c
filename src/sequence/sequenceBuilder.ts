import { createSeededRandom, defaultRandom, randomIntInclusive, type RandomSource } from "../common/random.js";
import type { BuiltSequence, PresentationOrder, RepeatPlan } from "../types.js";
import { MaxHeap } from "./maxHeap.js";

interface PendingOption {
  index: number;
  remaining: number;
}

/**
 * Draws a repeat count per option and lays the flashes out so that the same
 * option is never shown twice in a row unless the plan makes it unavoidable.
 */
export function buildSequence(
  optionCount: number,
  minRepeat: number,
  maxRepeat: number,
  random: RandomSource = defaultRandom,
): BuiltSequence {
  if (!Number.isInteger(optionCount) || optionCount < 1) {
    throw new RangeError(`optionCount must be a positive integer, got ${optionCount}.`);
  }
  const min = Math.max(1, Math.floor(minRepeat));
  const max = Math.max(min, Math.floor(maxRepeat));

  const repeatPlan = Array.from({ length: optionCount }, () => randomIntInclusive(random, min, max));
  const order = shuffleKeepingSpacing(spreadByRemainingCount(repeatPlan), random);
  return { order, repeatPlan };
}

export function buildSeededSequence(
  optionCount: number,
  minRepeat: number,
  maxRepeat: number,
  seed: string,
): BuiltSequence {
  return buildSequence(optionCount, minRepeat, maxRepeat, createSeededRandom(seed));
}

/**
 * Greedy spread: always emit the option with the most flashes left, holding
 * the one just emitted out of the heap for one step.
 */
export function spreadByRemainingCount(repeatPlan: RepeatPlan): number[] {
  const heap = new MaxHeap<PendingOption>(
    (a, b) => a.remaining - b.remaining || b.index - a.index,
  );
  repeatPlan.forEach((count, index) => {
    if (count > 0) {
      heap.push({ index, remaining: count });
    }
  });

  const order: number[] = [];
  let held: PendingOption | undefined;
  for (let next = heap.pop(); next; next = heap.pop()) {
    order.push(next.index);
    if (held) {
      heap.push(held);
    }
    const remaining = next.remaining - 1;
    held = remaining > 0 ? { index: next.index, remaining } : undefined;
  }

  // Only one option left: its remaining flashes necessarily run back to back.
  if (held) {
    for (let i = 0; i < held.remaining; i += 1) {
      order.push(held.index);
    }
  }
  return order;
}

/**
 * Random pairwise swaps, each kept only if it does not add an adjacent repeat
 * around the swapped positions.
 */
export function shuffleKeepingSpacing(
  order: PresentationOrder,
  random: RandomSource = defaultRandom,
  swapAttempts = order.length * 4,
): number[] {
  const out = [...order];
  const n = out.length;
  if (n < 3) {
    return out;
  }

  for (let attempt = 0; attempt < swapAttempts; attempt += 1) {
    const a = Math.floor(random() * n);
    const b = Math.floor(random() * n);
    if (a === b || out[a] === out[b]) {
      continue;
    }
    const before = repeatsAround(out, a, b);
    swap(out, a, b);
    if (repeatsAround(out, a, b) > before) {
      swap(out, a, b);
    }
  }
  return out;
}

export function countAdjacentRepeats(order: PresentationOrder): number {
  let repeats = 0;
  for (let i = 1; i < order.length; i += 1) {
    if (order[i] === order[i - 1]) {
      repeats += 1;
    }
  }
  return repeats;
}

/** Fewest adjacent repeats any ordering of the plan can have. */
export function minimumAdjacentRepeats(repeatPlan: RepeatPlan): number {
  const total = repeatPlan.reduce((sum, count) => sum + count, 0);
  const largest = repeatPlan.reduce((best, count) => Math.max(best, count), 0);
  return Math.max(0, largest - (total - largest) - 1);
}

function repeatsAround(order: number[], a: number, b: number): number {
  const lefts = new Set<number>();
  for (const position of [a, b]) {
    if (position > 0) {
      lefts.add(position - 1);
    }
    if (position < order.length - 1) {
      lefts.add(position);
    }
  }
  let repeats = 0;
  for (const left of lefts) {
    if (order[left] === order[left + 1]) {
      repeats += 1;
    }
  }
  return repeats;
}

function swap(order: number[], a: number, b: number): void {
  const tmp = order[a];
  order[a] = order[b];
  order[b] = tmp;
}
