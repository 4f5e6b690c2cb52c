import test from "node:test";
import assert from "node:assert/strict";
import { MaxHeap } from "../src/sequence/maxHeap.js";

test("MaxHeap pops items in descending priority", () => {
  const heap = new MaxHeap<number>((a, b) => a - b);
  for (const value of [5, 1, 9, 3, 7, 9, 0]) {
    heap.push(value);
  }
  assert.equal(heap.size, 7);
  assert.equal(heap.peek(), 9);

  const popped: number[] = [];
  for (let value = heap.pop(); value !== undefined; value = heap.pop()) {
    popped.push(value);
  }
  assert.deepEqual(popped, [9, 9, 7, 5, 3, 1, 0]);
  assert.ok(heap.isEmpty());
  assert.equal(heap.pop(), undefined);
});

test("MaxHeap honours tie-breaking in the comparator", () => {
  const heap = new MaxHeap<{ key: string; weight: number; order: number }>(
    (a, b) => a.weight - b.weight || b.order - a.order,
  );
  heap.push({ key: "c", weight: 2, order: 2 });
  heap.push({ key: "a", weight: 2, order: 0 });
  heap.push({ key: "b", weight: 2, order: 1 });
  heap.push({ key: "z", weight: 1, order: 3 });
  assert.deepEqual(
    [heap.pop()?.key, heap.pop()?.key, heap.pop()?.key, heap.pop()?.key],
    ["a", "b", "c", "z"],
  );
});
