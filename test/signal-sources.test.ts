import test from "node:test";
import assert from "node:assert/strict";
import { createSeededRandom } from "../src/common/random.js";
import { BufferedSignalSource } from "../src/signal/bufferedSignalSource.js";
import { SimulatedSignalSource } from "../src/signal/simulatedSignalSource.js";

const SEQUENCE = { order: [0, 1, 0, 2], repeatPlan: [2, 1, 1] };

test("buffered source credits each sample to the oldest waiting flash", () => {
  const source = new BufferedSignalSource();
  assert.equal(source.pushSample(1, 1), false);

  source.beginBlock();
  source.markFlash(1);
  source.markFlash(2);
  assert.equal(source.pushSample(0.4, 3), true);
  source.markFlash(3);
  assert.equal(source.pushSample(0.8, 1), true);
  assert.equal(source.pushSample(0.6, 2), true);
  assert.equal(source.pushSample(0.2, 4), false);
  source.endBlock();

  assert.deepEqual(source.readBlock(), [
    { flashIndex: 1, signalValue: 0.4, rankPosition: 3 },
    { flashIndex: 2, signalValue: 0.8, rankPosition: 1 },
    { flashIndex: 3, signalValue: 0.6, rankPosition: 2 },
  ]);
  assert.deepEqual(source.stats(), { marked: 3, received: 3, dropped: 1 });
});

test("buffered source ignores flashes outside a block and starts each block empty", () => {
  const source = new BufferedSignalSource();
  source.markFlash(1);
  source.beginBlock();
  assert.equal(source.pushSample(1, 1), false);
  source.markFlash(1);
  source.pushSample(2, 1);
  source.endBlock();
  assert.equal(source.isInBlock(), false);
  assert.equal(source.readBlock().length, 1);

  source.beginBlock();
  assert.deepEqual(source.readBlock(), []);
  assert.deepEqual(source.stats(), { marked: 0, received: 0, dropped: 0 });
});

test("simulated source raises the target option above the baseline", () => {
  const source = new SimulatedSignalSource({
    targetIndex: 0,
    baseline: 1,
    targetBoost: 5,
    noise: 0,
    random: createSeededRandom("sim"),
  });
  source.beginBlock();
  for (const flashIndex of [1, 2, 3, 4]) {
    source.markFlash(flashIndex);
  }
  source.endBlock();

  assert.deepEqual(source.readBlock(SEQUENCE), [
    { flashIndex: 1, signalValue: 6, rankPosition: 1 },
    { flashIndex: 2, signalValue: 1, rankPosition: 3 },
    { flashIndex: 3, signalValue: 6, rankPosition: 2 },
    { flashIndex: 4, signalValue: 1, rankPosition: 4 },
  ]);
  assert.equal(source.target, 0);
});

test("simulated source only reports flashes marked inside the block", () => {
  const source = new SimulatedSignalSource({ random: createSeededRandom("marks") });
  source.markFlash(1);
  source.beginBlock();
  source.markFlash(2);
  source.markFlash(9);
  source.endBlock();

  const samples = source.readBlock(SEQUENCE);
  assert.deepEqual(
    samples.map((sample) => sample.flashIndex),
    [2],
  );
  const target = source.target;
  assert.ok(typeof target === "number" && target >= 0 && target < 3);

  source.clear();
  assert.deepEqual(source.readBlock(SEQUENCE), []);
});
