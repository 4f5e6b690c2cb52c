import { defaultRandom, randomGaussian, type RandomSource } from "../common/random.js";
import type { BuiltSequence, FlashSample, SignalSource } from "../types.js";

export interface SimulatedSignalOptions {
  random?: RandomSource;
  /** Option index that evokes the strong response; drawn per block when unset. */
  targetIndex?: number;
  baseline?: number;
  noise?: number;
  targetBoost?: number;
}

/**
 * Stands in for the acquisition device: one synthetic sample per marked
 * flash, with the target option's flashes raised above the noise floor.
 */
export class SimulatedSignalSource implements SignalSource {
  readonly mode = "simulation";
  private readonly random: RandomSource;
  private readonly fixedTarget?: number;
  private readonly baseline: number;
  private readonly noise: number;
  private readonly targetBoost: number;
  private inBlock = false;
  private flashes: number[] = [];
  private lastTarget?: number;

  constructor(options: SimulatedSignalOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.fixedTarget = options.targetIndex;
    this.baseline = options.baseline ?? 0;
    this.noise = options.noise ?? 1;
    this.targetBoost = options.targetBoost ?? 6;
  }

  get target(): number | undefined {
    return this.lastTarget;
  }

  beginBlock(): void {
    this.flashes = [];
    this.inBlock = true;
  }

  endBlock(): void {
    this.inBlock = false;
  }

  isInBlock(): boolean {
    return this.inBlock;
  }

  markFlash(flashIndex: number): void {
    if (this.inBlock) {
      this.flashes.push(flashIndex);
    }
  }

  readBlock(sequence: BuiltSequence): FlashSample[] {
    const optionCount = sequence.repeatPlan.length;
    const target = this.fixedTarget ?? Math.floor(this.random() * optionCount);
    this.lastTarget = target;

    const values = this.flashes
      .filter((flashIndex) => flashIndex >= 1 && flashIndex <= sequence.order.length)
      .map((flashIndex) => {
        const optionIndex = sequence.order[flashIndex - 1];
        const boost = optionIndex === target ? this.targetBoost : 0;
        return {
          flashIndex,
          signalValue: this.baseline + boost + randomGaussian(this.random) * this.noise,
        };
      });

    const byStrength = [...values].sort((a, b) => b.signalValue - a.signalValue);
    const rankOf = new Map(byStrength.map((entry, rank) => [entry.flashIndex, rank + 1]));
    return values.map((entry) => ({
      flashIndex: entry.flashIndex,
      signalValue: entry.signalValue,
      rankPosition: rankOf.get(entry.flashIndex) ?? values.length,
    }));
  }

  clear(): void {
    this.flashes = [];
  }
}
