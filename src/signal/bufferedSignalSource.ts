import type { FlashSample, SignalSource } from "../types.js";

export interface SignalBlockStats {
  marked: number;
  received: number;
  dropped: number;
}

/**
 * Live collector. A device adapter pushes one classified sample per flash and
 * each sample is credited to the oldest marked flash still waiting for one.
 */
export class BufferedSignalSource implements SignalSource {
  readonly mode = "live";
  private inBlock = false;
  private readonly pendingFlashes: number[] = [];
  private readonly samples: FlashSample[] = [];
  private marked = 0;
  private dropped = 0;

  beginBlock(): void {
    this.clear();
    this.inBlock = true;
  }

  endBlock(): void {
    this.inBlock = false;
  }

  isInBlock(): boolean {
    return this.inBlock;
  }

  markFlash(flashIndex: number): void {
    if (!this.inBlock) {
      return;
    }
    this.marked += 1;
    this.pendingFlashes.push(flashIndex);
  }

  /** Returns false when the sample could not be attributed to a flash. */
  pushSample(signalValue: number, rankPosition: number): boolean {
    const flashIndex = this.inBlock ? this.pendingFlashes.shift() : undefined;
    if (flashIndex === undefined) {
      this.dropped += 1;
      return false;
    }
    this.samples.push({ flashIndex, signalValue, rankPosition });
    return true;
  }

  readBlock(): FlashSample[] {
    return [...this.samples];
  }

  clear(): void {
    this.pendingFlashes.length = 0;
    this.samples.length = 0;
    this.marked = 0;
    this.dropped = 0;
  }

  stats(): SignalBlockStats {
    return { marked: this.marked, received: this.samples.length, dropped: this.dropped };
  }
}
