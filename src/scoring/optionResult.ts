import { mean, meanOfLargest, populationStd } from "../common/math.js";

/** Samples gathered for one option during a block. */
export class OptionResult {
  readonly signalValues: number[] = [];
  readonly rankPositions: number[] = [];

  constructor(
    readonly index: number,
    readonly optionId: number,
    readonly expectedCount: number,
  ) {}

  add(signalValue: number, rankPosition: number): void {
    this.signalValues.push(signalValue);
    this.rankPositions.push(rankPosition);
  }

  get sampleCount(): number {
    return this.signalValues.length;
  }

  get averageSignal(): number {
    return mean(this.signalValues);
  }

  get signalStd(): number {
    return populationStd(this.signalValues);
  }

  get averageRankPosition(): number {
    return mean(this.rankPositions);
  }

  get avgBestTwo(): number {
    return meanOfLargest(this.signalValues, 2);
  }
}
