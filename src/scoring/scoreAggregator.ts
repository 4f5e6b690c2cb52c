import { mean, median, populationStd } from "../common/math.js";
import type {
  FlashSample,
  PresentationOrder,
  RankedResult,
  RepeatPlan,
  ScoreDiagnostics,
  ScoreOutcome,
} from "../types.js";
import { OptionResult } from "./optionResult.js";

export const DEFAULT_SEPARATION_THRESHOLD = 2;
export const DEFAULT_CORRECT_Z_THRESHOLD = 0.5;

export interface ScoreSettings {
  /** Option id per option index; indices are reported when omitted. */
  optionIds?: readonly number[];
  separationThreshold?: number;
  correctZThreshold?: number;
}

export interface GroupedSamples {
  results: OptionResult[];
  droppedSamples: number;
}

export function groupSamplesByOption(
  order: PresentationOrder,
  repeatPlan: RepeatPlan,
  samples: readonly FlashSample[],
  optionIds?: readonly number[],
): GroupedSamples {
  const results = repeatPlan.map(
    (expected, index) => new OptionResult(index, optionIds?.[index] ?? index, expected),
  );
  let droppedSamples = 0;
  for (const sample of samples) {
    const optionIndex = resolveOptionIndex(order, sample.flashIndex);
    if (optionIndex === undefined || !Number.isFinite(sample.signalValue)) {
      droppedSamples += 1;
      continue;
    }
    results[optionIndex].add(sample.signalValue, sample.rankPosition);
  }
  return { results, droppedSamples };
}

/**
 * Ranks options by the mean of their two strongest responses and decides
 * whether the leader stands far enough apart from the rest to be trusted.
 */
export function scoreTrial(
  order: PresentationOrder,
  repeatPlan: RepeatPlan,
  samples: readonly FlashSample[],
  settings: ScoreSettings = {},
): ScoreOutcome {
  const separationThreshold = settings.separationThreshold ?? DEFAULT_SEPARATION_THRESHOLD;
  const correctZThreshold = settings.correctZThreshold ?? DEFAULT_CORRECT_Z_THRESHOLD;
  const { results, droppedSamples } = groupSamplesByOption(
    order,
    repeatPlan,
    samples,
    settings.optionIds,
  );

  const allValues = results.flatMap((result) => result.signalValues);
  const overallMedian = median(allValues);
  const overallStd = populationStd(allValues);
  const diagnostics: ScoreDiagnostics = { overallMedian, overallStd, droppedSamples };

  if (allValues.length === 0) {
    return { kind: "rejected", reason: "no_samples", diagnostics };
  }
  if (!(overallStd > 0)) {
    return { kind: "rejected", reason: "flat_signal", diagnostics };
  }

  const z = (value: number): number => (overallMedian - value) / overallStd;
  const percentageCorrect = (result: OptionResult): number => {
    if (result.expectedCount <= 0) {
      return 0;
    }
    const correct = result.signalValues.filter((value) => Math.abs(z(value)) > correctZThreshold).length;
    return correct / result.expectedCount;
  };

  // Array#sort is stable, so equal scores keep option order.
  const ranked = [...results].sort((a, b) => b.avgBestTwo - a.avgBestTwo);
  const result: RankedResult = {
    optionIds: ranked.map((entry) => entry.optionId),
    confidences: ranked.map((entry) =>
      entry.sampleCount === 0 ? 0 : z(entry.averageSignal) * percentageCorrect(entry),
    ),
  };

  const best = result.confidences[0];
  const rest = result.confidences.slice(1);
  diagnostics.bestConfidence = best;
  if (rest.length === 0) {
    return { kind: "accepted", result, diagnostics };
  }

  const restMean = mean(rest);
  const restStd = populationStd(rest);
  diagnostics.restMean = restMean;
  diagnostics.restStd = restStd;
  if (restStd === 0) {
    return { kind: "rejected", reason: "no_spread", diagnostics };
  }

  const separation = Math.abs(best - restMean) / restStd;
  diagnostics.separation = separation;
  if (separation < separationThreshold) {
    return { kind: "rejected", reason: "insufficient_separation", diagnostics };
  }
  return { kind: "accepted", result, diagnostics };
}

export function formatScoreDiagnostics(diagnostics: ScoreDiagnostics): string {
  return (
    `median=${formatNumber(diagnostics.overallMedian)}, std=${formatNumber(diagnostics.overallStd)}, ` +
    `best=${formatNumber(diagnostics.bestConfidence)}, rest_mean=${formatNumber(diagnostics.restMean)}, ` +
    `rest_std=${formatNumber(diagnostics.restStd)}, separation=${formatNumber(diagnostics.separation)}, ` +
    `dropped=${diagnostics.droppedSamples}`
  );
}

function resolveOptionIndex(order: PresentationOrder, flashIndex: number): number | undefined {
  if (!Number.isInteger(flashIndex) || flashIndex < 1 || flashIndex > order.length) {
    return undefined;
  }
  return order[flashIndex - 1];
}

function formatNumber(value: number | undefined): string {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return "-";
  }
  return value.toFixed(3);
}
