import type { FlashFrame, RankedResult, RankingOutcome, SignalMode, StimulusOption } from "../types.js";
import { layoutPreviewGrid } from "./previewGrid.js";

export function formatIdleBanner(mode: SignalMode): string {
  return mode === "live" ? "BCI Reset" : "SIMULATION MODE";
}

/** Text rendering of the preview grid, one line per grid row. */
export function formatPreviewGrid<S>(
  options: readonly StimulusOption<S>[],
  describe: (stimulus: S) => string = String,
): string[] {
  const grid = layoutPreviewGrid(options.length, 1, 1);
  const rows: string[][] = Array.from({ length: grid.perSide }, () => []);
  for (const cell of grid.cells) {
    const option = options[cell.index];
    rows[cell.index % grid.perSide].push(`[${option.id}] ${describe(option.stimulus)}`);
  }
  return [`Previewing ${options.length} images`, ...rows.map((row) => row.join(" | "))];
}

export function formatFlash<S>(frame: FlashFrame<S>, describe: (stimulus: S) => string = String): string {
  return `#${frame.flashIndex} option=${frame.optionId} ${describe(frame.stimulus)}`;
}

export function formatSelection(optionId: number, confidence: number): string {
  return `Selected option id: ${optionId}, conf: ${confidence.toFixed(4)}`;
}

export function formatRanking(result: RankedResult): string {
  return result.optionIds
    .map((id, position) => `${position + 1}. option=${id} conf=${result.confidences[position].toFixed(4)}`)
    .join("\n");
}

export function formatOutcome(outcome: RankingOutcome): string {
  switch (outcome.kind) {
    case "ranked":
      return `Ranking accepted after ${outcome.attempts} attempt(s):\n${formatRanking(outcome.result)}`;
    case "unconverged":
      return `Ranking did not converge after ${outcome.attempts} attempt(s).`;
    case "busy":
      return "Ranking declined: another trial is in progress.";
    case "malformed":
      return `Ranking declined: ${outcome.reason}`;
    case "aborted":
      return "Ranking aborted.";
    default:
      return "Unknown outcome.";
  }
}
