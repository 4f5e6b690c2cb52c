import type { FlashFrame, SignalMode, StimulusDisplay, StimulusOption } from "../types.js";
import { formatFlash, formatIdleBanner, formatPreviewGrid, formatSelection } from "./format.js";

export interface ConsoleDisplayOptions<S> {
  describe?: (stimulus: S) => string;
  write?: (text: string) => void;
}

export class ConsoleDisplay<S = unknown> implements StimulusDisplay<S> {
  private readonly describe: (stimulus: S) => string;
  private readonly write: (text: string) => void;

  constructor(options: ConsoleDisplayOptions<S> = {}) {
    this.describe = options.describe ?? String;
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  showIdle(mode: SignalMode): void {
    this.write(`${formatIdleBanner(mode)}\n`);
  }

  showPreview(options: readonly StimulusOption<S>[]): void {
    this.write(`${formatPreviewGrid(options, this.describe).join("\n")}\n`);
  }

  showFlash(frame: FlashFrame<S>): void {
    this.write(`${formatFlash(frame, this.describe)}\n`);
  }

  showResult(option: StimulusOption<S>, confidence: number): void {
    this.write(`${formatSelection(option.id, confidence)} ${this.describe(option.stimulus)}\n`);
  }
}
