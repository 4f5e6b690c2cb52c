import { TrialStateError } from "../common/errors.js";
import type {
  BuiltSequence,
  PresentationOrder,
  RepeatPlan,
  SignalSource,
  StimulusDisplay,
  StimulusOption,
  TrialState,
  TrialTiming,
} from "../types.js";

export interface TrialInit<S> {
  options: readonly StimulusOption<S>[];
  sequence: BuiltSequence;
  timing: TrialTiming;
  display: StimulusDisplay<S>;
  signal: SignalSource;
}

/**
 * One presentation run: a preview of every option, then the flashes in
 * `order`. `advance()` is the only call that moves the run forward and it
 * returns how long the caller should wait before calling it again.
 */
export class Trial<S = unknown> {
  readonly options: readonly StimulusOption<S>[];
  readonly order: PresentationOrder;
  readonly repeatPlan: RepeatPlan;
  readonly timing: TrialTiming;
  private readonly display: StimulusDisplay<S>;
  private readonly signal: SignalSource;
  private currentState: TrialState = "init";
  private position = 0;

  constructor(init: TrialInit<S>) {
    if (init.sequence.repeatPlan.length !== init.options.length) {
      throw new RangeError(
        `Repeat plan covers ${init.sequence.repeatPlan.length} options, trial has ${init.options.length}.`,
      );
    }
    this.options = [...init.options];
    this.order = [...init.sequence.order];
    this.repeatPlan = [...init.sequence.repeatPlan];
    this.timing = { ...init.timing };
    this.display = init.display;
    this.signal = init.signal;
  }

  get state(): TrialState {
    return this.currentState;
  }

  get cursor(): number {
    return this.position;
  }

  /** 1-based index of the flash on screen, 0 outside the running phase. */
  get flashIndex(): number {
    return this.currentState === "running" ? this.position + 1 : 0;
  }

  get flashCount(): number {
    return this.order.length;
  }

  get sequence(): BuiltSequence {
    return { order: this.order, repeatPlan: this.repeatPlan };
  }

  isTerminal(): boolean {
    return this.currentState === "completed" || this.currentState === "aborted";
  }

  advance(): number {
    switch (this.currentState) {
      case "init":
        this.currentState = "preview";
        this.display.showPreview(this.options);
        return this.timing.previewMs;
      case "preview":
        this.currentState = "running";
        this.position = 0;
        return this.showFlashAtCursor();
      case "running":
        this.position += 1;
        return this.showFlashAtCursor();
      case "completed":
      case "aborted":
        return 0;
      default:
        return 0;
    }
  }

  /** Back to `init` with the same order, for a retry. Returns the preview wait. */
  reset(): number {
    if (this.currentState !== "completed" && this.currentState !== "init") {
      throw new TrialStateError("reset", this.currentState);
    }
    this.currentState = "init";
    this.position = 0;
    return this.timing.previewMs;
  }

  /** Returns false when the trial had already finished. */
  abort(): boolean {
    if (this.isTerminal()) {
      return false;
    }
    this.currentState = "aborted";
    return true;
  }

  private showFlashAtCursor(): number {
    if (this.position >= this.order.length) {
      this.currentState = "completed";
      return 0;
    }
    const optionIndex = this.order[this.position];
    const option = this.options[optionIndex];
    const flashIndex = this.position + 1;
    this.signal.markFlash(flashIndex);
    this.display.showFlash({
      flashIndex,
      optionIndex,
      optionId: option.id,
      stimulus: option.stimulus,
    });
    return this.timing.flashMs;
  }
}
