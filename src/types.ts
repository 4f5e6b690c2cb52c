export type TrialState = "init" | "preview" | "running" | "completed" | "aborted";
export type SignalMode = "live" | "simulation";

export interface StimulusOption<S = unknown> {
  id: number;
  stimulus: S;
}

/** Entry `i` is the number of flashes option `i` receives. */
export type RepeatPlan = readonly number[];

/** Option indices in flash order. */
export type PresentationOrder = readonly number[];

export interface TrialTiming {
  previewMs: number;
  flashMs: number;
}

export interface BuiltSequence {
  order: PresentationOrder;
  repeatPlan: RepeatPlan;
}

export interface FlashFrame<S = unknown> {
  flashIndex: number;
  optionIndex: number;
  optionId: number;
  stimulus: S;
}

export interface FlashSample {
  /** 1-based, matches emission order within the block. */
  flashIndex: number;
  signalValue: number;
  rankPosition: number;
}

export interface RankedResult {
  optionIds: number[];
  confidences: number[];
}

export type RejectReason =
  | "no_samples"
  | "flat_signal"
  | "no_spread"
  | "insufficient_separation";

export interface ScoreDiagnostics {
  overallMedian: number;
  overallStd: number;
  bestConfidence?: number;
  restMean?: number;
  restStd?: number;
  separation?: number;
  droppedSamples: number;
}

export type ScoreOutcome =
  | { kind: "accepted"; result: RankedResult; diagnostics: ScoreDiagnostics }
  | { kind: "rejected"; reason: RejectReason; diagnostics: ScoreDiagnostics };

export type RankingOutcome =
  | { kind: "ranked"; result: RankedResult; attempts: number }
  | { kind: "busy" }
  | { kind: "malformed"; reason: string }
  | { kind: "aborted" }
  | { kind: "unconverged"; attempts: number };

export interface RankingRequest<S = unknown> {
  options: StimulusOption<S>[];
  timing?: Partial<TrialTiming>;
}

export interface EngineSettings {
  timing: TrialTiming;
  minRepeat: number;
  maxRepeat: number;
  maxRetries: number;
  separationThreshold: number;
  correctZThreshold: number;
}

export interface EngineConfig extends EngineSettings {
  optionCount: number;
  seed?: string;
  target?: number;
  debug: boolean;
}

export interface StimulusDisplay<S = unknown> {
  showIdle(mode: SignalMode): void;
  showPreview(options: readonly StimulusOption<S>[]): void;
  showFlash(frame: FlashFrame<S>): void;
  showResult(option: StimulusOption<S>, confidence: number): void;
}

export interface SignalSource {
  readonly mode: SignalMode;
  beginBlock(): void;
  endBlock(): void;
  isInBlock(): boolean;
  /** A new, not yet labelled flash has started. */
  markFlash(flashIndex: number): void;
  readBlock(sequence: BuiltSequence): FlashSample[];
  clear(): void;
}

export interface FlashTimer {
  /** Replaces any pending tick; a delay of 0 or less only stops the timer. */
  start(delayMs: number, tick: () => void): void;
  stop(): void;
}
