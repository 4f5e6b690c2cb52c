import { stringifyError } from "../common/errors.js";
import { defaultRandom, type RandomSource } from "../common/random.js";
import { Logger } from "../logger.js";
import { formatScoreDiagnostics, scoreTrial } from "../scoring/scoreAggregator.js";
import { buildSequence } from "../sequence/sequenceBuilder.js";
import { Trial } from "../trial/trial.js";
import type {
  EngineSettings,
  FlashTimer,
  RankingOutcome,
  RankingRequest,
  ScoreOutcome,
  SignalSource,
  StimulusDisplay,
} from "../types.js";
import { parseRankingRequest } from "./request.js";

export interface TrialControllerDeps<S> {
  display: StimulusDisplay<S>;
  signal: SignalSource;
  timer: FlashTimer;
  settings: EngineSettings;
  logger?: Logger;
  random?: RandomSource;
}

interface ActiveRun<S> {
  runNumber: number;
  trial: Trial<S>;
  attempts: number;
  resolve: (outcome: RankingOutcome) => void;
}

/**
 * Owns at most one live trial and turns its wait times into timer ticks.
 * Rejected scores restart the same trial until `maxRetries` is used up.
 */
export class TrialController<S = unknown> {
  private readonly display: StimulusDisplay<S>;
  private readonly signal: SignalSource;
  private readonly timer: FlashTimer;
  private readonly settings: EngineSettings;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private activeRun?: ActiveRun<S>;
  private runCounter = 0;

  constructor(deps: TrialControllerDeps<S>) {
    this.display = deps.display;
    this.signal = deps.signal;
    this.timer = deps.timer;
    this.settings = deps.settings;
    this.logger = deps.logger ?? new Logger({ debugEnabled: false });
    this.random = deps.random ?? defaultRandom;
    this.display.showIdle(this.signal.mode);
  }

  isBusy(): boolean {
    return this.activeRun !== undefined;
  }

  get currentTrial(): Trial<S> | undefined {
    return this.activeRun?.trial;
  }

  requestRanking(request: RankingRequest<S>): Promise<RankingOutcome> {
    if (this.activeRun) {
      this.logger.warn(`Declining ranking request: run #${this.activeRun.runNumber} is in progress.`);
      return Promise.resolve({ kind: "busy" });
    }

    const parsed = parseRankingRequest(request, this.settings.timing);
    if (!parsed.ok) {
      this.logger.warn(`Declining malformed ranking request: ${parsed.reason}`);
      return Promise.resolve({ kind: "malformed", reason: parsed.reason });
    }

    const sequence = buildSequence(
      parsed.options.length,
      this.settings.minRepeat,
      this.settings.maxRepeat,
      this.random,
    );
    const trial = new Trial<S>({
      options: parsed.options,
      sequence,
      timing: parsed.timing,
      display: this.display,
      signal: this.signal,
    });
    this.runCounter += 1;
    const runNumber = this.runCounter;
    this.logger.info(
      `Run #${runNumber}: ${parsed.options.length} options, ${trial.flashCount} flashes, ` +
        `preview=${parsed.timing.previewMs}ms flash=${parsed.timing.flashMs}ms`,
    );
    this.logger.debug(`Run #${runNumber} order: ${trial.order.join(",")}`);

    return new Promise<RankingOutcome>((resolve, reject) => {
      this.activeRun = { runNumber, trial, attempts: 1, resolve };
      try {
        this.signal.beginBlock();
        this.timer.start(trial.advance(), () => this.tick());
      } catch (error) {
        this.activeRun = undefined;
        this.timer.stop();
        this.signal.endBlock();
        reject(error);
      }
    });
  }

  /** Cancels the live trial, if any. Returns false when there was nothing to abort. */
  abort(): boolean {
    const run = this.activeRun;
    if (!run) {
      return false;
    }
    run.trial.abort();
    this.logger.warn(`Run #${run.runNumber} aborted during attempt ${run.attempts}.`);
    this.finish(run, { kind: "aborted" });
    return true;
  }

  private tick(): void {
    const run = this.activeRun;
    if (!run) {
      return;
    }
    let waitMs: number;
    try {
      waitMs = run.trial.advance();
    } catch (error) {
      this.logger.error(`Run #${run.runNumber} failed to advance: ${stringifyError(error)}`);
      run.trial.abort();
      this.finish(run, { kind: "aborted" });
      return;
    }
    if (run.trial.state === "completed") {
      this.timer.stop();
      this.completeAttempt(run);
      return;
    }
    if (run.trial.state === "aborted") {
      this.finish(run, { kind: "aborted" });
      return;
    }
    this.timer.start(waitMs, () => this.tick());
  }

  private completeAttempt(run: ActiveRun<S>): void {
    const { trial } = run;

    let outcome: ScoreOutcome;
    try {
      this.signal.endBlock();
      const samples = this.signal.readBlock(trial.sequence);
      outcome = scoreTrial(trial.order, trial.repeatPlan, samples, {
        optionIds: trial.options.map((option) => option.id),
        separationThreshold: this.settings.separationThreshold,
        correctZThreshold: this.settings.correctZThreshold,
      });
    } catch (error) {
      this.logger.error(`Run #${run.runNumber} scoring failed: ${stringifyError(error)}`);
      this.finish(run, { kind: "aborted" });
      return;
    }

    if (outcome.kind === "accepted") {
      const { result } = outcome;
      this.logger.info(
        `Run #${run.runNumber} accepted on attempt ${run.attempts}: ` +
          `best=${result.optionIds[0]} (${formatScoreDiagnostics(outcome.diagnostics)})`,
      );
      this.release(run);
      run.resolve({ kind: "ranked", result, attempts: run.attempts });
      const best = trial.options.find((option) => option.id === result.optionIds[0]);
      if (best) {
        this.guard(run, "result display", () => this.display.showResult(best, result.confidences[0]));
      }
      return;
    }

    this.logger.warn(
      `Run #${run.runNumber} attempt ${run.attempts} rejected: ${outcome.reason} ` +
        `(${formatScoreDiagnostics(outcome.diagnostics)})`,
    );
    if (run.attempts > this.settings.maxRetries) {
      this.logger.warn(`Run #${run.runNumber} gave up after ${run.attempts} attempts.`);
      this.finish(run, { kind: "unconverged", attempts: run.attempts });
      return;
    }

    run.attempts += 1;
    try {
      this.signal.clear();
      this.signal.beginBlock();
      this.timer.start(trial.reset(), () => this.tick());
    } catch (error) {
      this.logger.error(`Run #${run.runNumber} failed to restart: ${stringifyError(error)}`);
      trial.abort();
      this.finish(run, { kind: "aborted" });
    }
  }

  /** Always releases the run and settles its promise, whatever the collaborators throw. */
  private finish(run: ActiveRun<S>, outcome: RankingOutcome): void {
    this.timer.stop();
    this.guard(run, "block close", () => {
      if (this.signal.isInBlock()) {
        this.signal.endBlock();
      }
    });
    this.release(run);
    run.resolve(outcome);
    this.guard(run, "idle display", () => this.display.showIdle(this.signal.mode));
  }

  private release(run: ActiveRun<S>): void {
    if (this.activeRun === run) {
      this.activeRun = undefined;
    }
    this.guard(run, "signal clear", () => this.signal.clear());
  }

  private guard(run: ActiveRun<S>, step: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.error(`Run #${run.runNumber} ${step} failed: ${stringifyError(error)}`);
    }
  }
}
