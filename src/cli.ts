#!/usr/bin/env node
import { createSeededRandom, defaultRandom } from "./common/random.js";
import { stringifyError } from "./common/errors.js";
import { buildEngineConfig } from "./config.js";
import { NodeFlashTimer, TrialController } from "./controller.js";
import { ConsoleDisplay } from "./display/console.js";
import { formatOutcome } from "./display/format.js";
import { Logger } from "./logger.js";
import { SimulatedSignalSource } from "./signal/simulatedSignalSource.js";
import type { StimulusOption } from "./types.js";

async function main(): Promise<number> {
  const config = buildEngineConfig(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: config.debug });
  const random = config.seed ? createSeededRandom(config.seed) : defaultRandom;

  const controller = new TrialController<string>({
    display: new ConsoleDisplay<string>(),
    signal: new SimulatedSignalSource({ random, targetIndex: config.target }),
    timer: new NodeFlashTimer(),
    settings: config,
    logger,
    random,
  });

  process.once("SIGINT", () => {
    if (!controller.abort()) {
      process.exit(130);
    }
  });

  const options: StimulusOption<string>[] = Array.from({ length: config.optionCount }, (_, index) => ({
    id: index + 1,
    stimulus: `option-${index + 1}`,
  }));
  const outcome = await controller.requestRanking({ options });
  process.stdout.write(`${formatOutcome(outcome)}\n`);
  if (outcome.kind === "aborted") {
    return 130;
  }
  return outcome.kind === "ranked" ? 0 : 2;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
    process.exit(1);
  });
