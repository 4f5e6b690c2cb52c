import { z } from "zod";
import { ConfigError } from "./common/errors.js";
import type { EngineConfig } from "./types.js";

const schema = z
  .object({
    previewMs: z.number().int().positive().max(60_000),
    flashMs: z.number().int().min(10).max(5_000),
    minRepeat: z.number().int().min(1).max(50),
    maxRepeat: z.number().int().min(1).max(50),
    maxRetries: z.number().int().min(0).max(100),
    separationThreshold: z.number().positive(),
    correctZThreshold: z.number().min(0),
    optionCount: z.number().int().min(1).max(64),
    seed: z.string().min(1).optional(),
    target: z.number().int().min(0).optional(),
    debug: z.boolean(),
  })
  .refine((value) => value.maxRepeat >= value.minRepeat, {
    message: "max-repeat must not be lower than min-repeat",
    path: ["maxRepeat"],
  })
  .refine((value) => value.target === undefined || value.target < value.optionCount, {
    message: "target must be an option index below the option count",
    path: ["target"],
  });

const PRESENTATION_FREQUENCY_HZ = 4;

export const DEFAULTS = {
  previewMs: 5_000,
  flashMs: Math.round(1000 / PRESENTATION_FREQUENCY_HZ),
  minRepeat: 3,
  maxRepeat: 7,
  maxRetries: 5,
  separationThreshold: 2,
  correctZThreshold: 0.5,
  optionCount: 6,
  debug: false,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildEngineConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const args = parseCliArgs(argv);

  const parsed = schema.safeParse({
    previewMs: readNumber(args, "preview-ms") ?? DEFAULTS.previewMs,
    flashMs: readNumber(args, "flash-ms") ?? DEFAULTS.flashMs,
    minRepeat: readNumber(args, "min-repeat") ?? DEFAULTS.minRepeat,
    maxRepeat: readNumber(args, "max-repeat") ?? DEFAULTS.maxRepeat,
    maxRetries:
      readNumber(args, "max-retries") ?? readEnvInt(env, "RSVP_MAX_RETRIES", DEFAULTS.maxRetries),
    separationThreshold: readNumber(args, "separation-threshold") ?? DEFAULTS.separationThreshold,
    correctZThreshold: readNumber(args, "correct-z-threshold") ?? DEFAULTS.correctZThreshold,
    optionCount: readNumber(args, "options") ?? DEFAULTS.optionCount,
    seed: readOptionalString(args, "seed") ?? nonEmpty(env.RSVP_SEED),
    target: readNumber(args, "target"),
    debug: readBool(args, "debug", DEFAULTS.debug),
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const { previewMs, flashMs, ...rest } = parsed.data;
  return {
    ...rest,
    timing: { previewMs, flashMs },
  };
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return undefined;
}

function readNumber(args: CliRaw, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return Number(value);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}

function readEnvInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    return fallback;
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}
