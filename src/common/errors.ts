import type { TrialState } from "../types.js";

export class TrialStateError extends Error {
  constructor(
    readonly operation: string,
    readonly state: TrialState,
  ) {
    super(`Cannot ${operation} a trial in state "${state}".`);
    this.name = "TrialStateError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
