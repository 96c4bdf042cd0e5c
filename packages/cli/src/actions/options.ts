import { getLogType } from "@fabkube/utils";
import { Settings } from "@fabkube/orchestrator";
import { InvalidArgumentError } from "commander";
import { CliOptions } from "../types";

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0)
    throw new InvalidArgumentError("Expected a positive integer.");
  return parsed;
}

const numberOf = (value: unknown) =>
  typeof value === "number" ? value : undefined;

// commander hands options over untyped; keep only what has the expected shape
export function parseCliOptions(values: Record<string, unknown>): CliOptions {
  const { target, dir, logType } = values;
  return {
    timeout: numberOf(values.timeout),
    maxAttempts: numberOf(values.maxAttempts),
    backoffCeiling: numberOf(values.backoffCeiling),
    concurrency: numberOf(values.concurrency),
    target: Array.isArray(target)
      ? target.filter((t): t is string => typeof t === "string")
      : undefined,
    dir: typeof dir === "string" ? dir : undefined,
    logType: getLogType(typeof logType === "string" ? logType : undefined),
  };
}

// cli flags take precedence over the `settings` section
export function settingsOverrides(opts: CliOptions): Partial<Settings> {
  return {
    timeout: opts.timeout,
    maxAttempts: opts.maxAttempts,
    backoffCeiling: opts.backoffCeiling,
    concurrency: opts.concurrency,
  };
}
