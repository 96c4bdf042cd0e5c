import { createHash, randomBytes } from "crypto";

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new Error("The operation was aborted");
}

// Resolves after `ms`, or rejects as soon as `signal` aborts.
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return new Promise((resolve) => setTimeout(resolve, ms));
  if (signal.aborted) throw abortReason(signal);

  const abortSignal: AbortSignal = signal;
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(abortSignal));
    };
    const timer = setTimeout(() => {
      abortSignal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    abortSignal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Calls `fn` every `delayMs` until it returns true or `timeoutMs` elapses.
 * Returns false on timeout; rejects if `fn` throws or `signal` aborts.
 */
export async function pollUntil(
  delayMs: number,
  timeoutMs: number,
  fn: () => Promise<boolean | undefined>,
  signal?: AbortSignal,
): Promise<boolean> {
  do {
    if (signal?.aborted) throw abortReason(signal);
    if (await fn()) return true;

    timeoutMs -= delayMs;
    if (timeoutMs > 0) await sleep(delayMs, signal);
  } while (timeoutMs > 0);

  return false;
}

export function getSha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

// JSON with sorted object keys, so equal values always produce the same text
export function stableStringify(value: unknown): string {
  if (Array.isArray(value))
    return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export function hashSpec(value: unknown): string {
  return getSha256(stableStringify(value));
}

export function generatePassword(length = 24): string {
  return randomBytes(length)
    .toString("base64")
    .replace(/[^A-Za-z0-9]/g, "")
    .slice(0, length);
}

/**
 * Exponential backoff: `base * 2^(attempt - 1)`, capped at `ceiling`.
 * `attempt` starts at 1.
 */
export function backoffDelay(
  attempt: number,
  base: number,
  ceiling: number,
): number {
  const exp = Math.max(0, attempt - 1);
  return Math.min(ceiling, base * Math.pow(2, exp));
}

export const TimeoutAbortController = (time: number) => {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`GLOBAL TIMEOUT (${time} secs)`)),
    time * 1000,
  );
  timer.unref();
  controller.signal.addEventListener("abort", () => clearTimeout(timer), {
    once: true,
  });
  return controller;
};

export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) deepFreeze(inner);
  }
  return value;
}
