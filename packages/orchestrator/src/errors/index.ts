import { isRecord } from "@fabkube/utils";
import {
  PERMANENT_ERROR_PATTERNS,
  TRANSIENT_ERROR_PATTERNS,
} from "../constants";
import BaseError from "./baseError";
import { serialize } from "./serializer";

/** Bad, missing or dangling configuration. Reported before any cluster call. */
export class ValidationError extends BaseError {
  readonly issues: string[];
  readonly warnings: string[];

  constructor(issues: string[], warnings: string[] = []) {
    super(
      `invalid topology configuration (${issues.length} issue${
        issues.length === 1 ? "" : "s"
      }):\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.issues = issues;
    this.warnings = warnings;
  }
}

/** Timeouts, connection resets and the like; worth another attempt. */
export class TransientClusterError extends BaseError {}

/** The cluster (or a tool acting on it) rejected what we asked for. */
export class PermanentResourceError extends BaseError {}

/** Status given to dependents of an entity that can no longer become ready. */
export class DependencyBlockedError extends BaseError {
  readonly entity: string;
  readonly blockedBy: string;

  constructor(entity: string, blockedBy: string) {
    super(`${entity} is blocked by ${blockedBy}`);
    this.entity = entity;
    this.blockedBy = blockedBy;
  }
}

export type ClusterError = TransientClusterError | PermanentResourceError;

function errorText(err: unknown): string {
  if (!isRecord(err)) return String(err);

  const parts: string[] = [];
  for (const key of ["stderr", "shortMessage", "message"]) {
    const value = err[key];
    if (typeof value === "string" && value) parts.push(value);
  }
  return parts.join("\n");
}

/**
 * Classify a failed call against the cluster. Known permanent failures (the
 * spec is rejected) win over transient ones; anything unknown is treated as
 * transient and left to the retry budget.
 */
export function classifyClusterError(
  err: unknown,
  context?: string,
): ClusterError {
  if (err instanceof TransientClusterError) return err;
  if (err instanceof PermanentResourceError) return err;

  const text = errorText(err);
  const firstLine = text.split("\n").find((line) => line.trim()) || "";
  const message = context ? `${context}: ${firstLine}` : firstLine;
  const cause = err instanceof Error ? err : undefined;

  if (PERMANENT_ERROR_PATTERNS.some((pattern) => pattern.test(text)))
    return cause
      ? new PermanentResourceError(cause, message)
      : new PermanentResourceError(message);

  if (TRANSIENT_ERROR_PATTERNS.some((pattern) => pattern.test(text)))
    return cause
      ? new TransientClusterError(cause, message)
      : new TransientClusterError(message);

  return cause
    ? new TransientClusterError(cause, message)
    : new TransientClusterError(message);
}

export { BaseError, serialize };
export type { SerializedError } from "./serializer";
