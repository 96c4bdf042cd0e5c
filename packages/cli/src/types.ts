import { LogType } from "@fabkube/utils";

// Options shared by every command, after parsing.
export interface CliOptions {
  timeout?: number;
  maxAttempts?: number;
  backoffCeiling?: number;
  concurrency?: number;
  target?: string[];
  dir?: string;
  logType?: LogType;
}

export interface PackageInfo {
  version: string;
  nodeVersion: string;
}
