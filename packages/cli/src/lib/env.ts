/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_DATA_FILE = "./kv_store_data.json";
export const DEFAULT_LOG_FILE = "./kv_store_log.json";

export type Env = Record<string, string | undefined>;

/**
 * Global options as commander hands them over
 */
export type GlobalOptions = {
  dataFile?: string;
  logFile?: string;
  logReads?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CliConfig {
  dataFile: string;
  logFile: string;
  logReads: boolean;
}

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

function resolvePath(value: string): string {
  return path.resolve(expandTilde(value));
}

/**
 * Interpret a boolean environment flag
 */
export function isEnabled(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Resolve file locations and flags
 * Priority: CLI option > KVLOG_* env var > default
 */
export function resolveConfig(options: GlobalOptions, env: Env = process.env): CliConfig {
  return {
    dataFile: resolvePath(options.dataFile ?? env.KVLOG_DATA_FILE ?? DEFAULT_DATA_FILE),
    logFile: resolvePath(options.logFile ?? env.KVLOG_LOG_FILE ?? DEFAULT_LOG_FILE),
    logReads: options.logReads === true || isEnabled(env.KVLOG_LOG_READS),
  };
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(options: GlobalOptions, env: Env = process.env): boolean {
  return options.verbose === true || env.KVLOG_CLI_DEBUG === "1";
}
