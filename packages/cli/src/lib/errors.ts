/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { KVStoreError, KeyNotFoundError } from "@kvlog/core";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map store errors to CLI exit codes
 * - 0: success (help and version output)
 * - 1: usage/validation/IO/unknown error
 * - 2: key not found
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof KeyNotFoundError) {
    return EXIT_NOT_FOUND;
  }

  // InvalidArgumentError extends CommanderError; both carry commander's own code
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error instanceof KVStoreError) {
      message += `\n  Code: ${error.code}`;
    }

    if (verbose && error.cause !== undefined) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
