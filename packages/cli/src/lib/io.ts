/**
 * I/O helpers for CLI
 */

import type { Readable } from "node:stream";

/**
 * Destination for everything the CLI prints
 * Commands never touch process streams directly, so tests can capture output
 */
export interface Output {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether stderr is an interactive terminal (enables color) */
  readonly colorErrors?: boolean;
}

/**
 * Output bound to the real process streams
 */
export function processOutput(): Output {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    colorErrors: process.stderr.isTTY ?? false,
  };
}

/**
 * Output that buffers everything in memory
 */
export function bufferedOutput(): Output & { readonly out: string[]; readonly err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(input: Readable = process.stdin): boolean {
  return "isTTY" in input && input.isTTY === true;
}
