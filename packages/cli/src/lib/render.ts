/**
 * Output rendering helpers
 */

import type { JsonValue, StatsSummary } from "@kvlog/core";
import type { Output } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(out: Output, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  out.stdout(json + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(out: Output, lines: string[]): void {
  lines.forEach((line) => out.stdout(line + "\n"));
}

/**
 * Single-line rendering of a stored value
 */
export function formatValue(value: JsonValue): string {
  return JSON.stringify(value);
}

/**
 * Human-readable log statistics
 */
export function formatStats(stats: StatsSummary, storeSize: number): string[] {
  const lines = [`Transactions: ${stats.total}`, `Store size: ${storeSize}`, "Operations:"];

  for (const [operation, count] of Object.entries(stats.operations)) {
    lines.push(`  ${operation}: ${count}`);
  }

  lines.push(`Distinct keys: ${stats.distinctKeys}`);

  if (stats.durationMs) {
    const { min, max, avg } = stats.durationMs;
    lines.push(`Duration (ms): min ${min}, max ${max}, avg ${avg}`);
  }

  if (stats.firstTimestamp && stats.lastTimestamp) {
    lines.push(`First: ${stats.firstTimestamp}`, `Last: ${stats.lastTimestamp}`);
  }

  return lines;
}

/**
 * Apply ANSI color only if the destination is a TTY
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
