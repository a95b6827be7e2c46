/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isOperation, type JsonValue, type Operation } from "@kvlog/core";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse an operation name, case-insensitively
 */
export function parseOperation(value: string): Operation {
  const upper = value.trim().toUpperCase();

  if (!isOperation(upper)) {
    throw new InvalidArgumentError(`operation must be one of PUT, GET, DELETE, CLEAR`);
  }

  return upper;
}

/**
 * Interpret a value argument as JSON, falling back to the raw string
 * @example parseValue("42") // 42
 * @example parseValue("hello") // "hello"
 */
export function parseValue(value: string): JsonValue {
  // Strip BOM if present
  const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
  try {
    const parsed: JsonValue = JSON.parse(cleaned);
    return parsed;
  } catch {
    return cleaned;
  }
}

/**
 * Split a shell line into words
 * Single and double quotes group words; a backslash escapes the next character.
 */
export function splitWords(line: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (ch === "\\" && quote !== "'" && i + 1 < line.length) {
      current += line.charAt(++i);
      inWord = true;
    } else if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new InvalidArgumentError(`unterminated ${quote} quote`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}
