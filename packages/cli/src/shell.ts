/**
 * Interactive shell: one command per line against a shared session
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { splitWords } from "./lib/arg.js";
import { formatCliError } from "./lib/errors.js";
import { isStdinTTY, type Output } from "./lib/io.js";

const EXIT_WORDS = new Set(["exit", "quit", "q"]);
const PROMPT = "kvlog> ";

export interface ShellIO {
  input: Readable;
  out: Output;
}

/**
 * Read lines until exit/quit or end of input, running each through `execute`
 *
 * A failing line prints its error and the loop continues; the exit codes of
 * individual lines are not propagated.
 */
export async function runShell(
  io: ShellIO,
  execute: (words: string[]) => Promise<number>
): Promise<void> {
  const interactive = isStdinTTY(io.input);
  const rl = createInterface({
    input: io.input,
    output: interactive ? process.stdout : undefined,
    terminal: interactive,
  });

  if (interactive) {
    io.out.stdout("kvlog interactive shell. Type 'help' for commands, 'exit' to quit.\n");
    rl.setPrompt(PROMPT);
    rl.prompt();
  }

  try {
    for await (const line of rl) {
      const trimmed = line.trim();

      if (trimmed !== "") {
        if (EXIT_WORDS.has(trimmed.toLowerCase())) break;

        let words: string[];
        try {
          words = splitWords(trimmed);
        } catch (err) {
          io.out.stderr(`Error: ${formatCliError(err)}\n`);
          words = [];
        }

        if (words.length > 0) {
          await execute(words);
        }
      }

      if (interactive) rl.prompt();
    }
  } finally {
    rl.close();
  }
}
