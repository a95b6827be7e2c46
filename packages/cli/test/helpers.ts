/**
 * In-process CLI runner for tests
 */

import { Readable } from "node:stream";
import { run } from "../src/program.js";
import { bufferedOutput } from "../src/lib/io.js";
import { perCommandSessions } from "../src/lib/store.js";
import type { Env } from "../src/lib/env.js";

export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CliRunOptions {
  /** Environment seen by the program (process.env is not consulted) */
  env?: Env;
  /** Text fed to stdin, for the shell */
  input?: string;
}

/**
 * Run one kvlog command line and capture its output
 */
export async function runCli(args: string[], options: CliRunOptions = {}): Promise<CliResult> {
  const out = bufferedOutput();
  const exitCode = await run(args, {
    out,
    env: options.env ?? {},
    input: Readable.from(options.input === undefined ? [] : [options.input]),
    sessions: perCommandSessions,
  });

  return { stdout: out.out.join(""), stderr: out.err.join(""), exitCode };
}
