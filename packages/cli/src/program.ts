/**
 * kvlog command definitions
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import type { Readable } from "node:stream";
import { toRecordLine, type Operation, type Session } from "@kvlog/core";
import { resolveConfig, isVerbose, type Env, type GlobalOptions } from "./lib/env.js";
import { parseNonNegativeInt, parseOperation, parseValue } from "./lib/arg.js";
import { processOutput, type Output } from "./lib/io.js";
import { printJson, printLines, formatValue, formatStats, colorize } from "./lib/render.js";
import { EXIT_OK, mapErrorToExitCode, formatCliError } from "./lib/errors.js";
import { perCommandSessions, sharedSession, type SessionProvider } from "./lib/store.js";
import { withTiming } from "./lib/telemetry.js";
import { runShell } from "./shell.js";

/**
 * Everything a program run depends on besides its arguments
 */
export interface CliContext {
  out: Output;
  env: Env;
  /** Line source for the interactive shell */
  input: Readable;
  sessions: SessionProvider;
  /** Global options inherited from an enclosing shell */
  defaults?: GlobalOptions;
  /** Set for programs built per shell line */
  nested?: boolean;
}

export function processContext(): CliContext {
  return {
    out: processOutput(),
    env: process.env,
    input: process.stdin,
    sessions: perCommandSessions,
  };
}

function readVersion(): string {
  const pkgPath = join(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}

/**
 * Build the commander program
 * Errors surface as exceptions (exitOverride); nothing here calls process.exit.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  const globals = (): GlobalOptions => ({ ...ctx.defaults, ...program.opts<GlobalOptions>() });

  // Print a status line unless --quiet
  const say = (line: string): void => {
    if (!globals().quiet) ctx.out.stdout(line + "\n");
  };

  // Run a command against a session, timed when verbose
  const withSession = <T>(label: string, fn: (session: Session) => Promise<T>): Promise<T> => {
    const opts = globals();
    return withTiming(`cli.${label}`, ctx.out, isVerbose(opts, ctx.env), () =>
      ctx.sessions.use(resolveConfig(opts, ctx.env), fn)
    );
  };

  // Configure output before commands are added so subcommands inherit it
  program
    .configureOutput({
      writeOut: (str) => ctx.out.stdout(str),
      writeErr: (str) => ctx.out.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", ctx.out.colorErrors ?? false)),
    })
    .exitOverride();

  // Global options
  program
    .name("kvlog")
    .description("Key-value store with write-through persistence and a transaction log")
    .version(readVersion())
    .option("--data-file <path>", "Data file (default: ./kv_store_data.json)")
    .option("--log-file <path>", "Transaction log file (default: ./kv_store_log.json)")
    .option("--log-reads", "Record successful reads in the transaction log")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("put <key> <value...>")
    .description("Store a value (parsed as JSON when possible, otherwise kept as text)")
    .action(async (key: string, words: string[]) => {
      await withSession("put", async ({ store }) => {
        const previous = await store.put(key, parseValue(words.join(" ")));
        say(previous === null ? `Stored ${key}` : `Stored ${key} (was ${formatValue(previous)})`);
      });
    });

  program
    .command("get <key>")
    .description("Print a value as JSON")
    .option("--raw", "Output compact JSON without formatting")
    .action(async (key: string, options: { raw?: boolean }) => {
      await withSession("get", async ({ store }) => {
        printJson(ctx.out, await store.get(key), { raw: options.raw });
      });
    });

  program
    .command("delete <key>")
    .description("Remove a key")
    .action(async (key: string) => {
      await withSession("delete", async ({ store }) => {
        await store.delete(key);
        say(`Deleted ${key}`);
      });
    });

  program
    .command("list")
    .description("List all keys with their values")
    .option("--json", "Output as a JSON object")
    .action(async (options: { json?: boolean }) => {
      await withSession("list", async ({ store }) => {
        const items = await store.items();

        if (options.json) {
          printJson(ctx.out, Object.fromEntries(items));
        } else if (items.length === 0) {
          say("Store is empty");
        } else {
          printLines(
            ctx.out,
            items.map(([key, value]) => `${key}: ${formatValue(value)}`)
          );
        }
      });
    });

  program
    .command("clear")
    .description("Remove every key")
    .action(async () => {
      await withSession("clear", async ({ store }) => {
        const removed = await store.clear();
        say(`Cleared ${removed} entries`);
      });
    });

  program
    .command("size")
    .description("Print the number of keys")
    .action(async () => {
      await withSession("size", async ({ store }) => {
        ctx.out.stdout(`${await store.size()}\n`);
      });
    });

  const log = program.command("log").description("Inspect the transaction log");

  log
    .command("show")
    .description("Print matching records as JSON, oldest first")
    .option("--operation <op>", "Only records of this operation", parseOperation)
    .option("--key <key>", "Only records for this key")
    .option("--limit <n>", "Keep the most recent N matches", (val) =>
      parseNonNegativeInt(val, "--limit")
    )
    .action(async (options: { operation?: Operation; key?: string; limit?: number }) => {
      await withSession("log.show", async ({ transactions }) => {
        printJson(ctx.out, transactions.show(options).map(toRecordLine));
      });
    });

  log
    .command("stats")
    .description("Summarise the transaction log")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: { json?: boolean }) => {
      await withSession("log.stats", async ({ store, transactions }) => {
        const stats = transactions.stats();
        const storeSize = await store.size();

        if (options.json) {
          printJson(ctx.out, { ...stats, storeSize });
        } else {
          printLines(ctx.out, formatStats(stats, storeSize));
        }
      });
    });

  log
    .command("clear")
    .description("Remove every record from the transaction log")
    .action(async () => {
      await withSession("log.clear", async ({ transactions }) => {
        const removed = await transactions.clearLog();
        say(`Cleared ${removed} log records`);
      });
    });

  if (!ctx.nested) {
    program
      .command("shell")
      .description("Run commands interactively against one open store")
      .action(async () => {
        const defaults = globals();
        await withSession("shell", (session) => {
          const shellCtx: CliContext = {
            ...ctx,
            sessions: sharedSession(session),
            defaults,
            nested: true,
          };
          return runShell(shellCtx, (words) => run(words, shellCtx));
        });
      });
  }

  return program;
}

/**
 * Parse and run one command line
 * @returns The process exit code
 */
export async function run(args: string[], ctx: CliContext = processContext()): Promise<number> {
  const program = createProgram(ctx);

  try {
    await program.parseAsync(args, { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // Commander has already printed its own usage errors and help
    if (!(err instanceof CommanderError)) {
      const opts: GlobalOptions = { ...ctx.defaults, ...program.opts<GlobalOptions>() };
      const message = formatCliError(err, isVerbose(opts, ctx.env));
      ctx.out.stderr(colorize(`Error: ${message}`, "red", ctx.out.colorErrors ?? false) + "\n");
    }
    return mapErrorToExitCode(err);
  }
}
