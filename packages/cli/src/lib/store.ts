/**
 * Session adapter for CLI
 * One-shot commands open and close their own session; the shell shares one
 */

import { openSession, type Session } from "@kvlog/core";
import type { CliConfig } from "./env.js";

/**
 * Where commands get their session from
 */
export interface SessionProvider {
  /** Run `fn` with a session for the given configuration */
  use<T>(config: CliConfig, fn: (session: Session) => Promise<T>): Promise<T>;
}

/**
 * Open a fresh session per command and close it afterwards
 */
export const perCommandSessions: SessionProvider = {
  async use(config, fn) {
    const session = await openCliSession(config);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  },
};

/**
 * Hand every command the same session; the owner closes it
 */
export function sharedSession(session: Session): SessionProvider {
  return {
    use: (_config, fn) => fn(session),
  };
}

/**
 * Open a session from resolved CLI configuration
 */
export function openCliSession(config: CliConfig): Promise<Session> {
  return openSession({
    dataFile: config.dataFile,
    logFile: config.logFile,
    logReads: config.logReads,
  });
}
