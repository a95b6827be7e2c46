/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openSession } from "@kvlog/core";
import type { Session, SessionOptions } from "@kvlog/core";

/**
 * Data and log file locations inside a temp directory
 */
export interface TempFiles {
  dir: string;
  dataFile: string;
  logFile: string;
}

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "kvlog-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "kvlog-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Standard file names for a store living in `dir`
 */
export function tempFiles(dir: string): TempFiles {
  return {
    dir,
    dataFile: join(dir, "kv_store_data.json"),
    logFile: join(dir, "kv_store_log.json"),
  };
}

/**
 * Execute a function with a session on temp files, cleaning up after
 * @param fn - Function to execute with the open session
 * @param options - Optional session options (file paths will be overridden)
 * @returns Result of fn
 */
export async function withTempSession<T>(
  fn: (session: Session, files: TempFiles) => Promise<T>,
  options?: Omit<SessionOptions, "dataFile" | "logFile">
): Promise<T> {
  const files = tempFiles(await createTempDir());
  let session: Session;
  try {
    session = await openSession({ ...options, dataFile: files.dataFile, logFile: files.logFile });
  } catch (err) {
    await removeDir(files.dir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(session, files);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await session.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(files.dir);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
