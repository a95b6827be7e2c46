import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openSession, withSession, type Session } from "./session.js";
import { ClosedError, CorruptedStoreError, KeyNotFoundError } from "./errors.js";

describe("Session", () => {
  let testDir: string;
  let dataFile: string;
  let logFile: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "kvlog-session-"));
    dataFile = join(testDir, "kv_store_data.json");
    logFile = join(testDir, "kv_store_log.json");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should record an overwrite with its old and new values", async () => {
    await withSession({ dataFile, logFile }, async ({ store, transactions }) => {
      await store.put("a", "1");
      await store.put("a", "2");

      const [, second] = transactions.show({ operation: "PUT", key: "a" });
      expect(second?.oldValue).toBe("1");
      expect(second?.value).toBe("2");
    });
  });

  it("should summarise three puts and a delete", async () => {
    await withSession({ dataFile, logFile }, async ({ store, transactions }) => {
      await store.put("a", 1);
      await store.put("b", 2);
      await store.put("c", 3);
      await store.delete("b");

      const stats = transactions.stats();
      expect(stats.total).toBe(4);
      expect(stats.operations).toEqual({ PUT: 3, GET: 0, DELETE: 1, CLEAR: 0 });
      expect(stats.distinctKeys).toBe(3);
    });
  });

  it("should not log a failed read", async () => {
    await withSession({ dataFile, logFile, logReads: true }, async ({ store, transactions }) => {
      await expect(store.get("missing")).rejects.toThrow(KeyNotFoundError);

      expect(transactions.size()).toBe(0);
    });
  });

  it("should restore data and log state on reopen", async () => {
    await withSession({ dataFile, logFile }, async ({ store }) => {
      await store.put("user:1", { name: "Ada" });
      await store.put("user:2", { name: "Grace" });
      await store.delete("user:1");
    });

    await withSession({ dataFile, logFile }, async ({ store, transactions }) => {
      expect(await store.items()).toEqual([["user:2", { name: "Grace" }]]);
      expect(transactions.show().map((r) => r.operation)).toEqual(["PUT", "PUT", "DELETE"]);

      const next = await store.put("user:3", { name: "Edsger" });
      expect(next).toBeNull();
      expect(transactions.lastTransactionId).toBe(4);
    });

    const lines = (await readFile(logFile, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(4);
  });

  it("should close both components", async () => {
    const session = await openSession({ dataFile, logFile });
    await session.close();

    await expect(session.store.put("a", 1)).rejects.toThrow(ClosedError);
    await expect(session.transactions.log("PUT", "a", 1)).rejects.toThrow(
      "The transaction log is closed"
    );
  });

  it("should close the session when the callback throws", async () => {
    const opened: Session[] = [];

    await expect(
      withSession({ dataFile, logFile }, async (session) => {
        opened.push(session);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    const [session] = opened;
    if (!session) throw new Error("callback did not run");
    await expect(session.store.size()).rejects.toThrow(ClosedError);
  });

  it("should propagate a corrupted data file", async () => {
    await writeFile(dataFile, "not json");

    await expect(openSession({ dataFile, logFile })).rejects.toThrow(CorruptedStoreError);
  });

  it("should run entirely in memory without paths", async () => {
    const session = await openSession();
    await session.store.put("a", 1);

    expect(session.store.dataFile).toBeUndefined();
    expect(session.transactions.logFile).toBeUndefined();
    expect(session.transactions.size()).toBe(1);
    await session.close();
  });
});
