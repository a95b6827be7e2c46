/**
 * Throughput checks for the store and transaction log
 * Run with: KVLOG_PERF=1 npm test
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openSession, type Session } from "../src/session.js";

// Only run benchmarks if KVLOG_PERF is set
const describeIf = process.env.KVLOG_PERF ? describe : describe.skip;

describeIf("Store throughput", () => {
  let testDir: string;
  let session: Session;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "kvlog-bench-"));
    session = await openSession({
      dataFile: join(testDir, "data.json"),
      logFile: join(testDir, "log.ndjson"),
      fsync: false,
    });
  });

  afterEach(async () => {
    await session.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it("500 sequential puts < 5s", { timeout: 30000 }, async () => {
    const start = Date.now();
    for (let i = 0; i < 500; i++) {
      await session.store.put(`key:${i}`, { seq: i, label: `item ${i}` });
    }
    const duration = Date.now() - start;

    console.log(`Sequential puts: 500 writes in ${duration}ms`);
    expect(duration).toBeLessThan(5000);
    expect(session.transactions.size()).toBe(500);
  });

  it("10000 reads against 500 keys < 1s", { timeout: 30000 }, async () => {
    for (let i = 0; i < 500; i++) {
      await session.store.put(`key:${i}`, i);
    }

    const start = Date.now();
    await Promise.all(Array.from({ length: 10000 }, (_, i) => session.store.get(`key:${i % 500}`)));
    const duration = Date.now() - start;

    console.log(`Concurrent reads: 10000 gets in ${duration}ms`);
    expect(duration).toBeLessThan(1000);
  });

  it("show() over 5000 records < 50ms", { timeout: 30000 }, async () => {
    const memory = await openSession();
    for (let i = 0; i < 5000; i++) {
      await memory.store.put(`k${i % 100}`, i);
    }

    const start = Date.now();
    const records = memory.transactions.show({ operation: "PUT", key: "k7", limit: 10 });
    const duration = Date.now() - start;

    console.log(`Filtered show: ${records.length} records in ${duration}ms`);
    expect(duration).toBeLessThan(50);
    expect(records).toHaveLength(10);
    await memory.close();
  });
});
