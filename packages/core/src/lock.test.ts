import { describe, it, expect } from "vitest";
import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";
import { Mutex, ReadWriteLock } from "./lock.js";

/**
 * Let already-resolved promise continuations run
 */
async function flush(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
}

describe("Mutex", () => {
  it("should grant waiters in arrival order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        mutex.runExclusive(async () => {
          order.push(n);
          await sleep(1);
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.locked).toBe(false);
  });

  it("should release the mutex when the function throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.locked).toBe(false);
  });

  it("should reject a release while not held", () => {
    expect(() => new Mutex().release()).toThrow("Mutex released while not held");
  });
});

describe("ReadWriteLock", () => {
  it("should let readers share the lock", async () => {
    const lock = new ReadWriteLock();

    await lock.acquireRead();
    await lock.acquireRead();

    expect(lock.readers).toBe(2);
    expect(lock.writing).toBe(false);
  });

  it("should make a writer wait for active readers", async () => {
    const lock = new ReadWriteLock();
    await lock.acquireRead();

    let granted = false;
    const writer = lock.acquireWrite().then(() => {
      granted = true;
    });
    await flush();

    expect(granted).toBe(false);
    expect(lock.pendingWriters).toBe(1);

    lock.releaseRead();
    await writer;

    expect(granted).toBe(true);
    expect(lock.writing).toBe(true);
  });

  it("should queue new readers behind a waiting writer", async () => {
    const lock = new ReadWriteLock();
    await lock.acquireRead();

    const writer = lock.acquireWrite();
    let lateReaderIn = false;
    const lateReader = lock.acquireRead().then(() => {
      lateReaderIn = true;
    });
    await flush();

    expect(lock.readers).toBe(1);
    expect(lock.pendingReaders).toBe(1);
    expect(lateReaderIn).toBe(false);

    lock.releaseRead();
    await writer;
    expect(lock.writing).toBe(true);
    expect(lateReaderIn).toBe(false);

    lock.releaseWrite();
    await lateReader;
    expect(lateReaderIn).toBe(true);
    expect(lock.readers).toBe(1);
  });

  it("should admit all queued readers together before the next writer", async () => {
    const lock = new ReadWriteLock();
    await lock.acquireWrite();

    const readers = [lock.acquireRead(), lock.acquireRead(), lock.acquireRead()];
    const nextWriter = lock.acquireWrite();
    await flush();
    expect(lock.pendingReaders).toBe(3);
    expect(lock.pendingWriters).toBe(1);

    lock.releaseWrite();
    await Promise.all(readers);
    expect(lock.readers).toBe(3);
    expect(lock.pendingWriters).toBe(1);

    lock.releaseRead();
    lock.releaseRead();
    lock.releaseRead();
    await nextWriter;
    expect(lock.writing).toBe(true);
    expect(lock.readers).toBe(0);
  });

  it("should never interleave writers", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];

    const write = (name: string) =>
      lock.withWrite(async () => {
        events.push(`${name}:start`);
        await sleep(2);
        events.push(`${name}:end`);
      });

    await Promise.all([write("a"), write("b"), write("c")]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("should grant a pending writer despite a continuous stream of readers", async () => {
    const lock = new ReadWriteLock();
    let stop = false;
    let reads = 0;

    const reader = async (): Promise<void> => {
      while (!stop) {
        await lock.withRead(async () => {
          reads++;
          await sleep(2);
        });
      }
    };

    const readers = Array.from({ length: 8 }, () => reader());
    await sleep(10);

    const started = performance.now();
    let readersDuringWrite = -1;
    await lock.withWrite(() => {
      readersDuringWrite = lock.readers;
    });
    const waited = performance.now() - started;

    stop = true;
    await Promise.all(readers);

    expect(readersDuringWrite).toBe(0);
    expect(waited).toBeLessThan(1000);
    expect(reads).toBeGreaterThan(8);
  });

  it("should release the write lock when the function throws", async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.withWrite(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.writing).toBe(false);
    await lock.withRead(() => {
      expect(lock.readers).toBe(1);
    });
  });

  it("should reject releases of locks that are not held", () => {
    const lock = new ReadWriteLock();

    expect(() => lock.releaseRead()).toThrow("Read lock released while not held");
    expect(() => lock.releaseWrite()).toThrow("Write lock released while not held");
  });
});
