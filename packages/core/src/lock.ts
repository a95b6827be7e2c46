/**
 * In-process locks for serializing access across concurrent async callers
 *
 * Grants are handed over directly: ownership is assigned to the next waiter
 * before its promise resolves, so no other caller can slip in between a
 * release and the waiter resuming.
 */

type Waiter = () => void;

/**
 * FIFO mutual exclusion
 */
export class Mutex {
  #locked = false;
  #waiters: Waiter[] = [];

  get locked(): boolean {
    return this.#locked;
  }

  get pending(): number {
    return this.#waiters.length;
  }

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.#waiters.push(resolve);
    });
  }

  release(): void {
    if (!this.#locked) {
      throw new Error("Mutex released while not held");
    }

    const next = this.#waiters.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  /**
   * Execute a function with the mutex held
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Phase-fair reader-writer lock
 *
 * - Readers share the lock while no writer holds it or waits for it
 * - A waiting writer blocks newly arriving readers, so a steady stream of
 *   readers cannot postpone it past the readers already inside
 * - When a writer leaves, every reader queued at that moment is admitted
 *   together before the next writer, so writers cannot starve readers either
 */
export class ReadWriteLock {
  #readers = 0;
  #writing = false;
  #readQueue: Waiter[] = [];
  #writeQueue: Waiter[] = [];

  /** Readers currently holding the lock */
  get readers(): number {
    return this.#readers;
  }

  /** Whether a writer currently holds the lock */
  get writing(): boolean {
    return this.#writing;
  }

  get pendingReaders(): number {
    return this.#readQueue.length;
  }

  get pendingWriters(): number {
    return this.#writeQueue.length;
  }

  async acquireRead(): Promise<void> {
    if (!this.#writing && this.#writeQueue.length === 0) {
      this.#readers++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.#readQueue.push(resolve);
    });
  }

  releaseRead(): void {
    if (this.#readers === 0) {
      throw new Error("Read lock released while not held");
    }

    this.#readers--;
    if (this.#readers === 0) {
      this.#grantWriter();
    }
  }

  async acquireWrite(): Promise<void> {
    if (!this.#writing && this.#readers === 0) {
      this.#writing = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.#writeQueue.push(resolve);
    });
  }

  releaseWrite(): void {
    if (!this.#writing) {
      throw new Error("Write lock released while not held");
    }

    this.#writing = false;
    if (this.#readQueue.length > 0) {
      this.#grantReaders();
    } else {
      this.#grantWriter();
    }
  }

  /**
   * Execute a function holding a shared read lock
   */
  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  /**
   * Execute a function holding the exclusive write lock
   */
  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  #grantReaders(): void {
    const batch = this.#readQueue;
    this.#readQueue = [];
    this.#readers += batch.length;
    for (const resolve of batch) {
      resolve();
    }
  }

  #grantWriter(): void {
    const next = this.#writeQueue.shift();
    if (next) {
      this.#writing = true;
      next();
    }
  }
}
