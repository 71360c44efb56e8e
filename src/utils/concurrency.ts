/**
 * Promise-based concurrency primitives.
 */

export type Release = () => void;

/**
 * Counting semaphore. `acquire()` resolves with a release function once a
 * slot is free; waiters are served in FIFO order.
 */
export class Semaphore {
  private inUse = 0;
  private readonly queue: ((release: Release) => void)[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  get active(): number {
    return this.inUse;
  }

  get waiting(): number {
    return this.queue.length;
  }

  acquire(): Promise<Release> {
    if (this.inUse < this.capacity) {
      this.inUse++;
      return Promise.resolve(this.releaser());
    }
    return new Promise<Release>((resolve) => {
      this.queue.push(resolve);
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next(this.releaser());
      return;
    }
    this.inUse = Math.max(0, this.inUse - 1);
  }
}

/** Mutual exclusion: a semaphore with a single slot. */
export class Mutex extends Semaphore {
  constructor() {
    super(1);
  }

  get locked(): boolean {
    return this.active > 0;
  }
}
