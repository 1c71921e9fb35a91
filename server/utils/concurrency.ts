export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(0, Math.floor(capacity));
    this.available = this.capacity;
  }

  /** Slots currently held. */
  get inUse(): number {
    return this.capacity - this.available;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }

    if (this.available > 0) {
      this.available -= 1;
      return this.releaseOnce();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify);
        reject(new Error('Aborted'));
      };

      const notify = () => {
        signal?.removeEventListener('abort', onAbort);
        this.available -= 1;
        resolve(this.releaseOnce());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(notify);
    });
  }

  /** Runs `task` while holding a slot; the slot is returned however the task settles. */
  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaseOnce(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private removeWaiter(waiter: () => void) {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) {
      this.waiters.splice(idx, 1);
    }
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}
