export type Release = () => void;

/** FIFO exclusive lock. Waiters are granted the lock in the order they asked. */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async acquire(): Promise<Release> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  pending(): number {
    return this.waiters.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter.
      next();
      return;
    }
    this.locked = false;
  }
}
