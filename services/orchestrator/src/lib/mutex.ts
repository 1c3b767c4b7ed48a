/**
 * FIFO async lock
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Callers blocked in acquire() */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function once the lock is held.
   * Calling release more than once has no effect.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.locked = true;
        resolve(this.createRelease());
      };

      if (this.locked) {
        this.waiters.push(grant);
      } else {
        grant();
      }
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}
