/**
 * Async mutex for serializing access to a shared resource.
 *
 * Waiters are served in FIFO order. Not reentrant: acquiring the lock again
 * while holding it deadlocks.
 */

export type ReleaseFn = () => void;

export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Resolves with a release function once the lock is held. Always release
   * in a finally block.
   */
  acquire(): Promise<ReleaseFn> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createReleaseFn());
    }

    return new Promise<ReleaseFn>((resolve) => {
      this.waiters.push(() => {
        this.locked = true;
        resolve(this.createReleaseFn());
      });
    });
  }

  /**
   * Run `fn` while holding the lock.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
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

  private createReleaseFn(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
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
