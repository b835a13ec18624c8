/**
 * Serializes async critical sections. Waiters are served in FIFO order.
 */
export class AsyncMutex {
  private waiters: Array<(release: () => void) => void> = [];
  private locked = false;

  /** Resolves with a release function once the lock is held. */
  public acquire(): Promise<() => void> {
    return new Promise<() => void>(resolve => {
      if (this.locked) {
        this.waiters.push(resolve);
        return;
      }
      this.locked = true;
      resolve(this.createRelease());
    });
  }

  public isLocked() {
    return this.locked;
  }

  /** Runs `fn` while holding the lock, releasing it whether `fn` resolves or throws. */
  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease() {
    let released = false;
    return () => {
      // A second call on the same release must not hand the lock to another waiter
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) next(this.createRelease());
      else this.locked = false;
    };
  }
}
