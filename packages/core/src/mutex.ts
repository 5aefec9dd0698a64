/**
 * In-process async mutual exclusion. Waiters are granted in FIFO order.
 * Not re-entrant: a holder that awaits `acquire()` again deadlocks, so call
 * sites that need to drop the lock around slow work release and reacquire.
 */
export class Mutex {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  get locked(): boolean {
    return this.held;
  }

  async acquire(): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return this.releaser();
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    return this.releaser();
  }

  async runExclusive<T>(work: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await work();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter; `held` stays true.
        next();
      } else {
        this.held = false;
      }
    };
  }
}
