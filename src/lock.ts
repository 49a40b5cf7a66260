/**
 * Mutual exclusion for async critical sections.
 * At most one task holds the lock; waiters are served in arrival order.
 */
export class ExclusiveLock {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Run `fn` while holding the lock.
   * Resolves/rejects with the task result and always releases.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  /**
   * Number of tasks queued behind the current holder
   */
  getWaiting(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the lock straight to the next waiter so nobody can barge in
      next();
    } else {
      this.held = false;
    }
  }
}
