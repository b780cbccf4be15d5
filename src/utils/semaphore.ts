/**
 * Caps how many calls of a batch are in flight at once. Callers beyond the
 * limit wait in FIFO order.
 */
export class AsyncSemaphore {
  private active = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (limit < 1) throw new Error('Semaphore must have at least 1 permit');
  }

  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    // The permit passes straight to the next waiter, so `active` is unchanged
    if (next) next();
    else this.active--;
  }
}
