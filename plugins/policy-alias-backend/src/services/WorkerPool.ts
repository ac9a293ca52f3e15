/**
 * Counting semaphore that bounds how many async units of work are in flight.
 * Waiters are admitted in FIFO order as slots free up.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly limit: number;

  constructor(limit: number) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Runs `worker` over every item through the pool and hands each result to
   * `onSettled` as soon as that unit finishes, in completion order.
   */
  async runAll<T, R>(
    items: readonly T[],
    worker: (item: T) => Promise<R>,
    onSettled: (result: R, item: T) => void,
  ): Promise<void> {
    await Promise.all(
      items.map(item =>
        this.use(() => worker(item)).then(result => {
          onSettled(result, item);
        }),
      ),
    );
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return;
    }

    await new Promise<void>(resolve => {
      this.queue.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    while (this.active < this.limit) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }
}
