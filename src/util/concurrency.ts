/**
 * Concurrency limiter utility for controlling parallel operations.
 *
 * Provides a simple semaphore-based mechanism to limit the number of
 * concurrent operations, so a schema scan over thousands of graphs does not
 * open them all at once.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter({ maxConcurrency: 4 });
 * const text = await limiter.run(() => readFile(path, "utf-8"));
 * ```
 */

export interface ConcurrencyLimiterOptions {
  /**
   * Maximum number of concurrent operations allowed.
   */
  maxConcurrency: number;
}

export class ConcurrencyLimiter {
  private maxConcurrency: number;
  private activeCount: number;
  private queue: (() => void)[];

  constructor(options: ConcurrencyLimiterOptions) {
    if (options.maxConcurrency < 1) {
      throw new Error("maxConcurrency must be at least 1");
    }

    this.maxConcurrency = options.maxConcurrency;
    this.activeCount = 0;
    this.queue = [];
  }

  /**
   * Executes a task within the concurrency limit, in submission order.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.maxConcurrency) {
      return this.executeTask(task);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.executeTask(task).then(resolve, reject);
      });
    });
  }

  private async executeTask<T>(task: () => Promise<T>): Promise<T> {
    this.activeCount++;

    try {
      return await task();
    } finally {
      this.activeCount--;
      this.processQueue();
    }
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeCount < this.maxConcurrency) {
      const start = this.queue.shift();
      if (start) {
        start();
      }
    }
  }
}
