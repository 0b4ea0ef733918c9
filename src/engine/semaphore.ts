/**
 * Counting semaphore for concurrency control.
 * With one permit it is the in-process writer mutex of the metadata index;
 * the caching interceptor uses it to bound parallel transformer calls.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error("Semaphore permits must be an integer >= 1");
    }
    this.permits = permits;
    this.maxPermits = permits;
  }

  /**
   * Acquire a permit. Blocks if no permits available.
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /**
   * Release a permit. Hands it straight to the oldest waiter if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits >= this.maxPermits) {
      throw new Error(
        `Semaphore over-release: already at max permits (${this.maxPermits})`,
      );
    }
    this.permits++;
  }

  /**
   * Run fn while holding a permit; the permit is returned even if fn throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Number of permits currently available.
   */
  get available(): number {
    return this.permits;
  }

  /**
   * Number of callers blocked in acquire().
   */
  get pending(): number {
    return this.waiting.length;
  }
}
