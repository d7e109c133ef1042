/**
 * Counting semaphore bounding the number of in-flight tasks
 */
export class Semaphore {
  private readonly max: number;
  private queue: Array<() => void> = [];
  private count = 0;

  constructor(max: number) {
    this.max = Math.max(1, max);
  }

  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** Tasks currently holding a permit */
  get active(): number {
    return this.count;
  }

  private acquire(): Promise<void> {
    if (this.count < this.max) {
      this.count++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.queue.push(resolve));
  }

  private release() {
    this.count--;
    const next = this.queue.shift();
    if (next) {
      this.count++;
      next();
    }
  }
}
