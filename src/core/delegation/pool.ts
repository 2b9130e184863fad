/**
 * Counting semaphore bounding how many tasks run at once. Waiters are served in arrival
 * order.
 */
export class WorkerPool {
  private free: number;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    this.free = Math.max(1, Math.floor(concurrency));
  }

  get available(): number {
    return this.free;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<void> {
    if (this.free > 0) {
      this.free--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.free++;
    }
  }
}
