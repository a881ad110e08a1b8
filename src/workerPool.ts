export type PoolTask = () => Promise<void>;

export interface PoolStats {
  size: number;
  active: number;
  queued: number;
}

/**
 * Runs at most `size` tasks at a time. Tasks beyond that wait in FIFO order.
 * A task that rejects is logged and does not affect the others.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: PoolTask[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly size: number,
    private readonly name = "fulfillment",
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  submit(task: PoolTask): void {
    this.queue.push(task);
    this.pump();
  }

  stats(): PoolStats {
    return { size: this.size, active: this.active, queued: this.queue.length };
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (this.active < this.size) {
      const task = this.queue.shift();
      if (!task) return;

      this.active += 1;
      void Promise.resolve()
        .then(task)
        .catch((error: unknown) => {
          console.error("WORKER_ERR", {
            pool: this.name,
            message: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
          });
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
