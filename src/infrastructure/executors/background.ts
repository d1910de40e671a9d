// ═══════════════════════════════════════════════════════════════════════════════
// BACKGROUND EXECUTOR — Bounded Pool for Store Access and File I/O
// ═══════════════════════════════════════════════════════════════════════════════

import type { Executor, Task } from './types.js';

type Job = () => Promise<void>;

export class BackgroundExecutor implements Executor {
  private readonly queue: Job[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number = 4) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  execute<T>(task: Task<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(task).then(resolve, reject));
      this.pump();
    });
  }

  idle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  get pending(): number {
    return this.active + this.queue.length;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const job = this.queue.shift();
      if (!job) break;

      this.active++;
      // Never run on the caller's stack
      setImmediate(() => {
        void job().finally(() => {
          this.active--;
          this.pump();
          this.notifyIdle();
        });
      });
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
