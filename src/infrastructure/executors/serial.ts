// ═══════════════════════════════════════════════════════════════════════════════
// SERIAL EXECUTOR — Single Interactive Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// Tasks run one at a time in submission order. Cursor swaps, change events,
// notifications and share invocations all go through here.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Executor, Task } from './types.js';

export class SerialExecutor implements Executor {
  private tail: Promise<void> = Promise.resolve();

  execute<T>(task: Task<T>): Promise<T> {
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async idle(): Promise<void> {
    let observed: Promise<void>;
    // Tasks may enqueue more tasks while we wait
    do {
      observed = this.tail;
      await observed;
    } while (observed !== this.tail);
  }
}
