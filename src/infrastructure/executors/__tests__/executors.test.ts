// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTOR TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { BackgroundExecutor } from '../background.js';
import { SerialExecutor } from '../serial.js';
import { Gate } from '../../../tests/helpers.js';

describe('BackgroundExecutor', () => {
  it('should never run a task on the caller stack', async () => {
    const executor = new BackgroundExecutor();
    let ran = false;

    const done = executor.execute(() => {
      ran = true;
    });

    expect(ran).toBe(false);
    await done;
    expect(ran).toBe(true);
  });

  it('should bound the number of running tasks', async () => {
    const executor = new BackgroundExecutor(2);
    const gate = new Gate();
    let running = 0;
    let peak = 0;

    const tasks = [1, 2, 3, 4].map(() => executor.execute(async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.opened;
      running--;
    }));

    await new Promise<void>(resolve => setImmediate(resolve));
    expect(executor.pending).toBe(4);

    gate.open();
    await Promise.all(tasks);
    await executor.idle();

    expect(peak).toBe(2);
    expect(executor.pending).toBe(0);
  });

  it('should reject with the task error', async () => {
    const executor = new BackgroundExecutor();

    await expect(executor.execute(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await executor.idle();
    expect(executor.pending).toBe(0);
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => new BackgroundExecutor(0)).toThrow('Concurrency must be a positive integer, got 0');
  });
});

describe('SerialExecutor', () => {
  it('should run tasks one at a time in order', async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];

    const first = executor.execute(async () => {
      await new Promise<void>(resolve => setImmediate(resolve));
      order.push('first');
    });
    const second = executor.execute(() => {
      order.push('second');
    });

    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should keep going after a failed task', async () => {
    const executor = new SerialExecutor();

    const failed = executor.execute(() => {
      throw new Error('boom');
    });
    const next = executor.execute(() => 'after');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('should wait for tasks queued while idling', async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];

    void executor.execute(() => {
      order.push('outer');
      void executor.execute(() => {
        order.push('inner');
      });
    });

    await executor.idle();
    expect(order).toEqual(['outer', 'inner']);
  });
});
