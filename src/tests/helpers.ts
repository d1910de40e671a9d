// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Gates, Controllable Stores, Settling Executors
// ═══════════════════════════════════════════════════════════════════════════════

import type { FavoriteItem, ResultSet, SavedStoriesStore } from '../favorites/types.js';
import type { Executor } from '../infrastructure/executors/index.js';

/**
 * A promise the test opens by hand.
 */
export class Gate {
  readonly opened: Promise<void>;
  private release: () => void = () => undefined;

  constructor() {
    this.opened = new Promise<void>(resolve => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release();
  }
}

/**
 * Wait until both executors and any follow-up work they queued have settled.
 */
export async function settle(...executors: Executor[]): Promise<void> {
  for (let round = 0; round < 5; round++) {
    for (const executor of executors) {
      await executor.idle();
    }
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

/**
 * Wraps a real store; queries and writes can be held back or made to fail.
 */
export class ControlledStore implements SavedStoriesStore {
  readonly issued: ResultSet[] = [];
  failWrites = false;
  failQueries = false;

  private readonly queryGates: Gate[] = [];
  private readonly writeGates: Gate[] = [];

  constructor(private readonly inner: SavedStoriesStore) {}

  holdNextQuery(): Gate {
    const gate = new Gate();
    this.queryGates.push(gate);
    return gate;
  }

  holdNextWrite(): Gate {
    const gate = new Gate();
    this.writeGates.push(gate);
    return gate;
  }

  async queryAll(): Promise<ResultSet> {
    return this.query(() => this.inner.queryAll());
  }

  async queryByTitle(substring: string): Promise<ResultSet> {
    return this.query(() => this.inner.queryByTitle(substring));
  }

  async insert(item: FavoriteItem): Promise<void> {
    return this.write(() => this.inner.insert(item));
  }

  async deleteById(id: string): Promise<number> {
    return this.write(() => this.inner.deleteById(id));
  }

  async deleteByTitle(substring: string): Promise<number> {
    return this.write(() => this.inner.deleteByTitle(substring));
  }

  async deleteAll(): Promise<number> {
    return this.write(() => this.inner.deleteAll());
  }

  private async query(run: () => Promise<ResultSet>): Promise<ResultSet> {
    const gate = this.queryGates.shift();
    if (gate) await gate.opened;
    if (this.failQueries) throw new Error('query unavailable');
    const resultSet = await run();
    this.issued.push(resultSet);
    return resultSet;
  }

  private async write<T>(run: () => Promise<T>): Promise<T> {
    const gate = this.writeGates.shift();
    if (gate) await gate.opened;
    if (this.failWrites) throw new Error('disk full');
    return run();
  }
}

export function story(id: string, title: string, savedAtEpochSeconds = 0): FavoriteItem {
  return { id, title, url: `https://example.com/${id}`, savedAtEpochSeconds };
}
