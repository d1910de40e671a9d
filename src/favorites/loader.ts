// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITE LOADER — Observer-Driven (Re)Query
// ═══════════════════════════════════════════════════════════════════════════════

import type { Executor } from '../infrastructure/executors/index.js';
import { loggers, toError } from '../logging/index.js';
import type { LocalItemObserver, ResultSet } from './types.js';

const logger = loggers.loader();

/**
 * The owner a loader reports to. `publish` runs on the interactive context
 * and decides whether the result is still wanted.
 */
export interface LoaderHost {
  query(filter: string | null): Promise<ResultSet>;
  publish(loader: FavoriteLoader, generation: number, resultSet: ResultSet): void;
}

export interface LoaderContext {
  io: Executor;
  main: Executor;
  host: LoaderHost;
}

/**
 * Bound to one (filter, observer) pair for its lifetime. Every `load()` call
 * takes a new generation number; only the latest generation may publish.
 */
export class FavoriteLoader {
  private generation = 0;

  constructor(
    readonly filter: string | null,
    readonly observer: LocalItemObserver,
    private readonly context: LoaderContext
  ) {}

  get latestGeneration(): number {
    return this.generation;
  }

  /**
   * Query off the interactive context, then hand the result to the host.
   * Never rejects; query failures leave the current cursor in place.
   */
  async load(): Promise<void> {
    const generation = ++this.generation;
    const { io, main, host } = this.context;

    let resultSet: ResultSet;
    try {
      resultSet = await io.execute(() => host.query(this.filter));
    } catch (error) {
      logger.error('Saved items query failed', toError(error), { filter: this.filter, generation });
      return;
    }

    try {
      await main.execute(() => host.publish(this, generation, resultSet));
    } catch (error) {
      logger.error('Publishing saved items failed', toError(error), { filter: this.filter, generation });
    }
  }
}
