// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITE MANAGER — Local Item Cache over the Saved Stories Store
// ═══════════════════════════════════════════════════════════════════════════════
//
// Owns the current cursor and loader. Mutations run on the background
// executor; their completion (cache update, reload request, change token)
// runs on the interactive executor. A reload always targets whichever loader
// is attached when the mutation completes.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Executor } from '../infrastructure/executors/index.js';
import { loggers, toError } from '../logging/index.js';
import { err, ok, type AsyncResult } from '../types/result.js';
import { MemoryFavoriteCache, type LocalCache } from './cache.js';
import { buildAdded, buildCleared, buildRemoved, LiveValue, type ChangeNotifier } from './changes.js';
import { FavoriteCursor } from './cursor.js';
import { StoreOperationError, type FavoriteMutationError, type MutationKind } from './errors.js';
import { FavoriteLoader, type LoaderHost } from './loader.js';
import { parseFavoriteItem, type FavoriteItemInput } from './schemas.js';
import type { SyncScheduler } from './sync.js';
import type { FavoriteItem, LocalItemObserver, ResultSet, SavedStoriesStore } from './types.js';

const logger = loggers.favorites();

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface FavoriteManagerDeps {
  store: SavedStoriesStore;
  io: Executor;
  main: Executor;
  cache?: LocalCache;
  changes?: ChangeNotifier;
  sync?: SyncScheduler;
}

interface MutationCompletion<V> {
  value: V;
  tokens: string[];
}

/**
 * Run a store query for an optional title filter. Empty means everything.
 */
export function querySavedStories(store: SavedStoriesStore, filter: string | null | undefined): Promise<ResultSet> {
  return filter ? store.queryByTitle(filter) : store.queryAll();
}

// ─────────────────────────────────────────────────────────────────────────────────
// MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

export class FavoriteManager {
  private readonly store: SavedStoriesStore;
  private readonly io: Executor;
  private readonly main: Executor;
  private readonly cache: LocalCache;
  private readonly changes: ChangeNotifier;
  private readonly sync: SyncScheduler | undefined;
  private readonly loaderHost: LoaderHost;

  private cursor: FavoriteCursor | null = null;
  private loader: FavoriteLoader | null = null;

  constructor(deps: FavoriteManagerDeps) {
    this.store = deps.store;
    this.io = deps.io;
    this.main = deps.main;
    this.cache = deps.cache ?? new MemoryFavoriteCache();
    this.changes = deps.changes ?? new LiveValue();
    this.sync = deps.sync;
    this.loaderHost = {
      query: filter => querySavedStories(this.store, filter),
      publish: (loader, generation, resultSet) => this.publish(loader, generation, resultSet),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LISTING
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Bind an observer and start loading. Replaces any previous binding; the
   * returned promise settles when this initial load has been handled.
   */
  attach(observer: LocalItemObserver, filter?: string | null): Promise<void> {
    this.loader = new FavoriteLoader(filter || null, observer, {
      io: this.io,
      main: this.main,
      host: this.loaderHost,
    });
    return this.loader.load();
  }

  detach(): void {
    this.cursor?.close();
    this.cursor = null;
    this.loader = null;
  }

  size(): number {
    return this.cursor?.count ?? 0;
  }

  itemAt(position: number): FavoriteItem | null {
    if (!this.cursor || !this.cursor.moveToPosition(position)) {
      return null;
    }
    return this.cursor.favorite;
  }

  isFavorite(itemId: string | null | undefined): boolean {
    if (!itemId) return false;
    return this.cache.isFavorite(itemId);
  }

  /**
   * Fill the membership cache from the store.
   */
  async warm(): Promise<void> {
    const ids = await this.io.execute(async () => {
      const cursor = new FavoriteCursor(await this.store.queryAll());
      try {
        return cursor.toArray().map(item => item.id);
      } finally {
        cursor.close();
      }
    });
    await this.main.execute(() => this.cache.replaceFavorites(ids));
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async add(input: FavoriteItemInput): AsyncResult<string, FavoriteMutationError> {
    const parsed = parseFavoriteItem(input);
    if (!parsed.ok) {
      logger.warn('Rejected saved item', { issues: parsed.error.issues });
      return parsed;
    }

    const item = parsed.value;
    this.scheduleSync(item.id);

    return this.mutate('add', () => this.store.insert(item), () => {
      this.cache.putFavorite(item.id);
      return { value: item.id, tokens: [buildAdded(item.id)] };
    });
  }

  async remove(itemId: string | null | undefined): AsyncResult<number, FavoriteMutationError> {
    if (!itemId) return ok(0);

    return this.mutate('remove', () => this.store.deleteById(itemId), deleted => {
      this.cache.removeFavorite(itemId);
      return { value: deleted, tokens: [buildRemoved(itemId)] };
    });
  }

  /**
   * Remove several items in one background pass: one reload, one token per id.
   */
  async removeMany(itemIds: Iterable<string> | null | undefined): AsyncResult<number, FavoriteMutationError> {
    const ids = [...new Set(itemIds ?? [])].filter(id => id.length > 0);
    if (ids.length === 0) return ok(0);

    return this.mutate('remove', async () => {
      let deleted = 0;
      for (const id of ids) {
        deleted += await this.store.deleteById(id);
      }
      return deleted;
    }, deleted => {
      for (const id of ids) this.cache.removeFavorite(id);
      return { value: deleted, tokens: ids.map(buildRemoved) };
    });
  }

  /**
   * Delete everything matching the title filter, or everything when absent.
   */
  async clear(filter?: string | null): AsyncResult<number, FavoriteMutationError> {
    return this.mutate('clear', async () => {
      const cursor = new FavoriteCursor(await querySavedStories(this.store, filter));
      let ids: string[];
      try {
        ids = cursor.toArray().map(item => item.id);
      } finally {
        cursor.close();
      }
      const deleted = filter ? await this.store.deleteByTitle(filter) : await this.store.deleteAll();
      return { ids, deleted };
    }, ({ ids, deleted }) => {
      if (filter) {
        for (const id of ids) this.cache.removeFavorite(id);
      } else {
        this.cache.replaceFavorites([]);
      }
      return { value: deleted, tokens: [buildCleared()] };
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async mutate<T, V>(
    operation: MutationKind,
    work: () => Promise<T>,
    complete: (outcome: T) => MutationCompletion<V>
  ): AsyncResult<V, StoreOperationError> {
    let outcome: T;
    try {
      outcome = await this.io.execute(work);
    } catch (error) {
      const failure = new StoreOperationError(operation, toError(error));
      logger.error('Saved items mutation failed', failure, { operation });
      return err(failure);
    }

    return this.main.execute(() => {
      const { value, tokens } = complete(outcome);
      this.requestReload();
      for (const token of tokens) {
        this.changes.setLiveValue(token);
      }
      return ok(value);
    });
  }

  private requestReload(): void {
    // Whatever loader is attached now, not the one at mutation time
    const loader = this.loader;
    if (loader) {
      void loader.load();
    }
  }

  private scheduleSync(itemId: string): void {
    if (!this.sync) return;
    this.sync.scheduleSync(itemId).catch((error: unknown) => {
      logger.warn('Could not schedule sync for saved item', { itemId, reason: toError(error).message });
    });
  }

  private publish(loader: FavoriteLoader, generation: number, resultSet: ResultSet): void {
    if (loader !== this.loader || generation !== loader.latestGeneration) {
      resultSet.close();
      logger.debug('Discarded stale saved items result', { filter: loader.filter, generation });
      return;
    }

    this.cursor?.close();
    this.cursor = new FavoriteCursor(resultSet);

    try {
      loader.observer.onChanged();
    } catch (error) {
      logger.error('Saved items observer failed', toError(error), { filter: loader.filter });
    }
  }
}
