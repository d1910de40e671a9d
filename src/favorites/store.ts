// ═══════════════════════════════════════════════════════════════════════════════
// SAVED STORIES STORE — Persistence for Saved Items on a KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { getStore, type KeyValueStore } from '../storage/index.js';
import { RowResultSet, type Row } from './result-set.js';
import { SAVED_STORY_COLUMNS, type FavoriteItem, type ResultSet, type SavedStoriesStore } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// KEY GENERATION
// ─────────────────────────────────────────────────────────────────────────────────

const INDEX_KEY = 'saved:index';

function storyKey(id: string): string {
  return `saved:story:${id}`;
}

const COLUMNS: readonly string[] = Object.values(SAVED_STORY_COLUMNS);

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One hash per saved item plus an index list ordered newest-saved first.
 */
export class KeyValueSavedStoriesStore implements SavedStoriesStore {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async queryAll(): Promise<ResultSet> {
    return new RowResultSet(COLUMNS, await this.loadRows());
  }

  async queryByTitle(substring: string): Promise<ResultSet> {
    return new RowResultSet(COLUMNS, await this.loadRowsMatching(substring));
  }

  async insert(item: FavoriteItem): Promise<void> {
    await this.store.hset(storyKey(item.id), {
      [SAVED_STORY_COLUMNS.id]: item.id,
      [SAVED_STORY_COLUMNS.url]: item.url,
      [SAVED_STORY_COLUMNS.title]: item.title,
      [SAVED_STORY_COLUMNS.time]: String(item.savedAtEpochSeconds),
    });

    // Re-saving moves the item to the front
    await this.store.lrem(INDEX_KEY, 0, item.id);
    await this.store.lpush(INDEX_KEY, item.id);
  }

  async deleteById(id: string): Promise<number> {
    const removed = await this.store.lrem(INDEX_KEY, 0, id);
    const existed = await this.store.delete(storyKey(id));
    return removed > 0 || existed ? 1 : 0;
  }

  async deleteByTitle(substring: string): Promise<number> {
    const rows = await this.loadRowsMatching(substring);
    let deleted = 0;
    for (const row of rows) {
      const id = row[SAVED_STORY_COLUMNS.id];
      if (id !== undefined) {
        deleted += await this.deleteById(id);
      }
    }
    return deleted;
  }

  async deleteAll(): Promise<number> {
    const ids = await this.store.lrange(INDEX_KEY, 0, -1);
    for (const id of ids) {
      await this.store.delete(storyKey(id));
    }
    await this.store.delete(INDEX_KEY);
    return ids.length;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────────────────────

  private async loadRows(): Promise<Row[]> {
    const ids = await this.store.lrange(INDEX_KEY, 0, -1);
    const rows: Row[] = [];

    for (const id of ids) {
      const row = await this.store.hgetall(storyKey(id));
      // Index entries can outlive their hash if a delete was interrupted
      if (Object.keys(row).length === 0) continue;
      rows.push(row);
    }

    return rows;
  }

  private async loadRowsMatching(substring: string): Promise<Row[]> {
    const needle = substring.toLowerCase();
    const rows = await this.loadRows();
    return rows.filter(row => (row[SAVED_STORY_COLUMNS.title] ?? '').toLowerCase().includes(needle));
  }
}
