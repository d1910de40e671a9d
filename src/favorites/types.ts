// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITES TYPES — Saved Items, Result Sets, Store Contract
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// SAVED ITEM
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A saved item as persisted. `id` is never empty for a persisted record.
 */
export interface FavoriteItem {
  readonly id: string;
  readonly url: string;
  /** May be empty; display titles are derived elsewhere */
  readonly title: string;
  readonly savedAtEpochSeconds: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT SETS
// ─────────────────────────────────────────────────────────────────────────────────

export const SAVED_STORY_COLUMNS = {
  id: 'itemId',
  url: 'url',
  title: 'title',
  time: 'time',
} as const;

export type SavedStoryColumn = typeof SAVED_STORY_COLUMNS[keyof typeof SAVED_STORY_COLUMNS];

/**
 * A query result held open by the store. Forward-only in spirit but
 * position-addressable; must be closed when no longer needed.
 */
export interface ResultSet {
  readonly count: number;
  readonly position: number;
  readonly isClosed: boolean;

  moveToFirst(): boolean;
  moveToNext(): boolean;
  moveToPosition(position: number): boolean;

  /** -1 when the column is absent */
  getColumnIndex(column: string): number;
  getString(columnIndex: number): string | null;

  close(): void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORE CONTRACT
// ─────────────────────────────────────────────────────────────────────────────────

export interface SavedStoriesStore {
  queryAll(): Promise<ResultSet>;
  queryByTitle(substring: string): Promise<ResultSet>;
  insert(item: FavoriteItem): Promise<void>;
  deleteById(id: string): Promise<number>;
  deleteByTitle(substring: string): Promise<number>;
  deleteAll(): Promise<number>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OBSERVER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Listing surface bound to the manager. Called on the interactive context
 * whenever a fresh cursor has been published.
 */
export interface LocalItemObserver {
  onChanged(): void;
}
