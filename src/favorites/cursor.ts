// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITE CURSOR — Typed, Owned View over a Result Set
// ═══════════════════════════════════════════════════════════════════════════════

import { MissingColumnError } from './errors.js';
import { SAVED_STORY_COLUMNS, type FavoriteItem, type ResultSet } from './types.js';

export class FavoriteCursor {
  constructor(private readonly resultSet: ResultSet) {}

  get count(): number {
    return this.resultSet.count;
  }

  get isClosed(): boolean {
    return this.resultSet.isClosed;
  }

  moveToFirst(): boolean {
    return this.resultSet.moveToFirst();
  }

  moveToNext(): boolean {
    return this.resultSet.moveToNext();
  }

  moveToPosition(position: number): boolean {
    return this.resultSet.moveToPosition(position);
  }

  /**
   * The item at the current position. Throws MissingColumnError when the id
   * or url column is missing; title and time fall back to empty values.
   */
  get favorite(): FavoriteItem {
    const time = Number.parseInt(this.optional(SAVED_STORY_COLUMNS.time) ?? '', 10);
    return {
      id: this.required(SAVED_STORY_COLUMNS.id),
      url: this.required(SAVED_STORY_COLUMNS.url),
      title: this.optional(SAVED_STORY_COLUMNS.title) ?? '',
      savedAtEpochSeconds: Number.isNaN(time) ? 0 : time,
    };
  }

  /**
   * Every item from the first row on, in store order.
   */
  toArray(): FavoriteItem[] {
    const items: FavoriteItem[] = [];
    if (!this.moveToFirst()) return items;
    do {
      items.push(this.favorite);
    } while (this.moveToNext());
    return items;
  }

  close(): void {
    if (!this.resultSet.isClosed) {
      this.resultSet.close();
    }
  }

  private required(column: string): string {
    const index = this.resultSet.getColumnIndex(column);
    const value = index === -1 ? null : this.resultSet.getString(index);
    if (value === null) {
      throw new MissingColumnError(column);
    }
    return value;
  }

  private optional(column: string): string | null {
    const index = this.resultSet.getColumnIndex(column);
    return index === -1 ? null : this.resultSet.getString(index);
  }
}
