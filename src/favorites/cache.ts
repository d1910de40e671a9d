// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITE CACHE — Fast Membership Checks
// ═══════════════════════════════════════════════════════════════════════════════

export interface LocalCache {
  isFavorite(itemId: string): boolean;
  putFavorite(itemId: string): void;
  removeFavorite(itemId: string): void;
  replaceFavorites(itemIds: Iterable<string>): void;
}

export class MemoryFavoriteCache implements LocalCache {
  private ids: Set<string> = new Set();

  isFavorite(itemId: string): boolean {
    return this.ids.has(itemId);
  }

  putFavorite(itemId: string): void {
    this.ids.add(itemId);
  }

  removeFavorite(itemId: string): void {
    this.ids.delete(itemId);
  }

  replaceFavorites(itemIds: Iterable<string>): void {
    this.ids = new Set(itemIds);
  }

  get size(): number {
    return this.ids.size;
  }
}
