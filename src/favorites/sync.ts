// ═══════════════════════════════════════════════════════════════════════════════
// ITEM SYNC QUEUE — Deferred Content Refresh for Newly Saved Items
// ═══════════════════════════════════════════════════════════════════════════════

import { getStore, type KeyValueStore } from '../storage/index.js';

const PENDING_SYNC_KEY = 'saved:sync:pending';

export interface SyncScheduler {
  scheduleSync(itemId: string): Promise<void>;
}

/**
 * Queues item ids for a sync worker to fetch content for offline reading.
 */
export class ItemSyncQueue implements SyncScheduler {
  private store: KeyValueStore;

  constructor(store?: KeyValueStore) {
    this.store = store ?? getStore();
  }

  async scheduleSync(itemId: string): Promise<void> {
    // Collapse duplicates so a re-saved item is fetched once
    await this.store.lrem(PENDING_SYNC_KEY, 0, itemId);
    await this.store.rpush(PENDING_SYNC_KEY, itemId);
  }

  async pending(): Promise<string[]> {
    return this.store.lrange(PENDING_SYNC_KEY, 0, -1);
  }
}
