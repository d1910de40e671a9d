// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Store Selection
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../config/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore, type RedisStoreOptions } from './redis.js';

let store: KeyValueStore | null = null;

/**
 * Shared store: Redis when REDIS_URL is configured, otherwise in-memory.
 */
export function getStore(): KeyValueStore {
  if (!store) {
    const { redisUrl } = loadConfig();
    store = redisUrl ? new RedisStore({ url: redisUrl, keyPrefix: 'favorites:' }) : new MemoryStore();
  }
  return store;
}

export function setStore(next: KeyValueStore | null): void {
  store = next;
}
