// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Memory KeyValueStore Implementation
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

export class MemoryStore implements KeyValueStore {
  private data: Map<string, { value: string; expiresAt?: number }> = new Map();
  private lists: Map<string, string[]> = new Map();
  private hashes: Map<string, Map<string, string>> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(key: string): Promise<string | null> {
    const entry = this.data.get(key);
    if (!entry) return null;

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.data.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.data.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.data.has(key) || this.lists.has(key) || this.hashes.has(key);
    this.data.delete(key);
    this.lists.delete(key);
    this.hashes.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    if (this.lists.has(key) || this.hashes.has(key)) return true;
    return (await this.get(key)) !== null;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  private listFor(key: string): string[] {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    return list;
  }

  async lpush(key: string, ...values: string[]): Promise<number> {
    const list = this.listFor(key);
    // Redis prepends one value at a time, so the last argument ends up first
    for (const value of values) {
      list.unshift(value);
    }
    return list.length;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    const list = this.listFor(key);
    list.push(...values);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];

    // Handle negative indices like Redis
    const len = list.length;
    const startIdx = start < 0 ? Math.max(0, len + start) : start;
    const stopIdx = stop < 0 ? len + stop : stop;

    if (startIdx > stopIdx || startIdx >= len) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    const list = this.lists.get(key);
    if (!list) return 0;

    let removed = 0;
    const newList: string[] = [];

    for (const item of list) {
      if (item === value && (count === 0 || removed < Math.abs(count))) {
        removed++;
      } else {
        newList.push(item);
      }
    }

    if (newList.length === 0) {
      this.lists.delete(key);
    } else {
      this.lists.set(key, newList);
    }
    return removed;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // HASH OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async hset(key: string, values: Record<string, string>): Promise<number> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }

    let added = 0;
    for (const [field, value] of Object.entries(values)) {
      if (!hash.has(field)) added++;
      hash.set(field, value);
    }
    return added;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    const hash = this.hashes.get(key);
    return hash ? Object.fromEntries(hash) : {};
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  isConnected(): boolean {
    return true;
  }

  async disconnect(): Promise<void> {
    // Nothing to release
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  clear(): void {
    this.data.clear();
    this.lists.clear();
    this.hashes.clear();
  }

  size(): number {
    return this.data.size + this.lists.size + this.hashes.size;
  }
}
