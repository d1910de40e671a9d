// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';
import type { KeyValueStore } from './types.js';
import { loggers } from '../logging/index.js';

const logger = loggers.storage();

export interface RedisStoreOptions {
  url: string;
  keyPrefix?: string;
  connectTimeoutMs?: number;
}

export class RedisStore implements KeyValueStore {
  private client: Redis;
  private connected = false;

  constructor(options: RedisStoreOptions) {
    this.client = new Redis(options.url, {
      keyPrefix: options.keyPrefix,
      connectTimeout: options.connectTimeoutMs ?? 5000,
      lazyConnect: true,
      maxRetriesPerRequest: 3,
    });

    this.client.on('ready', () => {
      this.connected = true;
      logger.info('Redis connected');
    });
    this.client.on('end', () => {
      this.connected = false;
      logger.warn('Redis connection closed');
    });
    this.client.on('error', (error: Error) => {
      logger.error('Redis error', error);
    });
  }

  // String operations

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.client.exists(key)) > 0;
  }

  // List operations

  async lpush(key: string, ...values: string[]): Promise<number> {
    return this.client.lpush(key, ...values);
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.client.rpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.client.llen(key);
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    return this.client.lrem(key, count, value);
  }

  // Hash operations

  async hset(key: string, values: Record<string, string>): Promise<number> {
    return this.client.hset(key, values);
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return this.client.hgetall(key);
  }

  // Utility

  isConnected(): boolean {
    return this.connected;
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    this.connected = false;
  }
}
