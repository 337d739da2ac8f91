// src/cache/redis-cache-store.ts

import { Redis } from 'ioredis';
import { CacheStore } from './types.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * The subset of the ioredis client this store relies on.
 */
export interface RedisClientLike {
  set(key: string, value: Buffer, mode: 'PX', ttlMs: number): Promise<unknown>;
  getBuffer(key: string): Promise<Buffer | null>;
  quit(): Promise<unknown>;
  disconnect(): void;
}

export interface RedisCacheOptions {
  commandTimeoutMs: number;
}

export class RedisCacheStore implements CacheStore {
  constructor(private client: RedisClientLike) {}

  /**
   * Connects lazily on the first command. Every command is bounded by
   * commandTimeoutMs, and a broken connection fails fast instead of queueing.
   */
  static connect(url: string, options: RedisCacheOptions): RedisCacheStore {
    const client = new Redis(url, {
      lazyConnect: true,
      commandTimeout: options.commandTimeoutMs,
      connectTimeout: options.commandTimeoutMs,
      maxRetriesPerRequest: 1,
      retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 200, 1000)),
    });

    client.on('error', (err: Error) => {
      Logger.debug(`Redis client error: ${err.message}`);
    });

    return new RedisCacheStore(client);
  }

  async put(key: string, value: Buffer, ttlMs: number): Promise<void> {
    await this.client.set(key, value, 'PX', Math.max(1, Math.round(ttlMs)));
  }

  async get(key: string): Promise<Buffer | undefined> {
    const value = await this.client.getBuffer(key);
    return value ?? undefined;
  }

  /**
   * Graceful QUIT, falling back to dropping the socket when the connection
   * is already gone (quit rejects with "Connection is closed.").
   */
  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      Logger.warn(`Redis quit failed, disconnecting: ${errorMessage(error)}`);
      this.client.disconnect();
    }
  }
}
