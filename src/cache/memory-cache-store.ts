// src/cache/memory-cache-store.ts

import { CacheStore } from './types.js';

interface MemoryEntry {
  value: Buffer;
  expiresAt: number;
}

/**
 * In-process cache used when no Redis URL is configured.
 * Entries live as long as the process, or until their TTL passes.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, MemoryEntry>();

  constructor(private clock: () => number = Date.now) {}

  async put(key: string, value: Buffer, ttlMs: number): Promise<void> {
    if (ttlMs <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      value: Buffer.from(value),
      expiresAt: this.clock() + ttlMs,
    });
  }

  async get(key: string): Promise<Buffer | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return Buffer.from(entry.value);
  }

  get size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
