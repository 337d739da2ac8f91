// src/cache/types.ts

/**
 * Opaque byte cache with per-entry TTL.
 * No ordering or transactional guarantees across keys.
 */
export interface CacheStore {
  put(key: string, value: Buffer, ttlMs: number): Promise<void>;
  /** Resolves undefined on a miss (never written, or expired) */
  get(key: string): Promise<Buffer | undefined>;
  close(): Promise<void>;
}
