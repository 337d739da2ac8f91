// src/core/refresh-engine.ts

import { BuildSource } from './types/build.js';
import { BuildCache } from './build-cache.js';
import { RefreshSummary } from '../analytics/types.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Rewrites the cache buckets for a trailing window of build history.
 * Meant to run out-of-band (cron, CI schedule) so report evaluation hits the cache.
 */
export class RefreshEngine {
  constructor(
    private source: BuildSource,
    private cache: BuildCache
  ) {}

  /**
   * Fetch builds created in [from, now) and overwrite their buckets.
   * `from` is aligned down to a bucket boundary so the first bucket is complete.
   * Re-running over an overlapping window rewrites the same keys with equivalent data.
   * Buckets that have not settled get the short TTL, so builds created after
   * the refresh are fetched again once it expires.
   */
  async refreshCache(from: Date, now: Date = new Date()): Promise<RefreshSummary> {
    const alignedFrom = new Date(this.cache.bucketStart(from));
    const buckets = from < now ? this.cache.bucketsBetween(alignedFrom, now) : [];

    if (buckets.length === 0) {
      Logger.debug('Refresh window is empty, nothing to do');
      return { from: alignedFrom, to: now, buckets: 0, builds: 0, failedKeys: [] };
    }

    const builds = await this.source.listBuilds(alignedFrom, now);
    const partitioned = this.cache.partition(builds, buckets);

    const entries = Array.from(partitioned.entries());
    const results = await Promise.allSettled(
      entries.map(([start, bucketBuilds]) =>
        this.cache.write(start, bucketBuilds, now)
      )
    );

    const failedKeys: string[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        const key = this.cache.keyFor(entries[i][0]);
        failedKeys.push(key);
        Logger.warn(`Failed to write ${key}: ${errorMessage(result.reason)}`);
      }
    });

    const stored = entries.reduce((sum, [, bucketBuilds]) => sum + bucketBuilds.length, 0);

    return {
      from: alignedFrom,
      to: now,
      buckets: entries.length,
      builds: stored,
      failedKeys,
    };
  }
}
