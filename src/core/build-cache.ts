// src/core/build-cache.ts

import { z } from 'zod';
import { CacheStore } from '../cache/types.js';
import { Build } from './types/build.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const ENTRY_VERSION = 2;

const serializedBuildSchema = z.object({
  id: z.string(),
  number: z.number(),
  state: z.string(),
  branch: z.string(),
  commit: z.string(),
  message: z.string(),
  webUrl: z.string(),
  pipeline: z.object({ name: z.string(), slug: z.string() }),
  createdAt: z.string().datetime().optional(),
  scheduledAt: z.string().datetime().optional(),
  startedAt: z.string().datetime().optional(),
  finishedAt: z.string().datetime().optional(),
});

const bucketEntrySchema = z.object({
  version: z.literal(ENTRY_VERSION),
  bucketSizeMs: z.number(),
  bucketStart: z.string(),
  builds: z.array(serializedBuildSchema),
});

type SerializedBuild = z.infer<typeof serializedBuildSchema>;

/**
 * How long a bucket entry lives, by age. A bucket that ended less than
 * settleAfterMs before now may still gain builds and gets recentTtlMs.
 */
export interface RetentionPolicy {
  ttlMs: number;
  recentTtlMs: number;
  settleAfterMs: number;
}

export interface BuildCacheOptions {
  org: string;
  keyPrefix: string;
  bucketSizeMs: number;
  retention: RetentionPolicy;
}

function toSerialized(build: Build): SerializedBuild {
  return {
    id: build.id,
    number: build.number,
    state: build.state,
    branch: build.branch,
    commit: build.commit,
    message: build.message,
    webUrl: build.webUrl,
    pipeline: { name: build.pipeline.name, slug: build.pipeline.slug },
    createdAt: build.createdAt?.toISOString(),
    scheduledAt: build.scheduledAt?.toISOString(),
    startedAt: build.startedAt?.toISOString(),
    finishedAt: build.finishedAt?.toISOString(),
  };
}

function parseDate(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(value);
}

function fromSerialized(raw: SerializedBuild): Build {
  return {
    id: raw.id,
    number: raw.number,
    state: raw.state,
    branch: raw.branch,
    commit: raw.commit,
    message: raw.message,
    webUrl: raw.webUrl,
    pipeline: { name: raw.pipeline.name, slug: raw.pipeline.slug },
    createdAt: parseDate(raw.createdAt),
    scheduledAt: parseDate(raw.scheduledAt),
    startedAt: parseDate(raw.startedAt),
    finishedAt: parseDate(raw.finishedAt),
  };
}

/**
 * Stores builds in fixed-size buckets of creation time, one cache entry per bucket.
 * Keys and bytes are a pure function of (org, bucket size, bucket start, build set).
 */
export class BuildCache {
  constructor(
    private store: CacheStore,
    private options: BuildCacheOptions
  ) {}

  /** Start (epoch ms) of the bucket containing the given instant */
  bucketStart(at: Date | number): number {
    const time = typeof at === 'number' ? at : at.getTime();
    const size = this.options.bucketSizeMs;
    return Math.floor(time / size) * size;
  }

  /** Starts of every bucket overlapping [from, to) */
  bucketsBetween(from: Date, to: Date): number[] {
    const buckets: number[] = [];
    for (let start = this.bucketStart(from); start < to.getTime(); start += this.options.bucketSizeMs) {
      buckets.push(start);
    }
    return buckets;
  }

  keyFor(bucketStart: number): string {
    const { keyPrefix, org, bucketSizeMs } = this.options;
    return `${keyPrefix}builds:${org}:${bucketSizeMs}:${new Date(bucketStart).toISOString()}`;
  }

  ttlFor(bucketStart: number, now: Date): number {
    const { ttlMs, recentTtlMs, settleAfterMs } = this.options.retention;
    const bucketEnd = bucketStart + this.options.bucketSizeMs;
    return now.getTime() - bucketEnd >= settleAfterMs ? ttlMs : recentTtlMs;
  }

  /**
   * Assign builds to the given buckets by creation time.
   * Every bucket is present in the result, empty or not.
   */
  partition(builds: readonly Build[], buckets: readonly number[]): Map<number, Build[]> {
    const result = new Map<number, Build[]>();
    for (const start of buckets) {
      result.set(start, []);
    }

    for (const build of builds) {
      if (!build.createdAt) {
        Logger.debug(`Skipping build ${build.id} without a creation time`);
        continue;
      }
      const bucket = result.get(this.bucketStart(build.createdAt));
      bucket?.push(build);
    }

    return result;
  }

  encode(bucketStart: number, builds: readonly Build[]): Buffer {
    const serialized = builds
      .map(toSerialized)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    return Buffer.from(
      JSON.stringify({
        version: ENTRY_VERSION,
        bucketSizeMs: this.options.bucketSizeMs,
        bucketStart: new Date(bucketStart).toISOString(),
        builds: serialized,
      }),
      'utf-8'
    );
  }

  /** @throws when the bytes are not a bucket entry of the current version and bucket size */
  decode(value: Buffer): Build[] {
    const entry = bucketEntrySchema.parse(JSON.parse(value.toString('utf-8')));
    if (entry.bucketSizeMs !== this.options.bucketSizeMs) {
      throw new Error(
        `entry covers ${entry.bucketSizeMs}ms buckets, expected ${this.options.bucketSizeMs}ms`
      );
    }
    return entry.builds.map(fromSerialized);
  }

  /**
   * Read one bucket. A store error or an unreadable entry is reported as a miss.
   */
  async read(bucketStart: number): Promise<Build[] | undefined> {
    const key = this.keyFor(bucketStart);

    let value: Buffer | undefined;
    try {
      value = await this.store.get(key);
    } catch (error) {
      Logger.warn(`Cache read failed for ${key}, treating as miss: ${errorMessage(error)}`);
      return undefined;
    }

    if (value === undefined) {
      return undefined;
    }

    try {
      return this.decode(value);
    } catch (error) {
      Logger.warn(`Discarding unreadable cache entry ${key}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** Writes with the TTL the retention policy gives a bucket of this age at `now`. */
  async write(bucketStart: number, builds: readonly Build[], now: Date): Promise<void> {
    await this.store.put(
      this.keyFor(bucketStart),
      this.encode(bucketStart, builds),
      this.ttlFor(bucketStart, now)
    );
  }
}
