// src/analytics/report-evaluator.ts

import { Query } from '../core/query.js';
import { Build, BuildSource } from '../core/types/build.js';
import { BuildCache } from '../core/build-cache.js';
import { summarizeDurations } from './duration-stats.js';
import { GroupStats, ReportBatch, ReportOutcome } from './types.js';
import { GroupRenderError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface ReportEvaluatorOptions {
  scrapeHistoryMs: number;
}

interface BuildPopulation {
  builds: Build[];
  cachedBuckets: number;
  fetchedBuckets: number;
}

export class ReportEvaluator {
  constructor(
    private queries: readonly Query[],
    private source: BuildSource,
    private cache: BuildCache,
    private options: ReportEvaluatorOptions
  ) {}

  /**
   * Evaluate every query over builds created in [now - scrapeHistory, now).
   * A query whose group template cannot be rendered fails on its own;
   * an upstream fetch failure rejects the whole batch.
   */
  async evaluate(now: Date = new Date()): Promise<ReportBatch> {
    const from = new Date(now.getTime() - this.options.scrapeHistoryMs);
    const population = await this.loadPopulation(from, now);

    const reports = this.queries.map((query) => this.evaluateQuery(query, population.builds));

    return {
      window: { from, to: now },
      source: {
        cachedBuckets: population.cachedBuckets,
        fetchedBuckets: population.fetchedBuckets,
        builds: population.builds.length,
      },
      reports,
    };
  }

  /**
   * Builds created in [from, now): cached buckets first, one upstream fetch
   * covering every missed bucket, then write-back of what was fetched.
   */
  async loadPopulation(from: Date, now: Date): Promise<BuildPopulation> {
    const buckets = this.cache.bucketsBetween(from, now);
    const reads = await Promise.all(
      buckets.map(async (start) => ({ start, builds: await this.cache.read(start) }))
    );

    const collected: Build[] = [];
    const missed: number[] = [];
    for (const read of reads) {
      if (read.builds) {
        collected.push(...read.builds);
      } else {
        missed.push(read.start);
      }
    }

    if (missed.length > 0) {
      Logger.debug(`${missed.length} of ${buckets.length} buckets missed the cache, fetching from upstream`);

      const fetched = await this.source.listBuilds(new Date(missed[0]), now);
      const partitioned = this.cache.partition(fetched, missed);
      for (const bucketBuilds of partitioned.values()) {
        collected.push(...bucketBuilds);
      }
      await this.backfill(partitioned, now);
    }

    const byId = new Map<string, Build>();
    for (const build of collected) {
      const created = build.createdAt?.getTime();
      if (created !== undefined && created >= from.getTime() && created < now.getTime()) {
        byId.set(build.id, build);
      }
    }

    return {
      builds: Array.from(byId.values()),
      cachedBuckets: buckets.length - missed.length,
      fetchedBuckets: missed.length,
    };
  }

  evaluateQuery(query: Query, builds: readonly Build[]): ReportOutcome {
    const durationsByGroup = new Map<string, number[]>();
    let matched = 0;
    let missingTimestamp = 0;
    let negativeDuration = 0;

    try {
      for (const build of builds) {
        if (!query.predicate(build)) continue;
        matched++;

        const duration = query.duration(build);
        if (duration === undefined) {
          missingTimestamp++;
          continue;
        }
        if (duration < 0) {
          negativeDuration++;
          continue;
        }

        const key = query.group(build);
        const durations = durationsByGroup.get(key);
        if (durations) {
          durations.push(duration);
        } else {
          durationsByGroup.set(key, [duration]);
        }
      }
    } catch (error) {
      if (error instanceof GroupRenderError) {
        Logger.error(`Report "${query.name}": group template could not be rendered: ${error.message}`);
        return { status: 'failed', name: query.name, error };
      }
      Logger.error(`Report "${query.name}" failed: ${errorMessage(error)}`);
      return {
        status: 'failed',
        name: query.name,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }

    if (negativeDuration > 0) {
      Logger.warn(
        `Report "${query.name}": ${negativeDuration} build(s) reached "${query.to}" before "${query.from}" and were excluded`
      );
    }

    const groups = new Map<string, GroupStats>();
    for (const key of Array.from(durationsByGroup.keys()).sort()) {
      groups.set(key, summarizeDurations(durationsByGroup.get(key) ?? []));
    }

    return {
      status: 'ok',
      result: {
        name: query.name,
        matched,
        excluded: { missingTimestamp, negativeDuration },
        groups,
      },
    };
  }

  private async backfill(partitioned: Map<number, Build[]>, now: Date): Promise<void> {
    const entries = Array.from(partitioned.entries());
    const results = await Promise.allSettled(
      entries.map(([start, builds]) => this.cache.write(start, builds, now))
    );

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        Logger.warn(
          `Cache write-back failed for ${this.cache.keyFor(entries[i][0])}: ${errorMessage(result.reason)}`
        );
      }
    });
  }
}
