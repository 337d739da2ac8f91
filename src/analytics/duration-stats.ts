// src/analytics/duration-stats.ts

import { GroupStats } from './types.js';

/**
 * Nearest-rank percentile over an ascending list.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error('percentile of an empty list');
  }
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}

/**
 * Summarize durations. Input order does not affect the result.
 */
export function summarizeDurations(durations: readonly number[]): GroupStats {
  const sorted = [...durations].sort((a, b) => a - b);
  const totalMs = sorted.reduce((sum, d) => sum + d, 0);

  return {
    count: sorted.length,
    totalMs,
    meanMs: sorted.length > 0 ? totalMs / sorted.length : 0,
    minMs: sorted.length > 0 ? sorted[0] : 0,
    maxMs: sorted.length > 0 ? sorted[sorted.length - 1] : 0,
    p50Ms: sorted.length > 0 ? percentile(sorted, 50) : 0,
    p90Ms: sorted.length > 0 ? percentile(sorted, 90) : 0,
    p99Ms: sorted.length > 0 ? percentile(sorted, 99) : 0,
  };
}
