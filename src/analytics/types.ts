// src/analytics/types.ts

/**
 * Duration summary for one group. All values in milliseconds.
 */
export interface GroupStats {
  count: number;
  totalMs: number;
  meanMs: number;
  minMs: number;
  maxMs: number;
  p50Ms: number;
  p90Ms: number;
  p99Ms: number;
}

export interface ExclusionCounts {
  /** Builds lacking the `from` or `to` timestamp */
  missingTimestamp: number;
  /** Builds whose `to` timestamp precedes `from` */
  negativeDuration: number;
}

export interface ReportResult {
  name: string;
  /** Builds that passed the pipeline and branch filters */
  matched: number;
  excluded: ExclusionCounts;
  /** Keyed by rendered group key, in key order */
  groups: Map<string, GroupStats>;
}

export type ReportOutcome =
  | { status: 'ok'; result: ReportResult }
  | { status: 'failed'; name: string; error: Error };

export interface ReportBatch {
  window: { from: Date; to: Date };
  source: {
    cachedBuckets: number;
    fetchedBuckets: number;
    builds: number;
  };
  reports: ReportOutcome[];
}

export interface RefreshSummary {
  from: Date;
  to: Date;
  buckets: number;
  builds: number;
  failedKeys: string[];
}
