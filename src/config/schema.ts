// src/config/schema.ts

import { z } from 'zod';
import type { Query } from '../core/query.js';

/**
 * A report definition as written by an operator, in YAML or as a --report JSON flag.
 * - from/to: created | scheduled | started | finished
 * - pipelines/branches: regular expressions (default ".*")
 * - group: template such as "{{.Pipeline.Name}}"
 */
export const reportDefinitionSchema = z.object({
  name: z.string(),
  from: z.string(),
  to: z.string(),
  pipelines: z.string().default('.*'),
  branches: z.string().default('.*'),
  group: z.string(),
});

export type ReportDefinition = z.infer<typeof reportDefinitionSchema>;

/**
 * Shape of build-stats.yml. Durations are unit-suffixed strings ("672h", "1h30m").
 * Everything is optional here; defaults are applied by the config loader.
 */
export const configFileSchema = z
  .object({
    buildkite: z
      .object({
        org: z.string().optional(),
        token: z.string().optional(),
        apiUrl: z.string().url().optional(),
        timeout: z.string().optional(),
      })
      .strict()
      .optional(),
    cache: z
      .object({
        redisUrl: z.string().optional(),
        keyPrefix: z.string().optional(),
        ttl: z.string().optional(),
        recentTtl: z.string().optional(),
        bucketSize: z.string().optional(),
        commandTimeout: z.string().optional(),
      })
      .strict()
      .optional(),
    scrapeHistory: z.string().optional(),
    refreshHistory: z.string().optional(),
    settleAfter: z.string().optional(),
    reports: z.array(z.unknown()).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface BuildkiteConfig {
  org?: string;
  token?: string;
  apiUrl: string;
  timeoutMs: number;
}

export interface CacheConfig {
  redisUrl?: string;               // In-process cache when unset
  keyPrefix: string;
  ttlMs: number;                   // Settled buckets and refresh writes
  recentTtlMs: number;             // Buckets still receiving builds
  bucketSizeMs: number;
  commandTimeoutMs: number;
}

/**
 * Resolved, immutable process configuration. Built once at entry.
 */
export interface AppConfig {
  buildkite: BuildkiteConfig;
  cache: CacheConfig;
  scrapeHistoryMs: number;
  refreshHistoryMs: number;
  settleAfterMs: number;
  queries: readonly Query[];
}
