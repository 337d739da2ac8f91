// src/cli/runtime.ts - Wires config into the data layer

import { AppConfig } from '../config/schema.js';
import { CacheStore } from '../cache/types.js';
import { MemoryCacheStore } from '../cache/memory-cache-store.js';
import { RedisCacheStore } from '../cache/redis-cache-store.js';
import { BuildCache } from '../core/build-cache.js';
import { BuildSource } from '../core/types/build.js';
import { BuildkiteClient } from '../upstream/buildkite-client.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface Runtime {
  source: BuildSource;
  store: CacheStore;
  cache: BuildCache;
  close(): Promise<void>;
}

export function createCacheStore(config: AppConfig): CacheStore {
  if (!config.cache.redisUrl) {
    Logger.debug('No Redis URL configured, using in-process cache');
    return new MemoryCacheStore();
  }
  return RedisCacheStore.connect(config.cache.redisUrl, {
    commandTimeoutMs: config.cache.commandTimeoutMs,
  });
}

export function createRuntime(config: AppConfig): Runtime {
  const { org, token } = config.buildkite;
  if (!org) {
    throw new ConfigurationError('Buildkite organization is required (--buildkite-org or BUILDKITE_ORGANIZATION)');
  }
  if (!token) {
    throw new ConfigurationError('Buildkite API token is required (--buildkite-token or BUILDKITE_API_TOKEN)');
  }

  const source = new BuildkiteClient({
    org,
    token,
    apiUrl: config.buildkite.apiUrl,
    timeoutMs: config.buildkite.timeoutMs,
  });
  const store = createCacheStore(config);
  const cache = new BuildCache(store, {
    org,
    keyPrefix: config.cache.keyPrefix,
    bucketSizeMs: config.cache.bucketSizeMs,
    retention: {
      ttlMs: config.cache.ttlMs,
      recentTtlMs: config.cache.recentTtlMs,
      settleAfterMs: config.settleAfterMs,
    },
  });

  return {
    source,
    store,
    cache,
    close: () => store.close(),
  };
}
