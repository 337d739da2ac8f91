// src/cli/commands/refresh.ts

import { ConfigLoader, ConfigOverrides } from '../../config/config-loader.js';
import { RefreshEngine } from '../../core/refresh-engine.js';
import { createRuntime } from '../runtime.js';
import { ReportFormatter } from '../../utils/report-formatter.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';

/**
 * Rewrite the recent part of the build cache. Intended for a periodic job.
 * @returns exit code: 1 when any bucket could not be written
 */
export async function refreshCommand(cwd: string, options: ConfigOverrides): Promise<number> {
  const config = await new ConfigLoader(cwd).load(options);
  if (!config.cache.redisUrl) {
    throw new ConfigurationError(
      'refresh needs a shared cache: set cache.redisUrl or pass --redis (the in-process cache is discarded on exit)'
    );
  }

  const runtime = createRuntime(config);

  try {
    const engine = new RefreshEngine(runtime.source, runtime.cache);
    const from = new Date(Date.now() - config.refreshHistoryMs);

    Logger.info(`Starting refresh between [${from.toISOString()}, now)`);
    const summary = await engine.refreshCache(from);

    if (summary.failedKeys.length > 0) {
      Logger.error(`Refresh incomplete: ${summary.failedKeys.length} of ${summary.buckets} buckets were not written`);
      return 1;
    }

    Logger.success(ReportFormatter.formatRefresh(summary));
    return 0;
  } finally {
    await runtime.close().catch((error: unknown) => {
      Logger.warn(`Failed to close the cache connection: ${errorMessage(error)}`);
    });
  }
}
