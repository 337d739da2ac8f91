// src/cli/commands/validate.ts

import { ConfigLoader, ConfigOverrides } from '../../config/config-loader.js';
import { formatDuration } from '../../utils/duration.js';
import { Logger } from '../../utils/logger.js';

/**
 * Load the configuration and compile every report without touching the
 * network. Compilation errors propagate to the CLI entry point.
 */
export async function validateCommand(cwd: string, options: ConfigOverrides): Promise<number> {
  const config = await new ConfigLoader(cwd).load(options);

  console.log(`\nScrape history:  ${formatDuration(config.scrapeHistoryMs)}`);
  console.log(`Refresh history: ${formatDuration(config.refreshHistoryMs)}`);
  console.log(`Cache:           ${config.cache.redisUrl ? 'redis' : 'in-process'}`);
  console.log(`Reports:         ${config.queries.length}\n`);

  for (const query of config.queries) {
    const d = query.describe();
    console.log(`  ${d.name}`);
    console.log(`    duration: ${d.from} → ${d.to}`);
    console.log(`    pipelines: /${d.pipelines}/  branches: /${d.branches}/`);
    console.log(`    group: ${d.group}`);
  }

  if (config.queries.length === 0) {
    Logger.warn('No reports configured');
  } else {
    Logger.success(`${config.queries.length} report(s) compiled`);
  }
  return 0;
}
