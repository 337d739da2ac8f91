// src/cli/commands/report.ts

import { ConfigLoader, ConfigOverrides } from '../../config/config-loader.js';
import { ReportEvaluator } from '../../analytics/report-evaluator.js';
import { createRuntime } from '../runtime.js';
import { ReportFormatter } from '../../utils/report-formatter.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';

export interface ReportCommandOptions extends ConfigOverrides {
  json?: boolean;
}

/**
 * Evaluate every configured report and print the results.
 * @returns exit code: 1 when any report failed, 0 otherwise
 */
export async function reportCommand(cwd: string, options: ReportCommandOptions): Promise<number> {
  const config = await new ConfigLoader(cwd).load(options);
  if (config.queries.length === 0) {
    throw new ConfigurationError('No reports configured. Add a "reports" list to the config or pass --report');
  }

  const runtime = createRuntime(config);
  try {
    const evaluator = new ReportEvaluator(config.queries, runtime.source, runtime.cache, {
      scrapeHistoryMs: config.scrapeHistoryMs,
    });

    const batch = await evaluator.evaluate();

    if (options.json) {
      console.log(JSON.stringify(ReportFormatter.toJSON(batch), null, 2));
    } else {
      console.log(ReportFormatter.formatBatch(batch));
    }

    const failed = batch.reports.filter((r) => r.status === 'failed').length;
    if (failed > 0) {
      Logger.warn(`${failed} of ${batch.reports.length} reports failed`);
      return 1;
    }
    return 0;
  } finally {
    // A failed close must not replace the command's outcome
    await runtime.close().catch((error: unknown) => {
      Logger.warn(`Failed to close the cache connection: ${errorMessage(error)}`);
    });
  }
}
