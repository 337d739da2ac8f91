// src/utils/report-formatter.ts

import chalk from 'chalk';
import { GroupStats, RefreshSummary, ReportBatch, ReportOutcome } from '../analytics/types.js';
import { formatDuration } from './duration.js';

const COLUMNS = ['count', 'mean', 'p50', 'p90', 'p99', 'max'] as const;

export class ReportFormatter {
  static formatBatch(batch: ReportBatch): string {
    const lines: string[] = [];

    lines.push('');
    lines.push(chalk.bold('📊 Build Duration Reports'));
    lines.push(
      `Window: ${batch.window.from.toISOString()} → ${batch.window.to.toISOString()}`
    );
    lines.push(
      `Builds: ${batch.source.builds} (${batch.source.cachedBuckets} cached buckets, ${batch.source.fetchedBuckets} fetched)`
    );

    for (const outcome of batch.reports) {
      lines.push('');
      lines.push(...this.formatOutcome(outcome));
    }

    lines.push('');
    return lines.join('\n');
  }

  static formatOutcome(outcome: ReportOutcome): string[] {
    if (outcome.status === 'failed') {
      return [
        chalk.bold(outcome.name),
        chalk.red(`  ❌ ${outcome.error.name}: ${outcome.error.message}`),
      ];
    }

    const { result } = outcome;
    const lines: string[] = [chalk.bold(result.name)];
    lines.push(`  Matched: ${result.matched}`);

    const { missingTimestamp, negativeDuration } = result.excluded;
    if (missingTimestamp > 0) {
      lines.push(chalk.yellow(`  Excluded (missing timestamp): ${missingTimestamp}`));
    }
    if (negativeDuration > 0) {
      lines.push(chalk.yellow(`  Excluded (negative duration): ${negativeDuration}`));
    }

    if (result.groups.size === 0) {
      lines.push('  No builds with a measurable duration.');
      return lines;
    }

    const width = Math.max(5, ...Array.from(result.groups.keys(), (k) => k.length));
    lines.push(`  ${'group'.padEnd(width)}  ${COLUMNS.map((c) => c.padStart(9)).join(' ')}`);
    for (const [key, stats] of result.groups) {
      lines.push(`  ${key.padEnd(width)}  ${this.formatStats(stats)}`);
    }
    return lines;
  }

  static formatStats(stats: GroupStats): string {
    return [
      String(stats.count),
      formatDuration(stats.meanMs),
      formatDuration(stats.p50Ms),
      formatDuration(stats.p90Ms),
      formatDuration(stats.p99Ms),
      formatDuration(stats.maxMs),
    ]
      .map((cell) => cell.padStart(9))
      .join(' ');
  }

  static formatRefresh(summary: RefreshSummary): string {
    return `Cached ${summary.builds} builds in ${summary.buckets} buckets for [${summary.from.toISOString()}, ${summary.to.toISOString()})`;
  }

  /**
   * Plain-object form of a batch for --json output.
   */
  static toJSON(batch: ReportBatch): Record<string, unknown> {
    return {
      window: {
        from: batch.window.from.toISOString(),
        to: batch.window.to.toISOString(),
      },
      source: batch.source,
      reports: batch.reports.map((outcome) =>
        outcome.status === 'failed'
          ? {
              name: outcome.name,
              status: 'failed',
              error: { name: outcome.error.name, message: outcome.error.message },
            }
          : {
              name: outcome.result.name,
              status: 'ok',
              matched: outcome.result.matched,
              excluded: outcome.result.excluded,
              groups: Object.fromEntries(outcome.result.groups),
            }
      ),
    };
  }
}
