// src/cli/commands/register-commands.ts - Command registrations

import type { Command } from 'commander';

import { reportCommand } from './report.js';
import { refreshCommand } from './refresh.js';
import { validateCommand } from './validate.js';
import { ConfigOverrides } from '../../config/config-loader.js';

type GlobalOptions = {
  config?: string;
  buildkiteToken?: string;
  buildkiteOrg?: string;
  redis?: string;
};

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function toOverrides(opts: GlobalOptions): ConfigOverrides {
  return {
    configPath: opts.config,
    buildkiteToken: opts.buildkiteToken,
    buildkiteOrg: opts.buildkiteOrg,
    redisUrl: opts.redis,
  };
}

export function registerCommands(program: Command): void {
  const cwd = process.cwd();

  program
    .command('report')
    .description('Evaluate reports over recent build history')
    .option('--report <json>', 'Report definition as JSON (repeatable, replaces configured reports)', collect)
    .option('--scrape-history <duration>', 'How far back builds are included (default 672h)')
    .option('--json', 'Print results as JSON')
    .action(async (opts: { report?: string[]; scrapeHistory?: string; json?: boolean }, cmd: Command) => {
      process.exitCode = await reportCommand(cwd, {
        ...toOverrides(cmd.optsWithGlobals<GlobalOptions>()),
        reports: opts.report,
        scrapeHistory: opts.scrapeHistory,
        json: opts.json,
      });
    });

  program
    .command('refresh')
    .description('Rewrite recent builds into the cache (run periodically)')
    .option('--refresh-history <duration>', 'How far back the cache is rewritten (default 3h)')
    .action(async (opts: { refreshHistory?: string }, cmd: Command) => {
      process.exitCode = await refreshCommand(cwd, {
        ...toOverrides(cmd.optsWithGlobals<GlobalOptions>()),
        refreshHistory: opts.refreshHistory,
      });
    });

  program
    .command('validate')
    .description('Check configuration and compile reports without fetching builds')
    .option('--report <json>', 'Report definition as JSON (repeatable)', collect)
    .action(async (opts: { report?: string[] }, cmd: Command) => {
      process.exitCode = await validateCommand(cwd, {
        ...toOverrides(cmd.optsWithGlobals<GlobalOptions>()),
        reports: opts.report,
      });
    });
}
