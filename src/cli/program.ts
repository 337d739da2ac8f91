// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';
import { z } from 'zod';

import { Logger, LogLevel } from '../utils/logger.js';
import { registerCommands } from './commands/register-commands.js';

export async function createProgram(): Promise<Command> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg = z.object({ version: z.string() }).parse(JSON.parse(await fs.readFile(pkgPath, 'utf-8')));

  const program = new Command();

  program
    .name('build-stats')
    .version(`build-stats v${pkg.version}`, '-v, --version')
    .description('Build duration reports over Buildkite history, backed by a TTL cache')
    .option('-c, --config <file>', 'Config file (default: build-stats.yml)')
    .option('--buildkite-token <token>', 'Buildkite API token with read_builds; "@file" reads it from a file')
    .option('--buildkite-org <org>', 'Buildkite organization to scrape')
    .option('--redis <url>', 'Redis URL for the build cache (in-process cache when omitted)')
    .option('--verbose', 'Show debug output')
    .exitOverride();

  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      Logger.setLevel(LogLevel.DEBUG);
    }
  });

  registerCommands(program);

  return program;
}

export { CommanderError };
