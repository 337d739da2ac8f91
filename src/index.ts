#!/usr/bin/env node

// src/index.ts - CLI entry point

import { createProgram, CommanderError } from './cli/program.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const program = await createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      process.exitCode = error.exitCode;
      return;
    }
    Logger.error(error instanceof Error ? error.message : String(error));
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
