#!/usr/bin/env node

import { Command } from 'commander';
import { basename } from 'path';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';
import type { GlobalOptions } from './cli/context.js';

import { setupInstallCommand } from './commands/install.js';
import { setupProbeCommand } from './commands/probe.js';

/**
 * envstrap CLI - Main entry point
 *
 * Installs a Python application together with git, conda and a
 * CPU-matched native dependency.
 */

const program = new Command();

program
  .name('envstrap')
  .description('Bootstrap an application with its toolchain, environment and launcher')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'print debug logging')
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupProbeCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${opts.cwd ?? process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Run when executed directly or through the npm bin link
const entry = process.argv[1] ? basename(process.argv[1]) : '';
if (entry === 'index.js' || entry === 'index.ts' || entry === 'envstrap') {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
