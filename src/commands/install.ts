import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import type { GlobalOptions } from '../cli/context.js';
import { logger } from '../utils/logger.js';
import { CANCELLED_EXIT_CODE } from '../constants/index.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runInstallPipeline, type InstallCommandOptions } from '../core/install/install-pipeline.js';

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Install the application and everything it needs')
    .option('--target <dir>', 'directory the application source is cloned into')
    .option('--gpu', 'install the GPU build of the native dependency')
    .option('--no-gpu', 'install the CPU-only build of the native dependency')
    .option('--conda-path <path>', 'use an existing conda installation at this root')
    .option('-y, --yes', 'skip the confirmation before installing')
    .option('--config <file>', 'path to envstrap.yml')
    .action(
      withErrorHandling(async (options: InstallCommandOptions) => {
        const ctx = await createCliExecutionContext({ cwd: program.opts<GlobalOptions>().cwd });

        // Ctrl+C also reaches the running child, which aborts the current step;
        // the run then ends as cancelled. A second Ctrl+C exits at once.
        let interrupted = false;
        const onInterrupt = () => {
          if (interrupted) {
            process.exit(CANCELLED_EXIT_CODE);
          }
          interrupted = true;
          logger.warn('Interrupt received; aborting the current step');
        };
        process.on('SIGINT', onInterrupt);

        try {
          const result = await runInstallPipeline(options, ctx, {
            beforeStep: async () => !interrupted,
            isInterrupted: () => interrupted
          });
          if (!result.success) {
            process.exit(result.data?.exitCode ?? 1);
          }
        } finally {
          process.off('SIGINT', onInterrupt);
        }
      })
    );
}
