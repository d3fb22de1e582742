import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import type { GlobalOptions } from '../cli/context.js';
import { createCliExecutionContext } from '../cli/context.js';
import { runProbePipeline, type ProbeCommandOptions } from '../core/probe/probe-report.js';

export function setupProbeCommand(program: Command): void {
  program
    .command('probe')
    .description('Show detected tools, CPU features and the artifact that would be installed')
    .option('--config <file>', 'path to envstrap.yml')
    .action(
      withErrorHandling(async (options: ProbeCommandOptions) => {
        const ctx = await createCliExecutionContext({ cwd: program.opts<GlobalOptions>().cwd });
        await runProbePipeline(options, ctx);
      })
    );
}
