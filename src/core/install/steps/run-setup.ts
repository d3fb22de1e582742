import { join } from 'path';

import { SubprocessError } from '../../../utils/errors.js';
import { stepFailed, stepOk } from '../../../utils/result.js';
import { condaExecutable } from '../../environment/conda-paths.js';
import type { PipelineStep } from '../pipeline-types.js';

export const runSetupStep: PipelineStep = {
  name: 'RunSetup',
  description: 'Running application setup',
  async run(ctx) {
    const { setup, environment } = ctx.config;
    const target = ctx.plan.targetDirectory;
    const args = [
      'run', '-n', environment.name,
      'python', join(target, setup.entryPoint),
      ...setup.args,
      ...(ctx.plan.useGpuArtifact && setup.gpuFlag ? [setup.gpuFlag] : [])
    ];

    ctx.report(`Running ${setup.entryPoint}`);
    const result = await ctx.runner.run(
      condaExecutable(ctx.plan.environmentManagerRoot, ctx.platform),
      args,
      { cwd: target, timeoutMs: ctx.config.commandTimeoutMs }
    );
    if (result.exitCode !== 0) {
      return stepFailed(new SubprocessError(setup.entryPoint, result.exitCode, result.stderr).message, result.exitCode);
    }
    return stepOk('Application setup complete');
  }
};
