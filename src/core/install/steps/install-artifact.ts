import { SubprocessError } from '../../../utils/errors.js';
import { stepFailed, stepOk } from '../../../utils/result.js';
import { artifactTableFromConfig, selectArtifactName, stageArtifact } from '../../artifact/artifact-selector.js';
import { condaExecutable } from '../../environment/conda-paths.js';
import type { PipelineStep } from '../pipeline-types.js';

/**
 * Pick the build matching this host, stage it under that name and install
 * it into the application environment.
 */
export const installArtifactStep: PipelineStep = {
  name: 'InstallArtifact',
  description: 'Installing native dependency',
  async run(ctx) {
    const { artifact, environment, stagingDir } = ctx.config;
    const finalName = selectArtifactName(ctx.flags, ctx.plan, artifactTableFromConfig(artifact));
    ctx.report(`Selected artifact ${finalName}`);

    const staged = await stageArtifact(stagingDir, artifact.genericName, finalName);
    if (!staged.ok) {
      return stepFailed(staged.error.message);
    }

    const conda = condaExecutable(ctx.plan.environmentManagerRoot, ctx.platform);
    const result = await ctx.runner.run(
      conda,
      ['run', '-n', environment.name, ...artifact.installCommand, staged.value],
      { timeoutMs: ctx.config.commandTimeoutMs }
    );
    if (result.exitCode !== 0) {
      return stepFailed(new SubprocessError('artifact install', result.exitCode, result.stderr).message, result.exitCode);
    }
    return stepOk(`Installed ${finalName} into '${environment.name}'`);
  }
};
