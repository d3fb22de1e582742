import { dirname, join } from 'path';

import { FILE_PATTERNS } from '../../../constants/index.js';
import { SubprocessError } from '../../../utils/errors.js';
import { ensureDir, exists } from '../../../utils/fs.js';
import { stepFailed, stepOk } from '../../../utils/result.js';
import type { PipelineStep } from '../pipeline-types.js';

/**
 * Fetch the application's source into the target directory. An existing
 * checkout is fast-forwarded instead of cloned again.
 */
export const cloneSourceStep: PipelineStep = {
  name: 'CloneSource',
  description: 'Fetching application source',
  async run(ctx) {
    const git = ctx.plan.versionControlCommand;
    const target = ctx.plan.targetDirectory;
    const { url, ref } = ctx.config.repository;

    let args: string[];
    let label: string;
    if (await exists(join(target, FILE_PATTERNS.GIT_DIR))) {
      ctx.report(`Updating existing checkout in ${target}`);
      args = ['-C', target, 'pull', '--ff-only'];
      label = 'git pull';
    } else {
      await ensureDir(dirname(target));
      ctx.report(`Cloning ${url}${ref ? `#${ref}` : ''} into ${target}`);
      args = ['clone', '--depth', '1', ...(ref ? ['--branch', ref] : []), url, target];
      label = 'git clone';
    }

    const result = await ctx.runner.run(git, args, { timeoutMs: ctx.config.commandTimeoutMs });
    if (result.exitCode !== 0) {
      return stepFailed(new SubprocessError(label, result.exitCode, result.stderr).message, result.exitCode);
    }
    return stepOk(`Source ready in ${target}`);
  }
};
