import { join } from 'path';

import type { InstallerSpec, StepResult, ToolName } from '../../../types/index.js';
import { TOOL_NAMES } from '../../../types/index.js';
import { TOOL_LABELS } from '../../../constants/index.js';
import { SubprocessError } from '../../../utils/errors.js';
import { fileNameFromUrl } from '../../../utils/paths.js';
import { runOrAbort, stepFailed, stepOk } from '../../../utils/result.js';
import { condaExecutable } from '../../environment/conda-paths.js';
import { queryToolVersion } from '../../probe/capability-probe.js';
import type { PipelineContext, PipelineStep } from '../pipeline-types.js';

type PlaceholderValues = Record<'installer' | 'root', string>;

export function expandPlaceholders(template: string, values: PlaceholderValues): string {
  return template.replace(/\{(installer|root)\}/g, (_match, key: keyof PlaceholderValues) => values[key]);
}

function installerFor(ctx: PipelineContext, tool: ToolName): InstallerSpec | undefined {
  const installers = tool === 'version-control'
    ? ctx.config.tools.versionControl.installer
    : ctx.config.tools.environmentManager.installer;
  return installers[ctx.platform];
}

// The freshly installed tool must answer a version query before later steps rely on it
async function verifyInstalled(ctx: PipelineContext, tool: ToolName): Promise<StepResult> {
  const command = tool === 'version-control'
    ? ctx.plan.versionControlCommand
    : condaExecutable(ctx.plan.environmentManagerRoot, ctx.platform);
  const version = await queryToolVersion(ctx.runner, command, ctx.config.commandTimeoutMs);
  if (version === undefined) {
    return stepFailed(`${TOOL_LABELS[tool]} was installed but ${command} does not run`);
  }
  return stepOk(`Installed ${TOOL_LABELS[tool]}${version ? ` ${version}` : ''}`);
}

async function installTool(ctx: PipelineContext, tool: ToolName): Promise<StepResult> {
  const label = TOOL_LABELS[tool];
  const spec = installerFor(ctx, tool);
  if (!spec) {
    return stepFailed(`No installer configured for ${label} on ${ctx.platform}; install it manually and re-run`);
  }

  ctx.report(`Downloading ${label} installer`);
  const destination = join(ctx.config.stagingDir, fileNameFromUrl(spec.url, `${label}-installer`));
  const downloaded = await ctx.downloader.download(spec.url, destination);
  if (!downloaded.ok) {
    return stepFailed(downloaded.error.message);
  }

  const values: PlaceholderValues = { installer: downloaded.value, root: ctx.plan.environmentManagerRoot };
  const command = expandPlaceholders(spec.command ?? '{installer}', values);
  const args = spec.args.map(arg => expandPlaceholders(arg, values));

  ctx.report(`Running ${label} installer`);
  const result = await ctx.runner.run(command, args, { timeoutMs: ctx.config.commandTimeoutMs });
  if (result.exitCode !== 0) {
    return stepFailed(new SubprocessError(`${label} installer`, result.exitCode, result.stderr).message, result.exitCode);
  }

  return verifyInstalled(ctx, tool);
}

/**
 * Download and run installers for the tools the plan marks missing,
 * git first, then conda.
 */
export const installPrerequisitesStep: PipelineStep = {
  name: 'InstallPrerequisites',
  description: 'Installing prerequisites',
  async run(ctx) {
    const missing = TOOL_NAMES.filter(tool => ctx.plan.installTool(tool));
    if (missing.length === 0) {
      return stepOk('All prerequisites already installed');
    }
    const result = await runOrAbort(missing.map(tool => () => installTool(ctx, tool)));
    if (result.exitCode !== 0) {
      return result;
    }
    return stepOk(`Installed ${missing.map(tool => TOOL_LABELS[tool]).join(' and ')}`);
  }
};
