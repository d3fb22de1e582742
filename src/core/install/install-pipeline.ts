/**
 * Install Pipeline
 *
 * Command-level flow for `envstrap install`: load configuration, probe the
 * host, gather the user's choices, build the plan and hand it to the
 * orchestrator. All prompting happens here, before any installation action.
 */

import type { CommandResult, EnvstrapConfig, SupportedPlatform, ToolName, UserOverrides } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { TOOL_LABELS, currentPlatform, type PipelineStepName } from '../../constants/index.js';
import { createFetchDownloader, type Downloader } from '../../utils/download.js';
import { UserCancellationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createProcessRunner, type CommandRunner } from '../../utils/process.js';
import { artifactTableFromConfig, selectArtifactName } from '../artifact/artifact-selector.js';
import { ConfigManager, assertInstallable } from '../config.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { buildPlan } from '../plan/plan-builder.js';
import type { InstallationPlan } from '../plan/installation-plan.js';
import type { CapabilityFlags } from '../probe/capability-flags.js';
import { probe } from '../probe/capability-probe.js';
import { InstallationOrchestrator } from './orchestrator.js';
import type { PipelineStep, RunOutcome } from './pipeline-types.js';

export interface InstallCommandOptions {
  target?: string;
  /** undefined when neither --gpu nor --no-gpu was given */
  gpu?: boolean;
  condaPath?: string;
  yes?: boolean;
  config?: string;
}

/**
 * Process-level collaborators. The CLI uses the defaults; tests substitute
 * in-process fakes.
 */
export interface InstallServices {
  runner?: CommandRunner;
  downloader?: Downloader;
  platform?: SupportedPlatform;
  readTextFile?: (path: string) => Promise<string>;
  steps?: readonly PipelineStep[];
  beforeStep?: (step: PipelineStepName) => Promise<boolean>;
  isInterrupted?: () => boolean;
}

async function collectOverrides(
  options: InstallCommandOptions,
  flags: CapabilityFlags,
  config: EnvstrapConfig,
  ctx: ExecutionContext
): Promise<UserOverrides> {
  const overrides: UserOverrides = {
    targetDirectory: options.target,
    noGpu: options.gpu === false,
    customEnvironmentManagerPath: options.condaPath
  };
  if (!ctx.interactive) {
    return overrides;
  }

  const prompt = resolvePrompt(ctx);

  if (options.target === undefined) {
    const answer = await prompt.text(`Where should ${config.appName} be installed?`, {
      initial: config.targetDirectory,
      placeholder: config.targetDirectory,
      validate: value => (value.trim() ? undefined : 'Enter a directory')
    });
    overrides.targetDirectory = answer.trim() || config.targetDirectory;
  }

  if (options.gpu === undefined) {
    overrides.noGpu = !(await prompt.confirm('Install the GPU build?', true));
  }

  if (options.condaPath === undefined && !flags.hasTool('environment-manager')) {
    const answer = await prompt.text('conda was not found. Path to an existing installation (leave empty to install Miniconda)', {
      placeholder: config.tools.environmentManager.defaultRoot
    });
    overrides.customEnvironmentManagerPath = answer.trim() || undefined;
  }

  return overrides;
}

/**
 * Human-readable summary of what the run is about to do.
 */
export function describePlan(plan: InstallationPlan, flags: CapabilityFlags, config: EnvstrapConfig): string {
  const toolLine = (tool: ToolName, location: string) => {
    if (plan.installTool(tool)) {
      return `${TOOL_LABELS[tool]}: will be installed (${location})`;
    }
    const version = flags.toolVersion(tool);
    return `${TOOL_LABELS[tool]}: ${version ? `${version} ` : ''}(${location})`;
  };

  const artifact = selectArtifactName(flags, plan, artifactTableFromConfig(config.artifact));
  return [
    `Target directory: ${plan.targetDirectory}`,
    toolLine('version-control', plan.versionControlCommand),
    toolLine('environment-manager', plan.environmentManagerRoot),
    `Environment: ${config.environment.name} (${config.environment.runtime})`,
    `Artifact: ${artifact}`
  ].join('\n');
}

export async function runInstallPipeline(
  options: InstallCommandOptions,
  ctx: ExecutionContext,
  services: InstallServices = {}
): Promise<CommandResult<RunOutcome>> {
  const output = resolveOutput(ctx);
  const platform = services.platform ?? currentPlatform();

  const config = await new ConfigManager({ cwd: ctx.cwd, configPath: options.config, platform }).load();
  assertInstallable(config);

  const runner = services.runner ?? createProcessRunner();
  const downloader = services.downloader ?? createFetchDownloader({ timeoutMs: config.downloadTimeoutMs });

  const spinner = output.spinner();
  spinner.start('Inspecting this machine');
  const flags = await probe({ runner, platform, config, readTextFile: services.readTextFile });
  spinner.stop('Inspection complete');

  const overrides = await collectOverrides(options, flags, config, ctx);
  const plan = await buildPlan(flags, overrides, { runner, platform, config, cwd: ctx.cwd });

  output.note(describePlan(plan, flags, config), 'Installation plan');
  for (const note of plan.notes) {
    output.warn(note);
  }

  if (ctx.interactive && !options.yes) {
    const proceed = await resolvePrompt(ctx).confirm('Proceed with installation?', true);
    if (!proceed) {
      throw new UserCancellationError();
    }
  }

  const orchestrator = new InstallationOrchestrator({
    config,
    flags,
    runner,
    downloader,
    platform,
    output,
    steps: services.steps,
    beforeStep: services.beforeStep,
    isInterrupted: services.isInterrupted
  });
  const outcome = await orchestrator.run(plan);
  logger.debug('Install finished', { exitCode: outcome.exitCode, step: outcome.step });

  return {
    success: outcome.success,
    data: outcome,
    error: outcome.success ? undefined : outcome.message,
    warnings: plan.notes.length > 0 ? [...plan.notes] : undefined
  };
}
