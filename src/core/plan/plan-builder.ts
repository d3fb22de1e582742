import { resolve } from 'path';

import type { EnvstrapConfig, SupportedPlatform, ToolName, UserOverrides } from '../../types/index.js';
import type { CommandRunner } from '../../utils/process.js';
import { expandTilde } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { condaExecutable } from '../environment/conda-paths.js';
import type { CapabilityFlags } from '../probe/capability-flags.js';
import { createInstallationPlan, type InstallationPlan } from './installation-plan.js';

export interface PlanDependencies {
  runner: CommandRunner;
  platform: SupportedPlatform;
  config: EnvstrapConfig;
  /** Base for relative user-supplied paths */
  cwd: string;
}

/**
 * Check a user-supplied conda root by asking its executable for a version.
 */
export async function validateCustomPath(
  path: string,
  deps: Pick<PlanDependencies, 'runner' | 'platform' | 'config'>
): Promise<boolean> {
  if (!path.trim()) {
    return false;
  }
  const result = await deps.runner.run(
    condaExecutable(path, deps.platform),
    ['--version'],
    { timeoutMs: deps.config.commandTimeoutMs }
  );
  return result.exitCode === 0;
}

interface EnvironmentManagerDecision {
  root: string;
  install: boolean;
  note?: string;
}

async function decideEnvironmentManager(
  flags: CapabilityFlags,
  overrides: UserOverrides,
  deps: PlanDependencies
): Promise<EnvironmentManagerDecision> {
  const detectedRoot = flags.hasTool('environment-manager')
    ? flags.toolLocation('environment-manager')
    : undefined;
  const fallback: EnvironmentManagerDecision = detectedRoot
    ? { root: detectedRoot, install: false }
    : { root: deps.config.tools.environmentManager.defaultRoot, install: true };

  const custom = overrides.customEnvironmentManagerPath?.trim();
  if (!custom) {
    return fallback;
  }

  const customRoot = resolve(deps.cwd, expandTilde(custom));
  if (await validateCustomPath(customRoot, deps)) {
    return { root: customRoot, install: false };
  }

  const note = `Custom conda path '${custom}' is not a working conda install; using ${fallback.root}`;
  logger.warn(note);
  return { ...fallback, note };
}

/**
 * Merge probe results and user choices into the plan for this run.
 * An invalid custom path is recorded as a note, never as an error.
 */
export async function buildPlan(
  flags: CapabilityFlags,
  overrides: UserOverrides,
  deps: PlanDependencies
): Promise<InstallationPlan> {
  const toolsToInstall: ToolName[] = [];
  const notes: string[] = [];

  if (!flags.hasTool('version-control')) {
    toolsToInstall.push('version-control');
  }

  const environmentManager = await decideEnvironmentManager(flags, overrides, deps);
  if (environmentManager.install) {
    toolsToInstall.push('environment-manager');
  }
  if (environmentManager.note) {
    notes.push(environmentManager.note);
  }

  const vcConfig = deps.config.tools.versionControl;
  const versionControlCommand =
    flags.toolLocation('version-control') ??
    vcConfig.installedCommand[deps.platform] ??
    vcConfig.command;

  const targetDirectory = resolve(
    deps.cwd,
    expandTilde(overrides.targetDirectory ?? deps.config.targetDirectory)
  );

  const plan = createInstallationPlan({
    toolsToInstall,
    environmentManagerRoot: environmentManager.root,
    versionControlCommand,
    useGpuArtifact: !overrides.noGpu,
    targetDirectory,
    notes
  });

  logger.debug('Installation plan built', {
    toolsToInstall: plan.toolsToInstall,
    environmentManagerRoot: plan.environmentManagerRoot,
    versionControlCommand: plan.versionControlCommand,
    useGpuArtifact: plan.useGpuArtifact,
    targetDirectory: plan.targetDirectory
  });

  return plan;
}
