/**
 * Environment Manager
 *
 * Owns the single named conda environment the downstream application runs in.
 * `ensureEnvironment` is idempotent by replacement: an existing environment
 * is removed before a fresh one is created.
 */

import type { StepResult, SupportedPlatform } from '../../types/index.js';
import { SubprocessError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { CommandRunner } from '../../utils/process.js';
import { pathsEqual } from '../../utils/paths.js';
import { err, ok, runOrAbort, stepFailed, stepOk, type Result } from '../../utils/result.js';
import type { InstallationPlan } from '../plan/installation-plan.js';
import { condaExecutable, environmentPrefix } from './conda-paths.js';

export interface EnvironmentManagerDependencies {
  runner: CommandRunner;
  platform: SupportedPlatform;
  timeoutMs?: number;
  /** Receives progress lines */
  report?: (line: string) => void;
}

function parseEnvironmentList(stdout: string): string[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || !('envs' in parsed) || !Array.isArray(parsed.envs)) {
    return undefined;
  }
  return parsed.envs.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * Prefixes of every environment conda knows about (`conda env list --json`).
 */
export async function listEnvironments(
  plan: Pick<InstallationPlan, 'environmentManagerRoot'>,
  deps: EnvironmentManagerDependencies
): Promise<Result<string[], SubprocessError>> {
  const conda = condaExecutable(plan.environmentManagerRoot, deps.platform);
  const result = await deps.runner.run(conda, ['env', 'list', '--json'], { timeoutMs: deps.timeoutMs });
  if (result.exitCode !== 0) {
    return err(new SubprocessError('conda env list', result.exitCode, result.stderr));
  }
  const envs = parseEnvironmentList(result.stdout);
  if (!envs) {
    return err(new SubprocessError('conda env list', 1, 'unexpected output (expected JSON with an "envs" list)'));
  }
  return ok(envs);
}

export async function environmentExists(
  plan: Pick<InstallationPlan, 'environmentManagerRoot'>,
  envName: string,
  deps: EnvironmentManagerDependencies
): Promise<Result<boolean, SubprocessError>> {
  const listed = await listEnvironments(plan, deps);
  if (!listed.ok) {
    return listed;
  }
  const expected = environmentPrefix(plan.environmentManagerRoot, envName, deps.platform);
  return ok(listed.value.some(prefix => pathsEqual(prefix, expected, deps.platform)));
}

async function runConda(
  plan: Pick<InstallationPlan, 'environmentManagerRoot'>,
  args: string[],
  label: string,
  successMessage: string,
  deps: EnvironmentManagerDependencies
): Promise<StepResult> {
  const conda = condaExecutable(plan.environmentManagerRoot, deps.platform);
  const result = await deps.runner.run(conda, args, { timeoutMs: deps.timeoutMs });
  if (result.exitCode !== 0) {
    return stepFailed(new SubprocessError(label, result.exitCode, result.stderr).message, result.exitCode);
  }
  return stepOk(successMessage);
}

/**
 * Create `envName` pinned to `runtimeVersionSpec`, replacing any existing
 * environment of that name. Removal and creation run strictly one after the
 * other; a failed removal means creation is never attempted.
 */
export async function ensureEnvironment(
  plan: Pick<InstallationPlan, 'environmentManagerRoot'>,
  envName: string,
  runtimeVersionSpec: string,
  deps: EnvironmentManagerDependencies
): Promise<StepResult> {
  const report = deps.report ?? ((line: string) => logger.info(line));

  const existing = await environmentExists(plan, envName, deps);
  if (!existing.ok) {
    return stepFailed(existing.error.message, existing.error.exitCode);
  }

  const packages = runtimeVersionSpec.split(/\s+/).filter(Boolean);

  return runOrAbort([
    ...(existing.value
      ? [async () => {
          report(`Removing existing environment '${envName}'`);
          return runConda(plan, ['remove', '-y', '-n', envName, '--all'], 'conda remove', `Removed environment '${envName}'`, deps);
        }]
      : []),
    async () => {
      report(`Creating environment '${envName}' (${runtimeVersionSpec})`);
      return runConda(
        plan,
        ['create', '-y', '-n', envName, ...packages],
        'conda create',
        `Created environment '${envName}' (${runtimeVersionSpec})`,
        deps
      );
    }
  ]);
}
