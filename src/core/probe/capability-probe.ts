import semver from 'semver';

import type { EnvstrapConfig, SupportedPlatform, ToolName } from '../../types/index.js';
import type { CommandRunner } from '../../utils/process.js';
import { logger } from '../../utils/logger.js';
import { condaExecutable } from '../environment/conda-paths.js';
import { createCapabilityFlags, type CapabilityFlags, type ToolDetection } from './capability-flags.js';
import { detectCpuFeatures } from './cpu-features.js';

export interface ProbeDependencies {
  runner: CommandRunner;
  platform: SupportedPlatform;
  config: EnvstrapConfig;
  /** Source for /proc/cpuinfo on Linux; tests substitute their own text. */
  readTextFile?: (path: string) => Promise<string>;
}

/**
 * Turn raw `--version` output into a semver string when possible
 * (`git version 2.43.0.windows.1` -> `2.43.0`), else the trimmed first line.
 */
export function normalizeToolVersion(output: string): string | undefined {
  const firstLine = output.trim().split(/\r?\n/)[0]?.trim();
  if (!firstLine) {
    return undefined;
  }
  return semver.coerce(firstLine)?.version ?? firstLine;
}

/**
 * Run `<command> --version`. Undefined when the program is missing or fails.
 */
export async function queryToolVersion(
  runner: CommandRunner,
  command: string,
  timeoutMs?: number
): Promise<string | undefined> {
  const result = await runner.run(command, ['--version'], { timeoutMs });
  if (result.exitCode !== 0) {
    return undefined;
  }
  // conda <4.8 printed its version on stderr
  return normalizeToolVersion(result.stdout || result.stderr) ?? '';
}

async function detectVersionControl(deps: ProbeDependencies): Promise<ToolDetection | undefined> {
  const { command, installedCommand, minimumVersion } = deps.config.tools.versionControl;
  const candidates = [command, installedCommand[deps.platform]]
    .filter((candidate): candidate is string => Boolean(candidate))
    .filter((candidate, index, all) => all.indexOf(candidate) === index);

  for (const candidate of candidates) {
    const version = await queryToolVersion(deps.runner, candidate, deps.config.commandTimeoutMs);
    if (version === undefined) {
      continue;
    }
    if (minimumVersion && semver.valid(version) && semver.lt(version, minimumVersion)) {
      logger.info(`${candidate} ${version} is older than required ${minimumVersion}; treating as missing`);
      continue;
    }
    return { location: candidate, version: version || undefined };
  }
  return undefined;
}

async function detectEnvironmentManager(deps: ProbeDependencies): Promise<ToolDetection | undefined> {
  const { defaultRoot, alternateRoot } = deps.config.tools.environmentManager;

  for (const root of [defaultRoot, alternateRoot]) {
    const version = await queryToolVersion(
      deps.runner,
      condaExecutable(root, deps.platform),
      deps.config.commandTimeoutMs
    );
    if (version !== undefined) {
      return { location: root, version: version || undefined };
    }
  }
  return undefined;
}

/**
 * Inspect the host. Read-only apart from short diagnostic subprocesses,
 * and never fails: anything not detected is reported as absent.
 */
export async function probe(deps: ProbeDependencies): Promise<CapabilityFlags> {
  const tools: Partial<Record<ToolName, ToolDetection>> = {};

  const versionControl = await detectVersionControl(deps);
  if (versionControl) {
    tools['version-control'] = versionControl;
  }

  const environmentManager = await detectEnvironmentManager(deps);
  if (environmentManager) {
    tools['environment-manager'] = environmentManager;
  }

  const cpu = await detectCpuFeatures({
    runner: deps.runner,
    platform: deps.platform,
    readTextFile: deps.readTextFile,
    timeoutMs: deps.config.commandTimeoutMs
  });

  logger.debug('Capability probe finished', {
    tools,
    hasAVX: cpu.hasAVX,
    hasSSE4: cpu.hasSSE4
  });

  return createCapabilityFlags({ tools, ...cpu });
}
