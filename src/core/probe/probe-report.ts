import type { CommandResult, EnvstrapConfig, SupportedPlatform, ToolName } from '../../types/index.js';
import { TOOL_NAMES } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { TOOL_LABELS, currentPlatform } from '../../constants/index.js';
import { createProcessRunner, type CommandRunner } from '../../utils/process.js';
import { artifactTableFromConfig, listStagedCandidates, selectArtifactName } from '../artifact/artifact-selector.js';
import { ConfigManager } from '../config.js';
import { resolveOutput } from '../ports/resolve.js';
import type { CapabilityFlags } from './capability-flags.js';
import { probe } from './capability-probe.js';

export interface ProbeCommandOptions {
  config?: string;
}

export interface ProbeServices {
  runner?: CommandRunner;
  platform?: SupportedPlatform;
  readTextFile?: (path: string) => Promise<string>;
}

export interface ProbeReport {
  flags: CapabilityFlags;
  /** Artifact the GPU build would use on this host */
  gpuArtifact: string;
  cpuArtifact: string;
  stagedCandidates: string[];
}

function toolLine(flags: CapabilityFlags, tool: ToolName): string {
  if (!flags.hasTool(tool)) {
    return `${TOOL_LABELS[tool]}: not found`;
  }
  const version = flags.toolVersion(tool);
  return `${TOOL_LABELS[tool]}: ${version ? `${version} ` : ''}(${flags.toolLocation(tool) ?? TOOL_LABELS[tool]})`;
}

const yesNo = (value: boolean) => (value ? 'yes' : 'no');

export function formatProbeReport(report: ProbeReport): string {
  return [
    ...TOOL_NAMES.map(tool => toolLine(report.flags, tool)),
    `AVX: ${yesNo(report.flags.hasAVX)}`,
    `SSE4: ${yesNo(report.flags.hasSSE4)}`,
    `Artifact (GPU): ${report.gpuArtifact}`,
    `Artifact (CPU): ${report.cpuArtifact}`,
    `Staged candidates: ${report.stagedCandidates.length > 0 ? report.stagedCandidates.join(', ') : 'none'}`
  ].join('\n');
}

export async function buildProbeReport(
  config: EnvstrapConfig,
  services: Required<Pick<ProbeServices, 'runner' | 'platform'>> & Pick<ProbeServices, 'readTextFile'>
): Promise<ProbeReport> {
  const flags = await probe({ config, ...services });
  const table = artifactTableFromConfig(config.artifact);
  return {
    flags,
    gpuArtifact: selectArtifactName(flags, { useGpuArtifact: true }, table),
    cpuArtifact: selectArtifactName(flags, { useGpuArtifact: false }, table),
    stagedCandidates: await listStagedCandidates(config.stagingDir, table)
  };
}

/**
 * `envstrap probe`: report what the installer would detect, without
 * changing anything.
 */
export async function runProbePipeline(
  options: ProbeCommandOptions,
  ctx: ExecutionContext,
  services: ProbeServices = {}
): Promise<CommandResult<ProbeReport>> {
  const platform = services.platform ?? currentPlatform();
  const config = await new ConfigManager({ cwd: ctx.cwd, configPath: options.config, platform }).load();

  const report = await buildProbeReport(config, {
    runner: services.runner ?? createProcessRunner(),
    platform,
    readTextFile: services.readTextFile
  });

  resolveOutput(ctx).note(formatProbeReport(report), `Host capabilities (${platform})`);
  return { success: true, data: report };
}
