import { join } from 'path';
import { minimatch } from 'minimatch';

import type { ArtifactConfig } from '../../types/index.js';
import { getDefaultConfig } from '../../constants/index.js';
import { FileSystemError } from '../../utils/errors.js';
import { exists, isDirectory, listFiles, renameFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { err, ok, type Result } from '../../utils/result.js';
import type { CapabilityFlags } from '../probe/capability-flags.js';
import type { InstallationPlan } from '../plan/installation-plan.js';

export type InstructionSet = 'avx' | 'sse4' | 'none';

/** Highest priority first; `none` always matches. */
export const INSTRUCTION_SET_PRIORITY: readonly InstructionSet[] = ['avx', 'sse4', 'none'];

export interface ArtifactNameTable {
  prefix: string;
  gpuSuffix: string;
  instructionSetSuffixes: Readonly<Record<InstructionSet, string>>;
  extension: string;
}

export function artifactTableFromConfig(config: ArtifactConfig): ArtifactNameTable {
  return {
    prefix: config.prefix,
    gpuSuffix: config.suffixes.gpu,
    instructionSetSuffixes: {
      avx: config.suffixes.avx,
      sse4: config.suffixes.sse4,
      none: config.suffixes.none
    },
    extension: config.extension
  };
}

export const DEFAULT_ARTIFACT_TABLE: ArtifactNameTable = artifactTableFromConfig(getDefaultConfig().artifact);

export function selectInstructionSet(flags: Pick<CapabilityFlags, 'hasAVX' | 'hasSSE4'>): InstructionSet {
  const supported: Record<InstructionSet, boolean> = {
    avx: flags.hasAVX,
    sse4: flags.hasSSE4,
    none: true
  };
  return INSTRUCTION_SET_PRIORITY.find(set => supported[set]) ?? 'none';
}

/**
 * Compute the artifact file name for this host. Pure: same inputs, same name.
 */
export function selectArtifactName(
  flags: Pick<CapabilityFlags, 'hasAVX' | 'hasSSE4'>,
  plan: Pick<InstallationPlan, 'useGpuArtifact'>,
  table: ArtifactNameTable = DEFAULT_ARTIFACT_TABLE
): string {
  const gpu = plan.useGpuArtifact ? table.gpuSuffix : '';
  const instructionSet = table.instructionSetSuffixes[selectInstructionSet(flags)];
  return `${table.prefix}${gpu}${instructionSet}.${table.extension}`;
}

/**
 * Rename the pre-staged generic artifact to its computed name.
 *
 * A file already carrying the final name (left by an earlier run) is accepted
 * as staged. Resolves with the final path.
 */
export async function stageArtifact(
  stagingDir: string,
  genericName: string,
  finalName: string
): Promise<Result<string, FileSystemError>> {
  const genericPath = join(stagingDir, genericName);
  const finalPath = join(stagingDir, finalName);

  if (genericName !== finalName && (await exists(genericPath))) {
    try {
      await renameFile(genericPath, finalPath);
    } catch (error) {
      return err(error instanceof FileSystemError
        ? error
        : new FileSystemError(`Failed to rename ${genericPath}`, { error }));
    }
    return ok(finalPath);
  }

  if (await exists(finalPath)) {
    logger.debug(`Artifact already staged as ${finalName}`);
    return ok(finalPath);
  }

  return err(new FileSystemError(`Staged artifact not found: ${genericPath}`, { stagingDir, genericName, finalName }));
}

/**
 * Artifact-looking files in the staging directory, sorted by name.
 */
export async function listStagedCandidates(
  stagingDir: string,
  table: ArtifactNameTable = DEFAULT_ARTIFACT_TABLE
): Promise<string[]> {
  if (!(await isDirectory(stagingDir))) {
    return [];
  }
  const pattern = `${table.prefix}*.${table.extension}`;
  const files = await listFiles(stagingDir);
  return files.filter(name => minimatch(name, pattern)).sort();
}
