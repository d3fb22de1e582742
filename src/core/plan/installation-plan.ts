import type { ToolName } from '../../types/index.js';

/**
 * The decision record for one run, built before any installation action.
 * Frozen on creation and shared read-only by every pipeline step.
 */
export interface InstallationPlan {
  installTool(name: ToolName): boolean;
  readonly toolsToInstall: readonly ToolName[];
  readonly environmentManagerRoot: string;
  /** git command used by CloneSource (detected path, or where the installer puts it) */
  readonly versionControlCommand: string;
  readonly useGpuArtifact: boolean;
  readonly targetDirectory: string;
  /** Diagnostic notes gathered while planning, e.g. a rejected custom path */
  readonly notes: readonly string[];
}

export interface InstallationPlanFields {
  toolsToInstall: readonly ToolName[];
  environmentManagerRoot: string;
  versionControlCommand: string;
  useGpuArtifact: boolean;
  targetDirectory: string;
  notes?: readonly string[];
}

export function createInstallationPlan(fields: InstallationPlanFields): InstallationPlan {
  const toolsToInstall = Object.freeze([...new Set(fields.toolsToInstall)]);
  const notes = Object.freeze([...(fields.notes ?? [])]);

  return Object.freeze({
    installTool: (name: ToolName) => toolsToInstall.includes(name),
    toolsToInstall,
    environmentManagerRoot: fields.environmentManagerRoot,
    versionControlCommand: fields.versionControlCommand,
    useGpuArtifact: fields.useGpuArtifact,
    targetDirectory: fields.targetDirectory,
    notes
  });
}
