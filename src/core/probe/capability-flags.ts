import type { ToolName } from '../../types/index.js';

/**
 * A detected tool: where it answered the version query and what it reported.
 */
export interface ToolDetection {
  location: string;
  version?: string;
}

export interface CpuFeatures {
  hasAVX: boolean;
  hasSSE4: boolean;
}

/**
 * Read-only facts about the host, produced once by the capability probe.
 */
export interface CapabilityFlags extends Readonly<CpuFeatures> {
  hasTool(name: ToolName): boolean;
  toolVersion(name: ToolName): string | undefined;
  /** Command path (git) or installation root (conda) that answered the probe */
  toolLocation(name: ToolName): string | undefined;
}

export interface CapabilityFlagsInput extends CpuFeatures {
  tools: Partial<Record<ToolName, ToolDetection>>;
}

export function createCapabilityFlags(input: CapabilityFlagsInput): CapabilityFlags {
  const tools = new Map<ToolName, ToolDetection>();
  for (const [name, detection] of Object.entries(input.tools)) {
    if (detection && (name === 'version-control' || name === 'environment-manager')) {
      tools.set(name, { ...detection });
    }
  }

  return Object.freeze({
    hasAVX: input.hasAVX,
    hasSSE4: input.hasSSE4,
    hasTool: (name: ToolName) => tools.has(name),
    toolVersion: (name: ToolName) => tools.get(name)?.version,
    toolLocation: (name: ToolName) => tools.get(name)?.location
  });
}
