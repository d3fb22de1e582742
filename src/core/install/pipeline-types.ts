import type { EnvstrapConfig, StepResult, SupportedPlatform } from '../../types/index.js';
import type { PipelineStepName } from '../../constants/index.js';
import type { CommandRunner } from '../../utils/process.js';
import type { Downloader } from '../../utils/download.js';
import type { CapabilityFlags } from '../probe/capability-flags.js';
import type { InstallationPlan } from '../plan/installation-plan.js';

/**
 * Everything a pipeline step may read. Steps never mutate it; the only
 * output channel besides the StepResult is `report`.
 */
export interface PipelineContext {
  readonly plan: InstallationPlan;
  readonly flags: CapabilityFlags;
  readonly config: EnvstrapConfig;
  readonly platform: SupportedPlatform;
  readonly runner: CommandRunner;
  readonly downloader: Downloader;
  report(line: string): void;
}

export interface PipelineStep {
  name: PipelineStepName;
  description: string;
  run(ctx: PipelineContext): Promise<StepResult>;
}

/**
 * Final outcome of an orchestrator run.
 */
export interface RunOutcome extends StepResult {
  success: boolean;
  cancelled: boolean;
  /** Failing step, or the last step run on success; null if nothing ran */
  step: PipelineStepName | null;
  completedSteps: readonly PipelineStepName[];
  progress: readonly string[];
}
