/**
 * Installation Orchestrator
 *
 * Runs the fixed pipeline against one immutable plan. Steps run strictly in
 * order; the first non-zero result ends the run and nothing is rolled back.
 */

import type { EnvstrapConfig, StepResult, SupportedPlatform } from '../../types/index.js';
import { CANCELLED_EXIT_CODE, currentPlatform, type PipelineStepName } from '../../constants/index.js';
import type { CommandRunner } from '../../utils/process.js';
import type { Downloader } from '../../utils/download.js';
import { logger } from '../../utils/logger.js';
import { isStepSuccess, runOrAbort, stepFailed, stepOk } from '../../utils/result.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import type { CapabilityFlags } from '../probe/capability-flags.js';
import type { InstallationPlan } from '../plan/installation-plan.js';
import type { PipelineContext, PipelineStep, RunOutcome } from './pipeline-types.js';
import { ProgressLog } from './progress-log.js';
import { DEFAULT_PIPELINE } from './steps/index.js';

export interface OrchestratorOptions {
  config: EnvstrapConfig;
  flags: CapabilityFlags;
  runner: CommandRunner;
  downloader: Downloader;
  platform?: SupportedPlatform;
  output?: OutputPort;
  steps?: readonly PipelineStep[];
  /** Asked before each step; resolving false cancels the run */
  beforeStep?: (step: PipelineStepName) => Promise<boolean>;
  /** True once the user has interrupted; a step failing after that counts as cancelled */
  isInterrupted?: () => boolean;
}

interface RunState {
  current: PipelineStepName | null;
  cancelled: boolean;
  completedSteps: PipelineStepName[];
}

export class InstallationOrchestrator {
  private readonly platform: SupportedPlatform;
  private readonly output: OutputPort;
  private readonly steps: readonly PipelineStep[];

  constructor(private readonly options: OrchestratorOptions) {
    this.platform = options.platform ?? currentPlatform();
    this.output = resolveOutput(options);
    this.steps = options.steps ?? DEFAULT_PIPELINE;
  }

  async run(plan: InstallationPlan): Promise<RunOutcome> {
    const progress = new ProgressLog(line => logger.info(line));
    const state: RunState = { current: null, cancelled: false, completedSteps: [] };

    const ctx: PipelineContext = {
      plan,
      flags: this.options.flags,
      config: this.options.config,
      platform: this.platform,
      runner: this.options.runner,
      downloader: this.options.downloader,
      report: line => progress.append(line)
    };

    const thunks = this.steps.map(step => async (): Promise<StepResult> => {
      if (this.options.beforeStep && !(await this.options.beforeStep(step.name))) {
        state.cancelled = true;
        state.current = step.name;
        return stepFailed(`Installation cancelled before ${step.name}`, CANCELLED_EXIT_CODE);
      }
      state.current = step.name;
      const result = await this.runStep(step, ctx);
      progress.append(`${step.name}: ${result.message}`);
      if (isStepSuccess(result)) {
        state.completedSteps.push(step.name);
        return result;
      }
      if (this.options.isInterrupted?.()) {
        state.cancelled = true;
        return stepFailed(`Installation cancelled during ${step.name}`, CANCELLED_EXIT_CODE);
      }
      return result;
    });

    const result = await runOrAbort(thunks, stepOk('No steps to run'));
    const success = isStepSuccess(result);

    const outcome: RunOutcome = {
      success,
      cancelled: state.cancelled,
      exitCode: result.exitCode,
      message: result.message,
      step: state.current,
      completedSteps: Object.freeze([...state.completedSteps]),
      progress: progress.entries()
    };

    this.notify(outcome);
    return outcome;
  }

  private async runStep(step: PipelineStep, ctx: PipelineContext): Promise<StepResult> {
    const spinner = this.output.spinner();
    spinner.start(step.description);
    const reporting: PipelineContext = {
      ...ctx,
      report: line => {
        ctx.report(line);
        spinner.message(line);
      }
    };

    let result: StepResult;
    try {
      result = await step.run(reporting);
    } catch (error) {
      logger.debug(`Step ${step.name} threw`, error);
      result = stepFailed(error instanceof Error ? error.message : String(error));
    }

    if (isStepSuccess(result)) {
      spinner.stop(result.message);
    } else {
      spinner.fail(`${step.description} failed`);
    }
    return result;
  }

  // Exactly one terminal notification per run
  private notify(outcome: RunOutcome): void {
    if (outcome.success) {
      this.output.success('Installation complete');
      return;
    }
    if (outcome.cancelled) {
      this.output.error(outcome.message);
      return;
    }

    const lines = [`Installation failed at ${outcome.step ?? 'startup'}: ${outcome.message}`];
    if (outcome.completedSteps.length > 0) {
      lines.push(`Completed steps were not rolled back: ${outcome.completedSteps.join(', ')}`);
    }
    this.output.error(lines.join('\n'));
  }
}
