import type { PipelineStep } from '../pipeline-types.js';
import { installPrerequisitesStep } from './install-prerequisites.js';
import { cloneSourceStep } from './clone-source.js';
import { provisionEnvironmentStep } from './provision-environment.js';
import { installArtifactStep } from './install-artifact.js';
import { runSetupStep } from './run-setup.js';
import { createLauncherStep } from './create-launcher.js';

export {
  installPrerequisitesStep,
  cloneSourceStep,
  provisionEnvironmentStep,
  installArtifactStep,
  runSetupStep,
  createLauncherStep
};

/** Fixed step order; each step assumes every earlier one succeeded. */
export const DEFAULT_PIPELINE: readonly PipelineStep[] = Object.freeze([
  installPrerequisitesStep,
  cloneSourceStep,
  provisionEnvironmentStep,
  installArtifactStep,
  runSetupStep,
  createLauncherStep
]);
