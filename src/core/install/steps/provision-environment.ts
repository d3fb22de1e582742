import { ensureEnvironment } from '../../environment/environment-manager.js';
import type { PipelineStep } from '../pipeline-types.js';

export const provisionEnvironmentStep: PipelineStep = {
  name: 'ProvisionEnvironment',
  description: 'Provisioning conda environment',
  run(ctx) {
    const { name, runtime } = ctx.config.environment;
    return ensureEnvironment(ctx.plan, name, runtime, {
      runner: ctx.runner,
      platform: ctx.platform,
      timeoutMs: ctx.config.commandTimeoutMs,
      report: line => ctx.report(line)
    });
  }
};
