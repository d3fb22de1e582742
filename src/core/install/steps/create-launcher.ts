import { stepOk } from '../../../utils/result.js';
import { writeActivationScript, writeDesktopShortcut } from '../../launcher/launcher-writer.js';
import type { PipelineStep } from '../pipeline-types.js';

export const createLauncherStep: PipelineStep = {
  name: 'CreateLauncher',
  description: 'Creating launcher',
  async run(ctx) {
    const { appName, environment, launcher, desktopDir } = ctx.config;
    const scriptPath = await writeActivationScript(ctx.plan, {
      appName,
      envName: environment.name,
      entryPoint: launcher.entryPoint,
      args: launcher.args,
      platform: ctx.platform
    });
    ctx.report(`Wrote ${scriptPath}`);

    const shortcut = await writeDesktopShortcut(scriptPath, {
      appName,
      desktopDir,
      workingDirectory: ctx.plan.targetDirectory,
      platform: ctx.platform,
      runner: ctx.runner,
      timeoutMs: ctx.config.commandTimeoutMs
    });
    if (shortcut.exitCode !== 0) {
      return shortcut;
    }
    ctx.report(shortcut.message);
    return stepOk(`Launcher ready: ${scriptPath}`);
  }
};
