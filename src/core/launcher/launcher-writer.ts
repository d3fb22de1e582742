/**
 * Launcher generation: an activation script in the target directory and a
 * desktop shortcut that points at it.
 */

import type { StepResult, SupportedPlatform } from '../../types/index.js';
import { SubprocessError } from '../../utils/errors.js';
import { writeTextFile } from '../../utils/fs.js';
import type { CommandRunner } from '../../utils/process.js';
import { pathFor } from '../../utils/paths.js';
import { stepFailed, stepOk } from '../../utils/result.js';
import type { InstallationPlan } from '../plan/installation-plan.js';
import { condaActivateScript } from '../environment/conda-paths.js';

export interface LauncherScriptOptions {
  appName: string;
  envName: string;
  entryPoint: string;
  args: readonly string[];
  platform: SupportedPlatform;
}

export interface RenderedFile {
  fileName: string;
  content: string;
}

const EXECUTABLE_MODE = 0o755;

function quote(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

function quoteArgs(args: readonly string[]): string {
  return args.map(arg => (/[\s"]/.test(arg) ? quote(arg) : arg)).join(' ');
}

function withArgs(command: string, args: string): string {
  return args ? `${command} ${args}` : command;
}

/**
 * Render the activation script: activate conda, activate the named
 * environment, then run the application's entry point.
 */
export function renderActivationScript(
  plan: Pick<InstallationPlan, 'environmentManagerRoot' | 'targetDirectory'>,
  options: LauncherScriptOptions
): RenderedFile {
  const p = pathFor(options.platform);
  const entry = p.join(plan.targetDirectory, options.entryPoint);
  const activate = condaActivateScript(plan.environmentManagerRoot, options.platform);
  const args = quoteArgs(options.args);

  if (options.platform === 'win32') {
    const lines = [
      '@echo off',
      `REM ${options.appName} launcher`,
      `call ${quote(activate)} ${quote(plan.environmentManagerRoot)}`,
      `call conda activate ${quote(options.envName)}`,
      withArgs(`python ${quote(entry)}`, args) + ' %*'
    ];
    return { fileName: `${options.appName}.bat`, content: lines.join('\r\n') + '\r\n' };
  }

  const lines = [
    '#!/usr/bin/env bash',
    `# ${options.appName} launcher`,
    `source ${quote(activate)}`,
    `conda activate ${quote(options.envName)}`,
    withArgs(`python ${quote(entry)}`, args) + ' "$@"'
  ];
  return { fileName: `${options.appName}.sh`, content: lines.join('\n') + '\n' };
}

/**
 * Write the activation script into the target directory; returns its path.
 */
export async function writeActivationScript(
  plan: Pick<InstallationPlan, 'environmentManagerRoot' | 'targetDirectory'>,
  options: LauncherScriptOptions
): Promise<string> {
  const rendered = renderActivationScript(plan, options);
  const scriptPath = pathFor(options.platform).join(plan.targetDirectory, rendered.fileName);
  await writeTextFile(scriptPath, rendered.content, {
    mode: options.platform === 'win32' ? undefined : EXECUTABLE_MODE
  });
  return scriptPath;
}

export interface ShortcutOptions {
  appName: string;
  desktopDir: string;
  workingDirectory: string;
  platform: SupportedPlatform;
  runner: CommandRunner;
  timeoutMs?: number;
}

export function renderLinuxDesktopEntry(scriptPath: string, options: Pick<ShortcutOptions, 'appName' | 'workingDirectory'>): RenderedFile {
  const lines = [
    '[Desktop Entry]',
    'Type=Application',
    `Name=${options.appName}`,
    `Exec=${quote(scriptPath)}`,
    `Path=${options.workingDirectory}`,
    'Terminal=true'
  ];
  return { fileName: `${options.appName}.desktop`, content: lines.join('\n') + '\n' };
}

export function renderMacCommandFile(scriptPath: string, appName: string): RenderedFile {
  const lines = ['#!/usr/bin/env bash', `exec ${quote(scriptPath)} "$@"`];
  return { fileName: `${appName}.command`, content: lines.join('\n') + '\n' };
}

function powershellLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderWindowsShortcutScript(scriptPath: string, shortcutPath: string, workingDirectory: string): string {
  return [
    `$s = (New-Object -ComObject WScript.Shell).CreateShortcut(${powershellLiteral(shortcutPath)})`,
    `$s.TargetPath = ${powershellLiteral(scriptPath)}`,
    `$s.WorkingDirectory = ${powershellLiteral(workingDirectory)}`,
    '$s.Save()'
  ].join('; ');
}

/**
 * Place a desktop shortcut for the activation script.
 */
export async function writeDesktopShortcut(scriptPath: string, options: ShortcutOptions): Promise<StepResult> {
  const p = pathFor(options.platform);

  switch (options.platform) {
    case 'linux': {
      const entry = renderLinuxDesktopEntry(scriptPath, options);
      const entryPath = p.join(options.desktopDir, entry.fileName);
      await writeTextFile(entryPath, entry.content, { mode: EXECUTABLE_MODE });
      return stepOk(`Created desktop shortcut ${entryPath}`);
    }
    case 'darwin': {
      const command = renderMacCommandFile(scriptPath, options.appName);
      const commandPath = p.join(options.desktopDir, command.fileName);
      await writeTextFile(commandPath, command.content, { mode: EXECUTABLE_MODE });
      return stepOk(`Created desktop shortcut ${commandPath}`);
    }
    case 'win32': {
      const shortcutPath = p.join(options.desktopDir, `${options.appName}.lnk`);
      const result = await options.runner.run(
        'powershell.exe',
        [
          '-NoProfile',
          '-NonInteractive',
          '-Command',
          renderWindowsShortcutScript(scriptPath, shortcutPath, options.workingDirectory)
        ],
        { timeoutMs: options.timeoutMs }
      );
      if (result.exitCode !== 0) {
        return stepFailed(new SubprocessError('shortcut creation', result.exitCode, result.stderr).message, result.exitCode);
      }
      return stepOk(`Created desktop shortcut ${shortcutPath}`);
    }
  }
}
