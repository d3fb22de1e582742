/**
 * Process boundary for every external program the installer drives
 * (git, conda, installers, the downstream setup script).
 *
 * `run` resolves with the exit code and captured output instead of rejecting,
 * so callers decide what a non-zero exit means.
 */

import { execFile, type ExecFileException } from 'child_process';
import { constants } from 'os';
import { logger } from './logger.js';

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the process after this many milliseconds. Unset means wait forever. */
  timeoutMs?: number;
  /** Largest stdout or stderr accepted before the process is killed */
  maxBufferBytes?: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandOutput>;
}

/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Exit code reported when the program was killed by the timeout. */
export const TIMEOUT_EXIT_CODE = 124;

/** Exit code reported when the program printed more than the buffer limit. */
export const OUTPUT_LIMIT_EXIT_CODE = 1;

const MAX_BUFFER = 64 * 1024 * 1024;

const MAX_BUFFER_ERROR = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

/** Shell convention: 128 plus the signal number. */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  const entry: [string, unknown] | undefined = Object.entries(constants.signals).find(([name]) => name === signal);
  const number = entry?.[1];
  return 128 + (typeof number === 'number' ? number : 0);
}

function exitCodeFromError(error: ExecFileException): number {
  if (error.code === MAX_BUFFER_ERROR) {
    return OUTPUT_LIMIT_EXIT_CODE;
  }
  if (typeof error.code === 'number') {
    return error.code;
  }
  // only the timeout kills the child once the buffer case is ruled out
  if (error.killed) {
    return TIMEOUT_EXIT_CODE;
  }
  if (error.signal) {
    return exitCodeForSignal(error.signal);
  }
  return SPAWN_FAILURE_EXIT_CODE;
}

// Node refuses to spawn batch files without a shell on Windows
function needsShell(command: string): boolean {
  return process.platform === 'win32' && /\.(bat|cmd)$/i.test(command);
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (/\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}

export function createProcessRunner(defaults: RunOptions = {}): CommandRunner {
  return {
    run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandOutput> {
      const timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
      logger.debug(`Running: ${formatCommand(command, args)}`, options.cwd ? { cwd: options.cwd } : undefined);

      return new Promise(resolve => {
        execFile(
          command,
          args,
          {
            cwd: options.cwd ?? defaults.cwd,
            env: options.env ?? defaults.env ?? process.env,
            encoding: 'utf8',
            maxBuffer: options.maxBufferBytes ?? defaults.maxBufferBytes ?? MAX_BUFFER,
            timeout: timeoutMs ?? 0,
            windowsHide: true,
            shell: needsShell(command)
          },
          (error, stdout, stderr) => {
            if (!error) {
              resolve({ exitCode: 0, stdout, stderr });
              return;
            }
            const exitCode = exitCodeFromError(error);
            logger.debug(`Command exited with ${exitCode}: ${command}`, { message: error.message });
            resolve({
              exitCode,
              stdout: stdout ?? '',
              stderr: error.code === MAX_BUFFER_ERROR || !stderr ? error.message : stderr
            });
          }
        );
      });
    }
  };
}
