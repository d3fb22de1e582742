import { EnvstrapError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the envstrap CLI
 */

export class FileSystemError extends EnvstrapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends EnvstrapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends EnvstrapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * A network fetch of an installer did not complete.
 */
export class DownloadError extends EnvstrapError {
  constructor(url: string, reason: string) {
    super(`Download of ${url} failed: ${reason}`, ErrorCodes.DOWNLOAD_FAILED, { url, reason });
    this.name = 'DownloadError';
  }
}

/**
 * An external program exited non-zero.
 */
export class SubprocessError extends EnvstrapError {
  public readonly exitCode: number;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim() ? `: ${lastLines(stderr, 5)}` : '';
    super(`${command} exited with code ${exitCode}${detail}`, ErrorCodes.SUBPROCESS_FAILED, { command, exitCode });
    this.name = 'SubprocessError';
    this.exitCode = exitCode;
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

function lastLines(text: string, count: number): string {
  return text.trim().split(/\r?\n/).slice(-count).join('\n');
}

/**
 * Exit code carried by an error, 1 when it has none.
 */
export function exitCodeOf(error: unknown): number {
  if (error instanceof SubprocessError && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof EnvstrapError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // User cancellation exits quietly
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(exitCodeOf(error));
    }
  };
}
