/**
 * Execution Context Module
 *
 * Resolves and validates the working directory a command runs against.
 */

import { resolve } from 'path';
import { stat } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * `--cwd` resolves against process.cwd(); without it the process
 * working directory is used as is.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const cwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  const stats = await stat(cwd).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new ValidationError(`Working directory does not exist or is not a directory: ${cwd}`);
  }

  const context: ExecutionContext = {
    cwd,
    interactive: options.interactive ?? false
  };

  logger.debug('Created execution context', { cwd });
  return context;
}
