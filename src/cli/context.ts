/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations
 * (Clack output and prompts in a TTY, plain lines and an ora spinner otherwise).
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

/** Options registered on the root program. */
export interface GlobalOptions {
  cwd?: string;
  verbose?: boolean;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  cachedPlainOutput ??= createPlainOutput();
  return { output: cachedPlainOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 */
export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const interactive = detectInteractive(options.interactive);
  const ctx = await createExecutionContext({ ...options, interactive });
  const ports = getCliPorts(interactive);

  ctx.output = ports.output;
  ctx.prompt = ports.prompt;

  return ctx;
}
