/**
 * Execution Context Types
 *
 * Carries the working directory and the presentation-layer ports that
 * a command hands down to core logic.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

export interface ExecutionContext {
  /**
   * Absolute path to the working directory. Relative paths given on the
   * command line (--target, --config) resolve against it.
   */
  cwd: string;

  /**
   * True when the session may prompt (TTY, not CI).
   */
  interactive: boolean;

  /**
   * Output port for all user-facing messages.
   * Defaults to consoleOutput when not provided.
   */
  output?: OutputPort;

  /**
   * Prompt port for interactive questions.
   * Defaults to nonInteractivePrompt (throws) when not provided.
   */
  prompt?: PromptPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** --cwd flag: explicit working directory */
  cwd?: string;

  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}
