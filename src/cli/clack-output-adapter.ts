/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for rich interactive terminal UI. Non-interactive sessions get plain
 * console lines colored with picocolors and an ora spinner.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import pico from 'picocolors';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        fail(finalMessage: string) {
          if (isStarted) {
            // clack renders stop codes above 1 with its error symbol
            s.stop(finalMessage, 2);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 */
export function createPlainOutput(): OutputPort {
  return {
    success(message: string): void {
      console.log(pico.green(`✓ ${message}`));
    },

    error(message: string): void {
      console.error(pico.red(`✗ ${message}`));
    },

    warn(message: string): void {
      console.warn(pico.yellow(`⚠ ${message}`));
    },

    note(content: string, title?: string): void {
      if (title) {
        console.log(`\n${pico.bold(title)}\n${content}`);
      } else {
        console.log(`\n${content}`);
      }
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            if (finalMessage) {
              s.succeed(finalMessage);
            } else {
              s.stop();
            }
            s = null;
          }
        },
        fail(finalMessage: string) {
          if (s) {
            s.fail(finalMessage);
            s = null;
          }
        },
        message(text: string) {
          if (s) {
            s.update(text);
          }
        },
      };
    },
  };
}
