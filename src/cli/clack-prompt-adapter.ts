/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for rich interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, TextPromptOptions } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function cancelled(): never {
  clack.cancel('Operation cancelled.');
  throw new UserCancellationError('Operation cancelled by user');
}

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      if (clack.isCancel(result)) {
        return cancelled();
      }
      return result;
    },

    async text(
      message: string,
      options?: TextPromptOptions
    ): Promise<string> {
      const validate = options?.validate;
      const result = await clack.text({
        message,
        placeholder: options?.placeholder,
        initialValue: options?.initial,
        validate: validate ? (value: string) => validate(value ?? '') : undefined,
      });
      if (clack.isCancel(result)) {
        return cancelled();
      }
      return result;
    },
  };
}
