/**
 * Prompt Port Interface
 *
 * Defines the contract for all interactive user prompts.
 * Core logic never prompts on its own; the install command asks through
 * this port and passes the answers to the plan builder.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI): routes to @clack/prompts
 *   - nonInteractivePrompt (CI/default): throws on prompt attempts
 */

/**
 * Options for text input prompts.
 */
export interface TextPromptOptions {
  initial?: string;
  placeholder?: string;
  validate?: (value: string) => string | undefined;
}

/**
 * PromptPort defines all interactive prompt operations.
 */
export interface PromptPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;

  /** Prompt user for text input */
  text(
    message: string,
    options?: TextPromptOptions
  ): Promise<string>;
}
