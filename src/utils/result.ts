/**
 * Minimal Result type and step sequencing helpers.
 *
 * Pipeline steps return a StepResult; `runOrAbort` chains them so that each
 * step only starts once every earlier step has reported exit code 0.
 */

import type { StepResult } from '../types/index.js';

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function stepOk(message: string): StepResult {
  return { exitCode: 0, message };
}

export function stepFailed(message: string, exitCode: number = 1): StepResult {
  return { exitCode: exitCode === 0 ? 1 : exitCode, message };
}

export function isStepSuccess(result: StepResult): boolean {
  return result.exitCode === 0;
}

export type StepThunk = () => Promise<StepResult>;

/**
 * Run thunks in order and stop at the first non-zero result, which is returned.
 * When all succeed, the last result is returned (or `onEmpty` for no thunks).
 */
export async function runOrAbort(
  thunks: readonly StepThunk[],
  onEmpty: StepResult = stepOk('Nothing to do')
): Promise<StepResult> {
  let last = onEmpty;
  for (const thunk of thunks) {
    last = await thunk();
    if (!isStepSuccess(last)) {
      return last;
    }
  }
  return last;
}
