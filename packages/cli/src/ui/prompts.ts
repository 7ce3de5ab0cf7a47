/**
 * @module ui/prompts
 * @clack/prompts wrappers. Commands use these instead of raw clack calls so
 * cancellation behaves the same everywhere.
 */

import * as clack from '@clack/prompts';

import { UserCancelledError } from '../utils/errors.js';

/** Yes/no question; resolves `true` for yes. */
export type ConfirmPrompt = (message: string) => Promise<boolean>;

/**
 * Unwrap a clack result: throws {@link UserCancelledError} on cancel.
 */
export function unwrapCancel<T>(value: T | symbol, command: string): T {
  if (clack.isCancel(value)) throw new UserCancelledError(command);
  return value;
}

/** Ask with clack, defaulting to "no". Ctrl-C throws {@link UserCancelledError}. */
export async function confirmAction(message: string): Promise<boolean> {
  const answer = await clack.confirm({ message, initialValue: false });
  return unwrapCancel(answer, 'confirm');
}
