/**
 * @module commands/remove
 * `shellkit rm <paths...> [--yes] [--fatal]`: Delete files and directory trees.
 *
 * Asks for confirmation unless `--yes` is given or the run is a dry-run.
 */

import type { Shell } from '@shellkit/core';

import type { ConfirmPrompt } from '../ui/prompts.js';
import { UserCancelledError } from '../utils/errors.js';

export interface RemoveCommandOptions {
  yes?: boolean;
  fatal?: boolean;
}

export async function cmdRemove(
  shell: Shell,
  paths: string[],
  opts: RemoveCommandOptions,
  confirm: ConfirmPrompt,
): Promise<number> {
  if (!opts.yes && !shell.console.skipCommands) {
    const noun = paths.length === 1 ? paths[0] : `${paths.length} entries`;
    if (!(await confirm(`Remove ${noun}?`))) throw new UserCancelledError('rm');
  }
  return shell.deleteFiles({ paths, showErrors: true, fatal: opts.fatal ?? false }) ? 0 : 1;
}
