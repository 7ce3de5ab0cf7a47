/**
 * @module commands/copy
 * `shellkit cp|mv <sources...> <destination> [--into] [--fatal]`
 *
 * One source copies a single file unless `--into` is given; several sources
 * always go into the destination directory.
 */

import type { Shell } from '@shellkit/core';

import { UsageError } from '../utils/errors.js';

export interface CopyCommandOptions {
  into?: boolean;
  fatal?: boolean;
}

export function cmdCopy(shell: Shell, args: string[], opts: CopyCommandOptions, move: boolean): number {
  const name = move ? 'mv' : 'cp';
  const destination = args.at(-1);
  const sources = args.slice(0, -1);
  const [first] = sources;
  if (destination === undefined || first === undefined) {
    throw new UsageError(`${name} needs at least one source and a destination`, name);
  }

  const ok = shell.copy({
    paths: sources.length === 1 ? first : sources,
    destination,
    move,
    destinationIsDirectory: (opts.into ?? false) || sources.length > 1,
    showErrors: true,
    fatal: opts.fatal ?? false,
  });
  return ok ? 0 : 1;
}
