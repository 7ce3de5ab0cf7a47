/**
 * @module commands/find
 * `shellkit find <paths...> (--pattern <re...> | --ext <ext...>)`: Print
 * matching paths, one per line.
 */

import type { Shell } from '@shellkit/core';

import { UsageError } from '../utils/errors.js';

export interface FindCommandOptions {
  pattern?: string[];
  ext?: string[];
}

export function cmdFind(shell: Shell, paths: string[], opts: FindCommandOptions): number {
  if (Boolean(opts.pattern) === Boolean(opts.ext)) {
    throw new UsageError('find needs exactly one of --pattern or --ext', 'find');
  }
  const matches = opts.ext
    ? shell.findByExtension(paths, opts.ext)
    : shell.findByPattern(paths, opts.pattern ?? []);

  for (const match of matches) shell.console.echo(match);
  return 0;
}
