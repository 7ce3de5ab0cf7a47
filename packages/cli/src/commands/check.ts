/**
 * @module commands/check
 * `shellkit check <path> [--test <name...>]`: Print whether every check holds.
 */

import type { Shell } from '@shellkit/core';

export interface CheckCommandOptions {
  /** FILE_CHECKS names. Default: exists */
  test?: string[];
}

export function cmdCheck(shell: Shell, target: string, opts: CheckCommandOptions = {}): number {
  const ok = shell.fileCheck({ path: target, predicates: opts.test });
  shell.console.echo(String(ok));
  return ok ? 0 : 1;
}
