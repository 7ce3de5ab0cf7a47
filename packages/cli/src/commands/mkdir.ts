/**
 * @module commands/mkdir
 * `shellkit mkdir <paths...> [--mode <octal>] [--fatal]`
 */

import type { Shell } from '@shellkit/core';

export interface MkdirCommandOptions {
  mode?: number;
  fatal?: boolean;
}

export function cmdMkdir(shell: Shell, paths: string[], opts: MkdirCommandOptions = {}): number {
  const ok = shell.createDirectories({ paths, mode: opts.mode, showErrors: true, fatal: opts.fatal ?? false });
  return ok ? 0 : 1;
}
