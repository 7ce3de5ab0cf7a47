/**
 * @module commands/rename
 * `shellkit rename <source> <destination>`
 */

import type { Shell } from '@shellkit/core';

export function cmdRename(shell: Shell, source: string, destination: string, opts: { fatal?: boolean } = {}): number {
  return shell.rename({ source, destination, showErrors: true, fatal: opts.fatal ?? false }) ? 0 : 1;
}
