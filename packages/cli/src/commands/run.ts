/**
 * @module commands/run
 * `shellkit run <command...> [--fatal]`: Run a command with progress output.
 */

import type { Shell } from '@shellkit/core';

export interface RunCommandOptions {
  fatal?: boolean;
}

export async function cmdRun(shell: Shell, words: string[], opts: RunCommandOptions = {}): Promise<number> {
  const { exitStatus } = await shell.run({
    command: words.join(' '),
    announceBefore: true,
    reportExitStatus: true,
    abortOnFailure: opts.fatal ?? false,
  });
  return exitStatus === 0 ? 0 : 1;
}
