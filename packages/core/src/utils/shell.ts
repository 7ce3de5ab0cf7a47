/**
 * @module utils/shell
 * Spawn a shell command with stderr merged into stdout and real-time line
 * streaming.
 */

import { spawn } from 'node:child_process';
import os from 'node:os';
import { createInterface } from 'node:readline';

export interface SpawnResult {
  /** Exit code; 128 + signal number when killed by a signal. */
  exitStatus: number;
  /** Output lines in arrival order, without line terminators. */
  lines: string[];
}

export interface SpawnOptions {
  /** Working directory. Default: process.cwd() */
  cwd?: string;
  /** Environment variables to merge with process.env. */
  env?: Record<string, string>;
  /** Called for every output line while the child is running. */
  onLine?: (line: string) => void;
  /** Interpreter used for `-c`. Default: /bin/sh */
  shell?: string;
}

/** Process-spawn capability consumed by Shell. */
export type SpawnCommand = (command: string, opts?: SpawnOptions) => Promise<SpawnResult>;

/** Exit status reported when the interpreter itself cannot be started. */
export const SPAWN_FAILURE_STATUS = 127;

function signalStatus(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

/**
 * Run `command` through `/bin/sh -c`, with the whole script's stderr
 * redirected into stdout so lines interleave in the order they were written.
 *
 * Never rejects: a spawn failure resolves with {@link SPAWN_FAILURE_STATUS}
 * and the error text as the only line.
 */
export function spawnMerged(command: string, opts: SpawnOptions = {}): Promise<SpawnResult> {
  const { cwd, env, onLine, shell = '/bin/sh' } = opts;

  return new Promise<SpawnResult>((resolve) => {
    const lines: string[] = [];
    let settled = false;

    const push = (line: string) => {
      lines.push(line);
      onLine?.(line);
    };

    const child = spawn(shell, ['-c', `exec 2>&1\n${command}`], {
      cwd,
      env: env ? { ...process.env, ...env } : undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // ── Line streaming ───────────────────────────────────────────────
    // stderr only carries what the interpreter prints before the redirect.
    createInterface({ input: child.stdout }).on('line', push);
    createInterface({ input: child.stderr }).on('line', push);

    // ── Exit handling ────────────────────────────────────────────────
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      resolve({ exitStatus: SPAWN_FAILURE_STATUS, lines: [...lines, err.message] });
    });

    child.on('close', (code, sig) => {
      if (settled) return;
      settled = true;
      resolve({
        exitStatus: code ?? (sig ? signalStatus(sig) : 1),
        lines,
      });
    });
  });
}
