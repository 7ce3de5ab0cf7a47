/**
 * In-memory Console for tests: colour off, output captured, exit hook
 * throwing {@link ExitCalled} instead of ending the process.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { Console, type ConsoleOptions } from '../console.js';

export class ExitCalled extends Error {
  readonly code: number;

  constructor(code: number) {
    super(`exit(${code})`);
    this.name = 'ExitCalled';
    this.code = code;
  }
}

export interface CapturedConsole {
  console: Console;
  /** Everything written so far. */
  output(): string;
  /** Written lines, without the final empty one. */
  lines(): string[];
}

export function captureConsole(opts: Omit<ConsoleOptions, 'stream' | 'exit'> = {}): CapturedConsole {
  const chunks: string[] = [];
  const console = new Console({
    color: false,
    ...opts,
    stream: { write: (chunk: string) => chunks.push(chunk) },
    exit: (code) => {
      throw new ExitCalled(code);
    },
  });
  const output = () => chunks.join('');
  return {
    console,
    output,
    lines: () => output().split('\n').slice(0, -1),
  };
}

/** `[FAIL]` right-aligned on an 80-column line. */
export const FAIL_LINE = `${' '.repeat(74)}[FAIL]`;

/** Error shaped like the ones node:fs throws. */
export function errno(code: string, message: string, target?: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code, path: target });
}

/** Fresh directory under the OS temp dir. */
export function makeTempDir(prefix = 'shellkit-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
