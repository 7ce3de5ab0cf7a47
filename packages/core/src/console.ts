/**
 * @module console
 * Status and progress output for shell operations.
 *
 * Messages may carry `<text style="…">` markup (see {@link renderMarkup}).
 * A line started with {@link Console.begin} stays open until the next
 * {@link Console.status}, which completes it with a dotted leader and a
 * label such as `[ OK ]`:
 *
 *   console.begin('Building');
 *   console.status('ok');
 *   // Building .................................................. [ OK ]
 */

import type { ChalkInstance } from 'chalk';

import type { ConsoleConfig, ShellkitConfig } from './config.js';
import { createPainter, renderMarkup, styled, visibleLength } from './markup.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StatusKind = 'ok' | 'pass' | 'warn' | 'fail' | 'skip';

export interface MessageOptions {
  /** Terminate the host process (exit code 1) after writing. */
  fatal?: boolean;
}

export interface BeginOptions {
  /** Fill the gap before the status label with dots instead of spaces. Default: true */
  dots?: boolean;
}

/** Minimal writable target; `process.stdout` satisfies it. */
export interface OutputStream {
  write(chunk: string): unknown;
}

export type ExitHook = (code: number) => never;

/** The part of {@link Console} that Shell relies on. */
export interface ShellConsole {
  readonly showCommands: boolean;
  readonly showOutputs: boolean;
  readonly skipCommands: boolean;
  readonly indentator: string;
  readonly indentLevel: number;
  write(message: string, opts?: MessageOptions): void;
  warn(message: string, opts?: MessageOptions): void;
  error(message: string, opts?: MessageOptions): void;
  begin(message: string, opts?: BeginOptions): void;
  status(kind: StatusKind, opts?: MessageOptions): boolean;
  echo(line: string): void;
  indentRegion<T>(depth: number, block: () => T): T;
  exit(code: number): never;
}

export interface ConsoleOptions extends Partial<ConsoleConfig> {
  /** Where output goes. Default: process.stdout */
  stream?: OutputStream;
  /** Called for fatal messages and aborts. Default: process.exit */
  exit?: ExitHook;
  indentLevel?: number;
}

const STATUS_LABELS: Record<StatusKind, { text: string; style: string }> = {
  ok: { text: '[ OK ]', style: 'bold green' },
  pass: { text: '[PASS]', style: 'bold cyan' },
  warn: { text: '[WARN]', style: 'bold yellow' },
  fail: { text: '[FAIL]', style: 'bold red' },
  skip: { text: '[SKIP]', style: 'bold gray' },
};

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

export class Console implements ShellConsole {
  showCommands: boolean;
  showOutputs: boolean;
  skipCommands: boolean;
  indentator: string;
  indentLevel: number;
  lineWidth: number;

  private readonly painter: ChalkInstance;
  private readonly stream: OutputStream;
  private readonly exitHook: ExitHook;
  /** Rendered text of an open `begin` line, if any. */
  private pending: { text: string; dots: boolean } | null = null;

  constructor(opts: ConsoleOptions = {}) {
    this.showCommands = opts.showCommands ?? false;
    this.showOutputs = opts.showOutputs ?? true;
    this.skipCommands = opts.skipCommands ?? false;
    this.indentator = opts.indentator ?? ' ';
    this.indentLevel = opts.indentLevel ?? 0;
    this.lineWidth = opts.lineWidth ?? 80;
    this.painter = createPainter(opts.color ?? true);
    this.stream = opts.stream ?? process.stdout;
    this.exitHook = opts.exit ?? ((code: number) => process.exit(code));
  }

  /** Build a Console from a loaded config. */
  static fromConfig(config: ShellkitConfig, opts: Omit<ConsoleOptions, keyof ConsoleConfig> = {}): Console {
    return new Console({ ...config.console, ...opts });
  }

  /** Current indentation prefix. */
  indentation(): string {
    return this.indentator.repeat(this.indentLevel);
  }

  /** Render markup with this console's colour setting. */
  render(message: string): string {
    return renderMarkup(message, this.painter);
  }

  write(message: string, opts: MessageOptions = {}): void {
    this.closePending();
    this.stream.write(`${this.indentation()}${this.render(message)}\n`);
    if (opts.fatal) this.exit(1);
  }

  warn(message: string, opts: MessageOptions = {}): void {
    this.write(`${styled('bold yellow', 'Warning:')} ${message}`, opts);
  }

  error(message: string, opts: MessageOptions = {}): void {
    this.write(`${styled('bold red', 'Error:')} ${message}`, opts);
  }

  /** Start a line that the next {@link status} call completes. */
  begin(message: string, opts: BeginOptions = {}): void {
    this.closePending();
    const text = `${this.indentation()}${this.render(message)}`;
    this.stream.write(text);
    this.pending = { text, dots: opts.dots ?? true };
  }

  /**
   * Print a status label, completing an open {@link begin} line or on a
   * line of its own (right-aligned to `lineWidth`).
   *
   * @returns `true` for `ok` and `pass`.
   */
  status(kind: StatusKind, opts: MessageOptions = {}): boolean {
    const label = STATUS_LABELS[kind];
    const painted = this.render(styled(label.style, label.text));

    if (this.pending) {
      const fill = Math.max(this.lineWidth - visibleLength(this.pending.text) - label.text.length - 2, 0);
      const leader = (this.pending.dots ? '.' : ' ').repeat(fill);
      this.stream.write(` ${leader} ${painted}\n`);
      this.pending = null;
    } else {
      const pad = Math.max(this.lineWidth - label.text.length, 0);
      this.stream.write(`${' '.repeat(pad)}${painted}\n`);
    }

    if (opts.fatal) this.exit(1);
    return kind === 'ok' || kind === 'pass';
  }

  /** Write a raw line of command output (no markup, no indentation). */
  echo(line: string): void {
    this.closePending();
    this.stream.write(`${line}\n`);
  }

  /** Run `block` with the indent level raised by `depth`. */
  indentRegion<T>(depth: number, block: () => T): T {
    this.indentLevel += depth;
    try {
      return block();
    } finally {
      this.indentLevel -= depth;
    }
  }

  exit(code: number): never {
    this.closePending();
    return this.exitHook(code);
  }

  private closePending(): void {
    if (!this.pending) return;
    this.stream.write('\n');
    this.pending = null;
  }
}
