/**
 * @module logger
 * Logger interface (swappable by consumers) and the console-backed default.
 *
 * This is diagnostic logging for library internals. User-facing status and
 * progress output goes through {@link Console} instead.
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Minimal console-based logger with level filtering.
 * Used as the default when no custom logger is supplied.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly debugEnabled: boolean = false,
    private readonly scope = 'shellkit',
  ) { }
  debug(msg: string, ...args: unknown[]) {
    if (this.debugEnabled) console.debug(`[debug] ${this.scope}: ${msg}`, ...args);
  }
  info(msg: string, ...args: unknown[]) {
    console.info(`[info]  ${this.scope}: ${msg}`, ...args);
  }
  warn(msg: string, ...args: unknown[]) {
    console.warn(`[warn]  ${this.scope}: ${msg}`, ...args);
  }
  error(msg: string, ...args: unknown[]) {
    console.error(`[error] ${this.scope}: ${msg}`, ...args);
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug() { },
  info() { },
  warn() { },
  error() { },
};
