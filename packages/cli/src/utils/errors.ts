/**
 * @module utils/errors
 * Custom error types for the CLI.
 *
 * All error classes extend `Error`, set `.name`, and preserve cause chains,
 * so the program can tell a user cancel from a real failure.
 */

// ---------------------------------------------------------------------------
// UserCancelledError: user explicitly cancelled a prompt
// ---------------------------------------------------------------------------

/**
 * Thrown when the user cancels or declines a `@clack/prompts` interaction.
 * The program reports it as an abort, not a crash.
 */
export class UserCancelledError extends Error {
  /** The command that was cancelled. */
  readonly command: string;

  constructor(command: string, message = 'Aborted.') {
    super(message);
    this.name = 'UserCancelledError';
    this.command = command;
  }
}

// ---------------------------------------------------------------------------
// UsageError: arguments that commander accepts but the command cannot use
// ---------------------------------------------------------------------------

export class UsageError extends Error {
  readonly command: string;
  override readonly cause?: Error;

  constructor(message: string, command: string, cause?: Error) {
    super(message, { cause });
    this.name = 'UsageError';
    this.command = command;
    this.cause = cause;
  }
}
