/**
 * @module errors
 * Error types and failure classification for shell and filesystem operations.
 *
 * Shell methods never let an I/O error escape: they turn it into a
 * {@link Failure} with {@link classifyFailure}, report it through the Console
 * and return `false`. Error classes here are for configuration and option
 * parsing, which do throw.
 */

// ---------------------------------------------------------------------------
// ValidationError: config or option structure failed to parse
// ---------------------------------------------------------------------------

/**
 * Thrown when a configuration layer or a parsed option fails validation.
 * Carries the offending field and value for diagnostics.
 */
export class ValidationError extends Error {
  /** Dotted path of the field that failed validation. */
  readonly field: string;
  /** The value that was invalid (serialized for safety). */
  readonly value?: string;
  override readonly cause?: Error;

  constructor(message: string, field: string, value?: unknown, cause?: Error) {
    super(message, { cause });
    this.name = 'ValidationError';
    this.field = field;
    this.value = value !== undefined ? String(value) : undefined;
    this.cause = cause;
  }
}

// ---------------------------------------------------------------------------
// Failure classification
// ---------------------------------------------------------------------------

export type Failure =
  | { kind: 'permission-denied'; target: string; message: string }
  | { kind: 'not-found'; target: string; message: string }
  | { kind: 'usage'; message: string }
  | { kind: 'unknown'; message: string };

export type FailureKind = Failure['kind'];

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const NOT_FOUND_CODES = new Set(['ENOENT']);

/** Message forms used when an error carries no errno code. */
const PERMISSION_PATTERNS = [
  /^Permission denied - (.+)$/,
  /^EACCES: permission denied, \w+ '([^']+)'/,
  /^EPERM: operation not permitted, \w+ '([^']+)'/,
];
const NOT_FOUND_PATTERNS = [
  /^No such file or directory - (.+)$/,
  /^ENOENT: no such file or directory, \w+ '([^']+)'/,
];

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/** Raw text of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function matchTarget(message: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const m = pattern.exec(message);
    if (m?.[1]) return m[1];
  }
  return null;
}

/**
 * Classify a thrown value into a {@link Failure}.
 *
 * Node's errno errors are read structurally (`code`, `path`); only when no
 * code is present is the message matched against the known text forms.
 *
 * @param fallbackTarget Used as the target when the error names no path.
 */
export function classifyFailure(err: unknown, fallbackTarget = ''): Failure {
  const message = errorMessage(err);

  if (isErrnoException(err)) {
    const target = err.path ?? matchTarget(message, [...PERMISSION_PATTERNS, ...NOT_FOUND_PATTERNS]) ?? fallbackTarget;
    if (err.code && PERMISSION_CODES.has(err.code)) return { kind: 'permission-denied', target, message };
    if (err.code && NOT_FOUND_CODES.has(err.code)) return { kind: 'not-found', target, message };
    return { kind: 'unknown', message };
  }

  const denied = matchTarget(message, PERMISSION_PATTERNS);
  if (denied !== null) return { kind: 'permission-denied', target: denied, message };
  const missing = matchTarget(message, NOT_FOUND_PATTERNS);
  if (missing !== null) return { kind: 'not-found', target: missing, message };
  return { kind: 'unknown', message };
}
