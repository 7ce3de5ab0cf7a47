/**
 * @module options
 * Standard console flags for commander programs, and parsers for their
 * values.
 *
 *   const program = registerConsoleOptions(new Command('tool'));
 *   program.parse();
 *   const shell = createShell(toConsoleConfig(program.opts()));
 */

import { InvalidArgumentError, type Command } from 'commander';
import { z } from 'zod';

import type { ShellkitConfigInput } from './config.js';
import { ValidationError } from './errors.js';

const ConsoleFlagsSchema = z.object({
  dryRun: z.boolean().optional(),
  showCommands: z.boolean().optional(),
  quiet: z.boolean().optional(),
  /** commander sets this to `false` for `--no-color`. */
  color: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type ConsoleFlags = z.infer<typeof ConsoleFlagsSchema>;

/** Add `--dry-run`, `--show-commands`, `--quiet`, `--no-color` and `--debug`. */
export function registerConsoleOptions<T extends Command>(command: T): T {
  command
    .option('--dry-run', 'print commands instead of running them')
    .option('--show-commands', 'print each command before running it')
    .option('-q, --quiet', 'do not echo command output')
    .option('--no-color', 'disable coloured output')
    .option('--debug', 'enable debug logging');
  return command;
}

/**
 * Map parsed flags to config overrides. Only flags the user actually passed
 * produce a value, so they layer over env vars and config files instead of
 * resetting them.
 *
 * @throws {ValidationError} when a flag has the wrong type.
 */
export function toConsoleConfig(parsed: unknown): ShellkitConfigInput {
  const result = ConsoleFlagsSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || '(root)';
    throw new ValidationError(`Invalid option ${field}: ${issue?.message ?? 'unknown issue'}`, field, undefined, result.error);
  }
  const flags = result.data;

  const consoleLayer: NonNullable<ShellkitConfigInput['console']> = {};
  if (flags.dryRun) consoleLayer.skipCommands = true;
  if (flags.showCommands) consoleLayer.showCommands = true;
  if (flags.quiet) consoleLayer.showOutputs = false;
  if (flags.color === false) consoleLayer.color = false;

  const out: ShellkitConfigInput = { console: consoleLayer };
  if (flags.debug) out.debug = true;
  return out;
}

/**
 * Parse a permission mode written in octal: `755`, `0755` or `0o755`.
 * Usable directly as a commander argument parser.
 *
 * @throws {InvalidArgumentError} for anything else.
 */
export function parseOctalMode(value: string): number {
  const m = /^(?:0o?)?([0-7]{1,4})$/i.exec(value.trim());
  if (!m?.[1]) throw new InvalidArgumentError(`Not an octal mode: ${value}`);
  return Number.parseInt(m[1], 8);
}
