/**
 * @module shell
 * Shell: run commands and manipulate files, reporting progress and failures
 * through a {@link ShellConsole}.
 *
 * Filesystem methods are synchronous and never throw on I/O failure: the
 * error is classified, optionally reported, and the method returns `false`
 * (or `null` for {@link Shell.openFile}). A call marked `fatal` ends the host
 * process through the console's exit hook, but only from the generic
 * "due to an error" branches.
 *
 * With `console.skipCommands` set (dry-run) nothing is executed or mutated;
 * the equivalent shell command is printed instead.
 */

import path from 'node:path';
import { constants as fsConstants } from 'node:fs';
import { z } from 'zod';

import { loadConfig, type ShellkitConfigInput } from './config.js';
import { Console, type ConsoleOptions, type ShellConsole } from './console.js';
import { ValidationError, classifyFailure, errorMessage, type Failure } from './errors.js';
import { ConsoleLogger, silentLogger, type Logger } from './logger.js';
import { escapeMarkup as literal, styled } from './markup.js';
import { NodeFileSystem, moveEntry, walk, type FileSystem } from './utils/fs.js';
import { spawnMerged, type SpawnCommand } from './utils/shell.js';

// ---------------------------------------------------------------------------
// Option schemas
// ---------------------------------------------------------------------------

const PathList = z
  .union([z.string().min(1), z.array(z.string().min(1))])
  .transform((value) => (typeof value === 'string' ? [value] : value));

export const RunOptionsSchema = z.object({
  command: z.string().min(1),
  /** Text of the "starting" line. Default: the command itself. */
  message: z.string().optional(),
  announceBefore: z.boolean().default(false),
  /** Default: the console's `showOutputs` flag. */
  echoOutput: z.boolean().optional(),
  reportExitStatus: z.boolean().default(false),
  abortOnFailure: z.boolean().default(false),
});

export const FILE_CHECKS = ['exists', 'readable', 'writable', 'executable', 'directory', 'symlink'] as const;
export type FileCheck = (typeof FILE_CHECKS)[number];

export const FileCheckSpecSchema = z.object({
  path: z.string().optional(),
  /** Unknown names are accepted and evaluate to false. */
  predicates: z.union([z.string(), z.array(z.string())]).optional(),
});

export const DeleteOptionsSchema = z.object({
  paths: PathList,
  showErrors: z.boolean().default(false),
  fatal: z.boolean().default(false),
});

export const CreateDirectoriesOptionsSchema = z.object({
  paths: PathList,
  mode: z.number().int().min(0).max(0o7777).default(0o755),
  showErrors: z.boolean().default(false),
  fatal: z.boolean().default(false),
});

export const CopyOptionsSchema = z.object({
  /** A single source, or a list in directory-destination mode. */
  paths: z.union([z.string().min(1), z.array(z.string().min(1))]),
  destination: z.string().min(1),
  move: z.boolean().default(false),
  destinationIsDirectory: z.boolean().default(false),
  showErrors: z.boolean().default(false),
  fatal: z.boolean().default(false),
});

export const RenameOptionsSchema = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  showErrors: z.boolean().default(false),
  fatal: z.boolean().default(false),
});

export const OpenFileOptionsSchema = z.object({
  path: z.string().min(1),
  /** fs.open flags. */
  flags: z.string().default('r'),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;
/** `predicates` are {@link FILE_CHECKS} names; any other name evaluates to false. */
export type FileCheckSpec = z.input<typeof FileCheckSpecSchema>;
export type DeleteOptions = z.input<typeof DeleteOptionsSchema>;
export type CreateDirectoriesOptions = z.input<typeof CreateDirectoriesOptionsSchema>;
export type CopyOptions = z.input<typeof CopyOptionsSchema>;
export type RenameOptions = z.input<typeof RenameOptionsSchema>;
export type OpenFileOptions = z.input<typeof OpenFileOptionsSchema>;

export interface CommandResult {
  exitStatus: number;
  /** stdout and stderr interleaved in arrival order, newline-joined. */
  combinedOutput: string;
}

export type Pattern = string | RegExp;

export interface ShellDeps {
  console?: ShellConsole;
  logger?: Logger;
  fs?: FileSystem;
  spawn?: SpawnCommand;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FILE_CHECK_NAMES = new Set<string>(FILE_CHECKS);

function isFileCheck(name: string): name is FileCheck {
  return FILE_CHECK_NAMES.has(name);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function toRegExp(pattern: Pattern): RegExp {
  if (pattern instanceof RegExp) return pattern;
  try {
    return new RegExp(pattern, 'i');
  } catch (err) {
    throw new ValidationError(`Invalid pattern: ${pattern}`, 'patterns', pattern, err instanceof Error ? err : undefined);
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const bold = (text: string) => styled('bold white', text);

// ---------------------------------------------------------------------------
// Shell
// ---------------------------------------------------------------------------

export class Shell {
  readonly console: ShellConsole;
  private readonly logger: Logger;
  private readonly fs: FileSystem;
  private readonly spawn: SpawnCommand;

  constructor(deps: ShellDeps = {}) {
    this.console = deps.console ?? new Console();
    this.logger = deps.logger ?? silentLogger;
    this.fs = deps.fs ?? new NodeFileSystem();
    this.spawn = deps.spawn ?? spawnMerged;
  }

  // ── Commands ─────────────────────────────────────────────────────────

  /**
   * Run a command through `/bin/sh` with stderr merged into stdout.
   *
   * @throws {ValidationError} when `options` is malformed.
   */
  async run(options: RunOptions): Promise<CommandResult> {
    const parsed = RunOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(`Invalid run options: ${describeIssues(parsed.error)}`, 'command', undefined, parsed.error);
    }
    const opts = parsed.data;
    const echo = opts.echoOutput ?? this.console.showOutputs;

    if (opts.announceBefore) this.console.begin(opts.message ?? literal(opts.command));

    if (this.console.showCommands) {
      this.console.warn(`Will run command: "${literal(opts.command)}"`);
      this.console.status('ok');
    }

    let result: CommandResult = { exitStatus: 0, combinedOutput: '' };
    if (!this.console.skipCommands) {
      this.logger.debug(`spawn: ${opts.command}`);
      const spawned = await this.spawn(opts.command, {
        onLine: echo ? (line) => this.console.echo(line) : undefined,
      });
      this.logger.debug(`exit ${spawned.exitStatus}: ${opts.command}`);
      result = { exitStatus: spawned.exitStatus, combinedOutput: spawned.lines.join('\n') };
    }

    if (opts.reportExitStatus) this.console.status(result.exitStatus === 0 ? 'ok' : 'fail');
    if (opts.abortOnFailure && result.exitStatus !== 0) this.console.exit(1);
    return result;
  }

  // ── Queries ──────────────────────────────────────────────────────────

  /**
   * True when `check.path` exists and every requested predicate holds.
   * Predicates default to `['exists']`.
   */
  fileCheck(check: FileCheckSpec): boolean {
    const parsed = FileCheckSpecSchema.safeParse(check);
    if (!parsed.success || !parsed.data.path) return false;

    const target = parsed.data.path;
    const raw = parsed.data.predicates ?? ['exists'];
    const predicates = typeof raw === 'string' ? [raw] : raw;

    if (!this.fs.exists(target)) return false;
    return predicates.every((name) => isFileCheck(name) && this.evaluate(name, target));
  }

  private evaluate(check: FileCheck, target: string): boolean {
    switch (check) {
      case 'exists':
        return this.fs.exists(target);
      case 'readable':
        return this.fs.access(target, fsConstants.R_OK);
      case 'writable':
        return this.fs.access(target, fsConstants.W_OK);
      case 'executable':
        return this.fs.access(target, fsConstants.X_OK);
      case 'directory':
        return this.fs.stat(target)?.isDirectory() ?? false;
      case 'symlink':
        return this.fs.lstat(target)?.isSymbolicLink() ?? false;
    }
  }

  /**
   * Every entry under `paths` (roots included) whose full path matches one
   * of `patterns`, depth-first with children in sorted order. String
   * patterns are compiled case-insensitively.
   *
   * @throws {ValidationError} when a string pattern is not a valid RegExp.
   */
  findByPattern(paths: string | string[], patterns: Pattern | Pattern[]): string[] {
    const roots = typeof paths === 'string' ? [paths] : paths;
    if (roots.length === 0) return [];

    const regexps = (Array.isArray(patterns) ? patterns : [patterns]).map(toRegExp);
    const found: string[] = [];

    for (const root of roots) {
      const entries = walk(this.fs, root, (entry, err) => {
        this.logger.debug(`find: cannot read ${entry}: ${errorMessage(err)}`);
      });
      for (const entry of entries) {
        if (regexps.some((re) => entry.search(re) !== -1)) found.push(entry);
      }
    }
    return found;
  }

  /** Every entry under `paths` whose name ends with one of `extensions` (case-insensitive). */
  findByExtension(paths: string | string[], extensions: string | string[]): string[] {
    const list = typeof extensions === 'string' ? [extensions] : extensions;
    return this.findByPattern(
      paths,
      list.map((ext) => new RegExp(`${escapeRegExp(ext)}$`, 'i')),
    );
  }

  // ── Mutations ────────────────────────────────────────────────────────

  /** Recursively remove each path in order, stopping at the first failure. */
  deleteFiles(options: DeleteOptions): boolean {
    const parsed = DeleteOptionsSchema.safeParse(options);
    if (!parsed.success) return this.usage('deleteFiles', parsed.error);
    const { paths, showErrors, fatal } = parsed.data;

    if (this.console.skipCommands) {
      this.console.write(literal(`rm -r ${paths.join(' ')}`));
      return true;
    }

    for (const target of paths) {
      try {
        this.fs.remove(target);
      } catch (err) {
        const failure = this.classify(err, target);
        if (failure.kind === 'permission-denied') {
          if (showErrors) this.console.error(`Cannot remove following non writable entry: ${literal(failure.target)}`);
        } else if (failure.kind === 'not-found') {
          if (showErrors) this.console.error(`Cannot remove following non existent entry: ${literal(failure.target)}`);
        } else {
          if (showErrors) this.reportEntries('Cannot remove following entries:', paths, failure.message);
          if (fatal) this.console.exit(1);
        }
        return this.failed();
      }
    }
    return true;
  }

  /**
   * Create each directory (and missing parents) with `mode`. A path that
   * already exists, even as a directory, is a failure.
   */
  createDirectories(options: CreateDirectoriesOptions): boolean {
    const parsed = CreateDirectoriesOptionsSchema.safeParse(options);
    if (!parsed.success) return this.usage('createDirectories', parsed.error);
    const { paths, mode, showErrors, fatal } = parsed.data;

    for (const target of paths) {
      if (this.fs.exists(target)) {
        const suffix = this.fs.stat(target)?.isDirectory() ? 'because it already exists.' : 'because it already exists as a file';
        this.console.error(`Cannot create following directory ${bold(target)} ${suffix}`);
        return this.failed();
      }

      if (this.console.skipCommands) {
        this.console.write(literal(`mkdir -p -m ${mode.toString(8)} ${target}`));
        continue;
      }

      try {
        this.fs.mkdir(target, mode);
      } catch (err) {
        const failure = this.classify(err, target);
        if (failure.kind === 'permission-denied') {
          if (showErrors) this.console.error(`Cannot create following directory in non writable parent: ${bold(failure.target)}.`);
        } else {
          if (showErrors) this.reportEntries('Cannot create following directory:', paths, failure.message);
          if (fatal) this.console.exit(1);
        }
        return this.failed();
      }
    }
    return true;
  }

  /**
   * Copy or move entries.
   *
   * With `destinationIsDirectory`, every source is copied recursively (or
   * moved) to `destination`, landing inside it when it is an existing
   * directory. Otherwise `paths` must be a single file; the destination's
   * parent directory is created when missing.
   */
  copy(options: CopyOptions): boolean {
    const parsed = CopyOptionsSchema.safeParse(options);
    if (!parsed.success) return this.usage('copy', parsed.error);
    const opts = parsed.data;

    return opts.destinationIsDirectory
      ? this.copyIntoDirectory(opts)
      : this.copySingle(opts);
  }

  private copyIntoDirectory(opts: z.output<typeof CopyOptionsSchema>): boolean {
    const { move, showErrors, fatal } = opts;
    const verb = move ? 'move' : 'copy';
    const sources = typeof opts.paths === 'string' ? [opts.paths] : opts.paths;

    for (const source of sources) {
      // Resolved per source: an earlier entry may have created the destination.
      const isDirectory = this.fs.stat(opts.destination)?.isDirectory() ?? false;
      const dest = isDirectory && !opts.destination.endsWith('/') ? `${opts.destination}/` : opts.destination;

      if (this.console.skipCommands) {
        this.console.write(literal(`${move ? 'mv' : 'cp -r'} ${source} ${dest}`));
        continue;
      }

      const target = isDirectory ? path.join(dest, path.basename(source)) : dest;
      try {
        if (move) moveEntry(this.fs, source, target);
        else this.fs.copy(source, target);
      } catch (err) {
        const failure = this.classify(err, source);
        if (failure.kind === 'permission-denied') {
          if (showErrors) this.console.error(`Cannot ${verb} entry ${bold(source)} to non-writable entry ${bold(dest)}`);
        } else {
          if (showErrors) this.reportEntries(`Cannot ${verb} following entries to ${bold(dest)}:`, sources, failure.message);
          if (fatal) this.console.exit(1);
        }
        return this.failed();
      }
    }
    return true;
  }

  private copySingle(opts: z.output<typeof CopyOptionsSchema>): boolean {
    const { move, showErrors, fatal, destination } = opts;
    const verb = move ? 'move' : 'copy';

    if (typeof opts.paths !== 'string') {
      this.console.error('Shell#copy: To copy a single file, both paths and destination must be a string.');
      return this.failed();
    }
    const source = opts.paths;

    const parent = path.dirname(destination);
    if (!(this.fs.stat(parent)?.isDirectory() ?? false)) {
      // createDirectories prints its own fail status.
      if (!this.createDirectories({ paths: parent, mode: 0o755, fatal, showErrors })) return false;
    }

    if (this.console.skipCommands) {
      this.console.write(literal(`${move ? 'mv' : 'cp'} ${source} ${destination}`));
      return true;
    }

    const target = this.fs.stat(destination)?.isDirectory()
      ? path.join(destination, path.basename(source))
      : destination;
    try {
      if (move) moveEntry(this.fs, source, target);
      else this.fs.copyFile(source, target);
    } catch (err) {
      const failure = this.classify(err, source);
      if (failure.kind === 'permission-denied') {
        if (showErrors) this.console.error(`Cannot ${verb} entry ${bold(source)} to non-writable entry ${bold(destination)}`);
      } else {
        if (showErrors) {
          this.console.error(
            `Cannot ${verb} ${bold(source)} to ${bold(destination)} due to an error: ${styled('bold red', failure.message)}`,
          );
        }
        if (fatal) this.console.exit(1);
      }
      return this.failed();
    }
    return true;
  }

  /** Move a single file to a new path. */
  rename(options: RenameOptions): boolean {
    const parsed = RenameOptionsSchema.safeParse(options);
    if (!parsed.success) {
      if (options?.showErrors === true) this.console.error('Shell#rename: Both source and destination must be a string.');
      return this.failed();
    }
    const { source, destination, showErrors, fatal } = parsed.data;
    return this.copy({ paths: source, destination, move: true, showErrors, fatal });
  }

  /** Open a file descriptor; `null` (after reporting) when it cannot be opened. */
  openFile(options: OpenFileOptions): number | null {
    const parsed = OpenFileOptionsSchema.safeParse(options);
    if (!parsed.success) {
      this.console.error(`Shell#openFile: ${literal(describeIssues(parsed.error))}`);
      return null;
    }
    const { path: target, flags } = parsed.data;
    try {
      return this.fs.open(target, flags);
    } catch (err) {
      this.console.error(literal(`Unable to open file ${target}: ${errorMessage(err)}`));
      return null;
    }
  }

  // ── Reporting ────────────────────────────────────────────────────────

  private classify(err: unknown, target: string): Failure {
    const failure = classifyFailure(err, target);
    this.logger.debug(`${failure.kind}: ${failure.message}`);
    return failure;
  }

  /** Print the generic failure block: heading, indented entries, cause. */
  private reportEntries(heading: string, entries: string[], cause: string): void {
    this.console.error(heading);
    this.console.indentRegion(3, () => {
      for (const entry of entries) this.console.write(literal(entry));
    });
    this.console.write(`due to an error: ${literal(cause)}`);
  }

  private usage(operation: string, error: z.ZodError): false {
    this.console.error(`Shell#${operation}: ${literal(describeIssues(error))}`);
    return this.failed();
  }

  private failed(): false {
    this.console.status('fail');
    return false;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateShellOptions extends Omit<ShellDeps, 'console'>, Pick<ConsoleOptions, 'stream' | 'exit'> {
  /** Directory searched for `.shellkit.yaml`. Default: process.cwd() */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a Shell from layered configuration (defaults, config file, env,
 * `overrides`).
 *
 * @throws {ValidationError} on invalid configuration.
 */
export function createShell(overrides: ShellkitConfigInput = {}, opts: CreateShellOptions = {}): Shell {
  const config = loadConfig(overrides, { cwd: opts.cwd, env: opts.env });
  return new Shell({
    console: Console.fromConfig(config, { stream: opts.stream, exit: opts.exit }),
    logger: opts.logger ?? new ConsoleLogger(config.debug, 'shell'),
    fs: opts.fs,
    spawn: opts.spawn,
  });
}
