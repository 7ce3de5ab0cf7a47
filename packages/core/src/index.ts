/**
 * @shellkit/core
 *
 * Run shell commands and manipulate files with console progress reporting,
 * dry-run support and classified failures.
 *
 * Usage:
 *   import { createShell } from '@shellkit/core';
 *   const shell = createShell({ console: { showCommands: true } });
 *   shell.createDirectories({ paths: 'build/out', showErrors: true });
 *   const { exitStatus } = await shell.run({ command: 'make', announceBefore: true, reportExitStatus: true });
 */

// --- Shell ---
export {
  Shell,
  createShell,
  FILE_CHECKS,
  RunOptionsSchema,
  FileCheckSpecSchema,
  DeleteOptionsSchema,
  CreateDirectoriesOptionsSchema,
  CopyOptionsSchema,
  RenameOptionsSchema,
  OpenFileOptionsSchema,
  type FileCheck,
  type FileCheckSpec,
  type RunOptions,
  type DeleteOptions,
  type CreateDirectoriesOptions,
  type CopyOptions,
  type RenameOptions,
  type OpenFileOptions,
  type CommandResult,
  type Pattern,
  type ShellDeps,
  type CreateShellOptions,
} from './shell.js';

// --- Console ---
export {
  Console,
  type ShellConsole,
  type ConsoleOptions,
  type StatusKind,
  type MessageOptions,
  type BeginOptions,
  type OutputStream,
  type ExitHook,
} from './console.js';

export { renderMarkup, applyStyle, styled, escapeMarkup, createPainter, visibleLength } from './markup.js';

// --- Options ---
export { registerConsoleOptions, toConsoleConfig, parseOctalMode, type ConsoleFlags } from './options.js';

// --- Config ---
export {
  ConsoleConfigSchema,
  ShellkitConfigSchema,
  CONFIG_FILENAMES,
  loadConfig,
  deepMerge,
  type ConsoleConfig,
  type ShellkitConfig,
  type ShellkitConfigInput,
  type LoadConfigOptions,
} from './config.js';

// --- Errors & logging ---
export { ValidationError, classifyFailure, errorMessage, type Failure, type FailureKind } from './errors.js';
export { type Logger, ConsoleLogger, silentLogger } from './logger.js';

// --- Utilities ---
export {
  spawnMerged,
  SPAWN_FAILURE_STATUS,
  type SpawnCommand,
  type SpawnOptions,
  type SpawnResult,
  NodeFileSystem,
  moveEntry,
  walk,
  type FileSystem,
} from './utils/index.js';

export { VERSION } from './version.js';
