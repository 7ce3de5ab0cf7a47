/**
 * @module program
 * The `shellkit` command tree.
 *
 * Global flags (`--dry-run`, `--show-commands`, `--quiet`, `--no-color`,
 * `--debug`) go before the sub-command; `run` passes everything after its
 * own options through to the command line. Each sub-command builds its Shell
 * from layered config plus those flags and resolves to an exit code.
 */

import { Command, CommanderError } from 'commander';
import {
  Console,
  VERSION,
  createShell,
  errorMessage,
  escapeMarkup,
  parseOctalMode,
  registerConsoleOptions,
  toConsoleConfig,
  type ExitHook,
  type FileSystem,
  type OutputStream,
  type Shell,
  type SpawnCommand,
} from '@shellkit/core';

import { cmdCheck } from './commands/check.js';
import { cmdCopy, type CopyCommandOptions } from './commands/copy.js';
import { cmdFind, type FindCommandOptions } from './commands/find.js';
import { cmdMkdir, type MkdirCommandOptions } from './commands/mkdir.js';
import { cmdRemove, type RemoveCommandOptions } from './commands/remove.js';
import { cmdRename } from './commands/rename.js';
import { cmdRun, type RunCommandOptions } from './commands/run.js';
import { confirmAction, type ConfirmPrompt } from './ui/prompts.js';
import { UserCancelledError } from './utils/errors.js';

export interface CliIO {
  /** Default: process.stdout */
  stream?: OutputStream;
  /** Default: process.exit */
  exit?: ExitHook;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Default: a clack confirm prompt. */
  confirm?: ConfirmPrompt;
  fs?: FileSystem;
  spawn?: SpawnCommand;
}

type Handler = (shell: Shell) => number | Promise<number>;

export function createProgram(io: CliIO = {}, onExit: (code: number) => void = () => { }): Command {
  const confirm = io.confirm ?? confirmAction;
  const program = registerConsoleOptions(new Command('shellkit'))
    .description('Run commands and manage files with progress reporting')
    .version(VERSION)
    .enablePositionalOptions();

  const handle = async (fn: Handler): Promise<void> => {
    let shell: Shell | null = null;
    try {
      shell = createShell(toConsoleConfig(program.opts()), {
        cwd: io.cwd,
        env: io.env,
        stream: io.stream,
        exit: io.exit,
        fs: io.fs,
        spawn: io.spawn,
      });
      onExit(await fn(shell));
    } catch (err) {
      const out = shell?.console ?? new Console({ stream: io.stream, exit: io.exit, color: false });
      if (err instanceof UserCancelledError) out.warn(err.message);
      else out.error(escapeMarkup(errorMessage(err)));
      onExit(1);
    }
  };

  program
    .command('run')
    .description('Run a shell command')
    .argument('<command...>', 'command and arguments, joined with spaces')
    .option('--fatal', 'exit immediately when the command fails')
    .passThroughOptions()
    .action((words: string[], opts: RunCommandOptions) => handle((shell) => cmdRun(shell, words, opts)));

  program
    .command('check')
    .description('Print whether a path passes every check')
    .argument('<path>')
    .option('-t, --test <name...>', 'exists, readable, writable, executable, directory, symlink')
    .action((target: string, opts: { test?: string[] }) => handle((shell) => cmdCheck(shell, target, opts)));

  program
    .command('rm')
    .description('Delete files and directory trees')
    .argument('<paths...>')
    .option('-y, --yes', 'skip the confirmation prompt')
    .option('--fatal', 'exit immediately on unexpected errors')
    .action((paths: string[], opts: RemoveCommandOptions) =>
      handle((shell) => cmdRemove(shell, paths, opts, confirm)));

  program
    .command('mkdir')
    .description('Create directories and missing parents')
    .argument('<paths...>')
    .option('-m, --mode <octal>', 'permission bits', parseOctalMode)
    .option('--fatal', 'exit immediately on unexpected errors')
    .action((paths: string[], opts: MkdirCommandOptions) => handle((shell) => cmdMkdir(shell, paths, opts)));

  for (const move of [false, true]) {
    program
      .command(move ? 'mv' : 'cp')
      .description(move ? 'Move entries' : 'Copy entries')
      .argument('<paths...>', 'sources followed by the destination')
      .option('--into', 'treat the destination as a directory')
      .option('--fatal', 'exit immediately on unexpected errors')
      .action((args: string[], opts: CopyCommandOptions) => handle((shell) => cmdCopy(shell, args, opts, move)));
  }

  program
    .command('rename')
    .description('Rename a file')
    .argument('<source>')
    .argument('<destination>')
    .option('--fatal', 'exit immediately on unexpected errors')
    .action((source: string, destination: string, opts: { fatal?: boolean }) =>
      handle((shell) => cmdRename(shell, source, destination, opts)));

  program
    .command('find')
    .description('Print entries whose path matches')
    .argument('<paths...>')
    .option('-p, --pattern <regexp...>', 'case-insensitive regular expressions')
    .option('-e, --ext <extension...>', 'file extensions')
    .action((paths: string[], opts: FindCommandOptions) => handle((shell) => cmdFind(shell, paths, opts)));

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the selected
 * command.
 *
 * @returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = {}): Promise<number> {
  let code = 0;
  const program = createProgram(io, (c) => {
    code = c;
  });
  const stream = io.stream ?? process.stdout;
  program.exitOverride().configureOutput({
    writeOut: (str) => stream.write(str),
    writeErr: (str) => stream.write(str),
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return code;
}
