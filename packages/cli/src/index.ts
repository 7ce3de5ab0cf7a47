/**
 * @shellkit/cli
 *
 * Barrel export: the command tree and its building blocks, for embedding
 * `shellkit` commands in other programs.
 */

export { createProgram, runCli, type CliIO } from './program.js';

export { cmdRun, type RunCommandOptions } from './commands/run.js';
export { cmdCheck, type CheckCommandOptions } from './commands/check.js';
export { cmdRemove, type RemoveCommandOptions } from './commands/remove.js';
export { cmdMkdir, type MkdirCommandOptions } from './commands/mkdir.js';
export { cmdCopy, type CopyCommandOptions } from './commands/copy.js';
export { cmdRename } from './commands/rename.js';
export { cmdFind, type FindCommandOptions } from './commands/find.js';

export { confirmAction, unwrapCancel, type ConfirmPrompt } from './ui/prompts.js';
export { UserCancelledError, UsageError } from './utils/errors.js';
