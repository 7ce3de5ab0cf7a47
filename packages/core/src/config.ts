/**
 * @module config
 * Library configuration schema powered by Zod.
 *
 * Load order (later wins):
 *   defaults → .shellkit.yaml → SHELLKIT_* env vars → explicit overrides
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';

import { ValidationError, errorMessage } from './errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ConsoleConfigSchema = z.object({
  /** Print each command before running it. */
  showCommands: z.boolean().default(false),
  /** Echo command output while it streams. */
  showOutputs: z.boolean().default(true),
  /** Dry-run: never execute commands or mutate the filesystem. */
  skipCommands: z.boolean().default(false),
  /** Render markup with ANSI colours. */
  color: z.boolean().default(true),
  /** String repeated once per indent level. */
  indentator: z.string().default(' '),
  /** Column at which status labels end. */
  lineWidth: z.number().int().min(20).max(400).default(80),
});

export const ShellkitConfigSchema = z.object({
  /** Enable debug logging. */
  debug: z.boolean().default(false),
  console: ConsoleConfigSchema.default(() => ConsoleConfigSchema.parse({})),
});

export type ConsoleConfig = z.infer<typeof ConsoleConfigSchema>;
export type ShellkitConfig = z.infer<typeof ShellkitConfigSchema>;

/** Loose input shape accepted by {@link loadConfig} as overrides. */
export type ShellkitConfigInput = z.input<typeof ShellkitConfigSchema>;

export const CONFIG_FILENAMES = ['.shellkit.yaml', '.shellkit.yml'] as const;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Directory searched for the config file. Default: process.cwd() */
  cwd?: string;
  /** Environment to read SHELLKIT_* variables from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration by merging layers.
 *
 * @throws {ValidationError} when the config file is unreadable YAML or the
 *   merged result does not match {@link ShellkitConfigSchema}.
 */
export function loadConfig(
  overrides: ShellkitConfigInput = {},
  opts: LoadConfigOptions = {},
): ShellkitConfig {
  const { cwd = process.cwd(), env = process.env } = opts;
  const layers: Record<string, unknown>[] = [];

  const file = findConfigFile(cwd);
  if (file) layers.push(readConfigFile(file));

  layers.push(envLayer(env));
  layers.push({ ...overrides });

  const merged = deepMerge({}, ...layers);
  const result = ShellkitConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || '(root)';
    throw new ValidationError(
      `Invalid configuration at ${field}: ${issue?.message ?? 'unknown issue'}`,
      field,
      undefined,
      result.error,
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

function readConfigFile(filepath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filepath, 'utf8'));
  } catch (err) {
    throw new ValidationError(
      `Cannot read ${filepath}: ${errorMessage(err)}`,
      filepath,
      undefined,
      err instanceof Error ? err : undefined,
    );
  }
  if (raw === null || raw === undefined) return {};
  if (!isPlainObject(raw)) {
    throw new ValidationError(`${filepath} must contain a mapping`, filepath, typeof raw);
  }
  return raw;
}

function truthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/** Map recognized env vars to our schema. */
function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const consoleLayer: Record<string, unknown> = {};

  if (env.SHELLKIT_DRY_RUN !== undefined) consoleLayer.skipCommands = truthy(env.SHELLKIT_DRY_RUN);
  if (env.SHELLKIT_SHOW_COMMANDS !== undefined) consoleLayer.showCommands = truthy(env.SHELLKIT_SHOW_COMMANDS);
  if (truthy(env.SHELLKIT_QUIET)) consoleLayer.showOutputs = false;
  if (truthy(env.SHELLKIT_NO_COLOR) || env.NO_COLOR) consoleLayer.color = false;
  if (env.SHELLKIT_DEBUG !== undefined) out.debug = truthy(env.SHELLKIT_DEBUG);

  if (Object.keys(consoleLayer).length) out.console = consoleLayer;
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively merge plain objects; later sources win, arrays are replaced. */
export function deepMerge(
  target: Record<string, unknown>,
  ...sources: Record<string, unknown>[]
): Record<string, unknown> {
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
      const current = target[key];
      target[key] = isPlainObject(value) && isPlainObject(current)
        ? deepMerge({ ...current }, value)
        : isPlainObject(value) ? deepMerge({}, value) : value;
    }
  }
  return target;
}
