import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { deepMerge, loadConfig } from './config.js';
import { ValidationError } from './errors.js';
import { makeTempDir } from './__testUtils__/console.js';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('returns defaults with no file, env or overrides', () => {
    expect(loadConfig({}, { cwd, env: {} })).toEqual({
      debug: false,
      console: {
        showCommands: false,
        showOutputs: true,
        skipCommands: false,
        color: true,
        indentator: ' ',
        lineWidth: 80,
      },
    });
  });

  it('layers file, env and overrides in that order', () => {
    fs.writeFileSync(
      path.join(cwd, '.shellkit.yaml'),
      'debug: true\nconsole:\n  lineWidth: 100\n  showCommands: true\n  indentator: "\\t"\n',
    );
    const config = loadConfig(
      { console: { lineWidth: 60 } },
      { cwd, env: { SHELLKIT_SHOW_COMMANDS: '0', SHELLKIT_DRY_RUN: 'true' } },
    );
    expect(config.debug).toBe(true);
    expect(config.console.lineWidth).toBe(60);
    expect(config.console.showCommands).toBe(false);
    expect(config.console.skipCommands).toBe(true);
    expect(config.console.indentator).toBe('\t');
  });

  it('reads .shellkit.yml too', () => {
    fs.writeFileSync(path.join(cwd, '.shellkit.yml'), 'console:\n  color: false\n');
    expect(loadConfig({}, { cwd, env: {} }).console.color).toBe(false);
  });

  it('maps quiet, colour and debug env vars', () => {
    const config = loadConfig({}, { cwd, env: { SHELLKIT_QUIET: '1', NO_COLOR: '1', SHELLKIT_DEBUG: '1' } });
    expect(config.console.showOutputs).toBe(false);
    expect(config.console.color).toBe(false);
    expect(config.debug).toBe(true);
  });

  it('throws ValidationError naming the invalid field', () => {
    expect(() => loadConfig({ console: { lineWidth: 5 } }, { cwd, env: {} })).toThrow(ValidationError);
    try {
      loadConfig({ console: { lineWidth: 5 } }, { cwd, env: {} });
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.field).toBe('console.lineWidth');
    }
  });

  it('rejects a config file that is not a mapping', () => {
    fs.writeFileSync(path.join(cwd, '.shellkit.yaml'), '- one\n- two\n');
    expect(() => loadConfig({}, { cwd, env: {} })).toThrow(/must contain a mapping/);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays and scalars', () => {
    const merged = deepMerge({ a: { b: 1, c: [1, 2] }, d: 'x' }, { a: { c: [3] }, d: 'y' }, { a: { e: undefined } });
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'y' });
  });
});
