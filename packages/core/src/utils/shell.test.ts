import { describe, expect, it } from 'vitest';

import { SPAWN_FAILURE_STATUS, spawnMerged } from './shell.js';

describe('spawnMerged', () => {
  it('captures stdout and stderr in order and reports the exit code', async () => {
    const streamed: string[] = [];
    const result = await spawnMerged('echo one; echo two >&2; echo three; exit 3', {
      onLine: (line) => streamed.push(line),
    });
    expect(result).toEqual({ exitStatus: 3, lines: ['one', 'two', 'three'] });
    expect(streamed).toEqual(['one', 'two', 'three']);
  });

  it('runs in the given directory with extra env', async () => {
    const result = await spawnMerged('pwd; echo "$SHELLKIT_TEST_VALUE"', {
      cwd: '/',
      env: { SHELLKIT_TEST_VALUE: 'placeholder' },
    });
    expect(result.lines).toEqual(['/', 'placeholder']);
  });

  it('reports 128 + signal for killed processes', async () => {
    const result = await spawnMerged('kill -TERM $$');
    expect(result.exitStatus).toBe(128 + 15);
  });

  it('resolves with the failure status when the interpreter is missing', async () => {
    const result = await spawnMerged('true', { shell: '/nonexistent/sh' });
    expect(result.exitStatus).toBe(SPAWN_FAILURE_STATUS);
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0]).toContain('ENOENT');
  });
});
