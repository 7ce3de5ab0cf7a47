import { describe, expect, it } from 'vitest';

import { ValidationError, classifyFailure, errorMessage } from './errors.js';
import { errno } from './__testUtils__/console.js';

describe('classifyFailure', () => {
  it('reads EACCES and its path from errno errors', () => {
    const err = errno('EACCES', "EACCES: permission denied, rmdir '/srv/locked'", '/srv/locked');
    expect(classifyFailure(err)).toEqual({
      kind: 'permission-denied',
      target: '/srv/locked',
      message: "EACCES: permission denied, rmdir '/srv/locked'",
    });
  });

  it('treats EPERM as permission denied', () => {
    expect(classifyFailure(errno('EPERM', 'operation not permitted', '/x')).kind).toBe('permission-denied');
  });

  it('reads ENOENT as not found', () => {
    const err = errno('ENOENT', "ENOENT: no such file or directory, lstat '/missing'", '/missing');
    expect(classifyFailure(err)).toEqual({
      kind: 'not-found',
      target: '/missing',
      message: "ENOENT: no such file or directory, lstat '/missing'",
    });
  });

  it('falls back to the message, then the fallback target, when path is absent', () => {
    const fromMessage = errno('ENOENT', "ENOENT: no such file or directory, open '/a/b'");
    expect(classifyFailure(fromMessage, '/other')).toMatchObject({ kind: 'not-found', target: '/a/b' });

    const bare = errno('EACCES', 'denied');
    expect(classifyFailure(bare, '/fallback')).toMatchObject({ kind: 'permission-denied', target: '/fallback' });
  });

  it('matches message forms when no code is present', () => {
    expect(classifyFailure(new Error('Permission denied - /etc/shadow'))).toEqual({
      kind: 'permission-denied',
      target: '/etc/shadow',
      message: 'Permission denied - /etc/shadow',
    });
    expect(classifyFailure(new Error('No such file or directory - /nope'))).toMatchObject({
      kind: 'not-found',
      target: '/nope',
    });
  });

  it('classifies everything else as unknown with the raw message', () => {
    expect(classifyFailure(errno('EISDIR', 'illegal operation on a directory', '/d'))).toEqual({
      kind: 'unknown',
      message: 'illegal operation on a directory',
    });
    expect(classifyFailure('boom')).toEqual({ kind: 'unknown', message: 'boom' });
  });
});

describe('errorMessage', () => {
  it('returns the message of errors and the string form of anything else', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('ValidationError', () => {
  it('keeps field, serialized value and cause', () => {
    const cause = new Error('inner');
    const err = new ValidationError('Invalid mode', 'mode', 999, cause);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ValidationError');
    expect(err.field).toBe('mode');
    expect(err.value).toBe('999');
    expect(err.cause).toBe(cause);
  });
});
