import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { NodeFileSystem, moveEntry, walk } from './fs.js';
import { errno, makeTempDir } from '../__testUtils__/console.js';

describe('NodeFileSystem', () => {
  let root: string;
  const fsys = new NodeFileSystem();

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('returns null stats for missing paths', () => {
    expect(fsys.stat(path.join(root, 'nope'))).toBeNull();
    expect(fsys.lstat(path.join(root, 'nope'))).toBeNull();
  });

  it('reports a dangling symlink through lstat but not stat', () => {
    const link = path.join(root, 'link');
    fs.symlinkSync(path.join(root, 'gone'), link);
    expect(fsys.stat(link)).toBeNull();
    expect(fsys.lstat(link)?.isSymbolicLink()).toBe(true);
    expect(fsys.exists(link)).toBe(false);
  });

  it('removes trees and throws ENOENT for missing entries', () => {
    fs.mkdirSync(path.join(root, 'a', 'b'), { recursive: true });
    fsys.remove(path.join(root, 'a'));
    expect(fs.existsSync(path.join(root, 'a'))).toBe(false);
    expect(() => fsys.remove(path.join(root, 'a'))).toThrow(/ENOENT/);
  });
});

describe('moveEntry', () => {
  it('renames when possible', () => {
    const fsys = new NodeFileSystem();
    const rename = vi.spyOn(fsys, 'rename').mockImplementation(() => undefined);
    const copy = vi.spyOn(fsys, 'copy');
    moveEntry(fsys, '/src', '/dest');
    expect(rename).toHaveBeenCalledWith('/src', '/dest');
    expect(copy).not.toHaveBeenCalled();
  });

  it('copies then removes across devices', () => {
    const fsys = new NodeFileSystem();
    vi.spyOn(fsys, 'rename').mockImplementation(() => {
      throw errno('EXDEV', 'cross-device link not permitted');
    });
    const calls: string[] = [];
    vi.spyOn(fsys, 'copy').mockImplementation((src, dest) => {
      calls.push(`copy ${src} ${dest}`);
    });
    vi.spyOn(fsys, 'remove').mockImplementation((p) => {
      calls.push(`remove ${p}`);
    });
    moveEntry(fsys, '/src', '/dest');
    expect(calls).toEqual(['copy /src /dest', 'remove /src']);
  });

  it('rethrows other errors', () => {
    const fsys = new NodeFileSystem();
    vi.spyOn(fsys, 'rename').mockImplementation(() => {
      throw errno('EACCES', 'permission denied', '/dest');
    });
    expect(() => moveEntry(fsys, '/src', '/dest')).toThrow('permission denied');
  });
});

describe('walk', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    fs.mkdirSync(path.join(root, 'b', 'inner'), { recursive: true });
    fs.mkdirSync(path.join(root, 'a'));
    fs.writeFileSync(path.join(root, 'a', 'one.txt'), '1');
    fs.writeFileSync(path.join(root, 'b', 'inner', 'two.md'), '2');
    fs.writeFileSync(path.join(root, 'c.txt'), '3');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('yields the root and every entry depth-first in sorted order', () => {
    expect([...walk(new NodeFileSystem(), root)]).toEqual([
      root,
      path.join(root, 'a'),
      path.join(root, 'a', 'one.txt'),
      path.join(root, 'b'),
      path.join(root, 'b', 'inner'),
      path.join(root, 'b', 'inner', 'two.md'),
      path.join(root, 'c.txt'),
    ]);
  });

  it('does not descend into symlinked directories', () => {
    fs.symlinkSync(path.join(root, 'b'), path.join(root, 'link'));
    const entries = [...walk(new NodeFileSystem(), root)];
    expect(entries).toContain(path.join(root, 'link'));
    expect(entries).not.toContain(path.join(root, 'link', 'inner'));
  });

  it('reports unreadable directories and keeps going', () => {
    const fsys = new NodeFileSystem();
    const readdir = fsys.readdir.bind(fsys);
    vi.spyOn(fsys, 'readdir').mockImplementation((p) => {
      if (p === path.join(root, 'a')) throw errno('EACCES', 'permission denied', p);
      return readdir(p);
    });
    const errors: string[] = [];
    const entries = [...walk(fsys, root, (dir) => errors.push(dir))];
    expect(errors).toEqual([path.join(root, 'a')]);
    expect(entries).toEqual([
      root,
      path.join(root, 'a'),
      path.join(root, 'b'),
      path.join(root, 'b', 'inner'),
      path.join(root, 'b', 'inner', 'two.md'),
      path.join(root, 'c.txt'),
    ]);
  });

  it('reports entries that cannot be stat\'ed and keeps going', () => {
    const fsys = new NodeFileSystem();
    const lstat = fsys.lstat.bind(fsys);
    vi.spyOn(fsys, 'lstat').mockImplementation((p) => {
      if (p === path.join(root, 'a', 'one.txt')) throw errno('EACCES', 'permission denied', p);
      return lstat(p);
    });
    const errors: string[] = [];
    const entries = [...walk(fsys, root, (entry) => errors.push(entry))];
    expect(errors).toEqual([path.join(root, 'a', 'one.txt')]);
    expect(entries).toEqual([
      root,
      path.join(root, 'a'),
      path.join(root, 'b'),
      path.join(root, 'b', 'inner'),
      path.join(root, 'b', 'inner', 'two.md'),
      path.join(root, 'c.txt'),
    ]);
  });

  it('yields nothing for a missing root', () => {
    expect([...walk(new NodeFileSystem(), path.join(root, 'missing'))]).toEqual([]);
  });
});
