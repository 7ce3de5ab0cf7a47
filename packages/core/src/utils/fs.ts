/**
 * @module utils/fs
 * Filesystem capability consumed by Shell, its Node implementation, and the
 * walk/move helpers built on it.
 *
 * Every mutating method throws Node's errno errors unchanged; Shell does the
 * classification.
 */

import fs from 'node:fs';
import path from 'node:path';

export interface FileSystem {
  /** True if the path resolves (symlinks followed). */
  exists(p: string): boolean;
  /** Stats following symlinks, or `null` if the path does not resolve. */
  stat(p: string): fs.Stats | null;
  /** Stats of the entry itself, or `null` if it does not exist. */
  lstat(p: string): fs.Stats | null;
  /** True if the process has `mode` (fs.constants.R_OK …) on the path. */
  access(p: string, mode: number): boolean;
  /** Remove a file or directory tree. Throws ENOENT if missing. */
  remove(p: string): void;
  /** Copy a file or directory tree, overwriting destination entries. */
  copy(src: string, dest: string): void;
  copyFile(src: string, dest: string): void;
  rename(src: string, dest: string): void;
  /** Create a directory and any missing parents. */
  mkdir(p: string, mode: number): void;
  readdir(p: string): string[];
  open(p: string, flags: string): number;
}

export class NodeFileSystem implements FileSystem {
  exists(p: string): boolean {
    return fs.existsSync(p);
  }

  stat(p: string): fs.Stats | null {
    return fs.statSync(p, { throwIfNoEntry: false }) ?? null;
  }

  lstat(p: string): fs.Stats | null {
    return fs.lstatSync(p, { throwIfNoEntry: false }) ?? null;
  }

  access(p: string, mode: number): boolean {
    try {
      fs.accessSync(p, mode);
      return true;
    } catch {
      return false;
    }
  }

  remove(p: string): void {
    fs.rmSync(p, { recursive: true });
  }

  copy(src: string, dest: string): void {
    fs.cpSync(src, dest, { recursive: true, force: true });
  }

  copyFile(src: string, dest: string): void {
    fs.copyFileSync(src, dest);
  }

  rename(src: string, dest: string): void {
    fs.renameSync(src, dest);
  }

  mkdir(p: string, mode: number): void {
    fs.mkdirSync(p, { recursive: true, mode });
  }

  readdir(p: string): string[] {
    return fs.readdirSync(p);
  }

  open(p: string, flags: string): number {
    return fs.openSync(p, flags);
  }
}

// ---------------------------------------------------------------------------
// moveEntry: rename with a cross-device fallback
// ---------------------------------------------------------------------------

/**
 * Move `src` to `dest`. When the OS refuses to rename across devices
 * (EXDEV) the entry is copied and the source removed.
 */
export function moveEntry(fsys: FileSystem, src: string, dest: string): void {
  try {
    fsys.rename(src, dest);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    fsys.copy(src, dest);
    fsys.remove(src);
  }
}

// ---------------------------------------------------------------------------
// walk: depth-first traversal
// ---------------------------------------------------------------------------

/**
 * Yield `root` and every entry below it, depth-first, children in sorted
 * order. Symbolic links are reported but not followed. An entry that cannot
 * be stat'ed, or a directory that cannot be listed, is reported through
 * `onError` and skipped.
 */
export function* walk(
  fsys: FileSystem,
  root: string,
  onError?: (entry: string, err: unknown) => void,
): Generator<string> {
  const stack = [root];
  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    let stats: fs.Stats | null;
    try {
      stats = fsys.lstat(current);
    } catch (err) {
      onError?.(current, err);
      continue;
    }
    if (!stats) continue;
    yield current;
    if (!stats.isDirectory()) continue;

    let children: string[];
    try {
      children = fsys.readdir(current);
    } catch (err) {
      onError?.(current, err);
      continue;
    }
    const dir = current;
    for (const child of children.sort().reverse()) {
      stack.push(path.join(dir, child));
    }
  }
}
