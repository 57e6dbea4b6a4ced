/**
 * Ordered directory walk.
 * @module pipeline/tree
 */

import { lstat, readdir, readlink } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * One entry below the walked root.
 */
export interface TreeEntry {
  /** Path relative to the root, `/`-separated, with the configured prefix */
  readonly name: string;
  readonly path: string;
  readonly type: 'file' | 'directory' | 'symlink';
  readonly size: number;
  readonly mode: number;
  readonly mtime: Date;
  /** Link target, for symlinks */
  readonly linkname?: string;
}

/**
 * Walks `root` depth-first, yielding each directory before its children and
 * siblings in name order. Entries that are neither files, directories nor
 * symlinks are skipped; symlinks are not followed.
 */
export async function* walkTree(root: string, prefix = ''): AsyncGenerator<TreeEntry> {
  const names = (await readdir(root)).sort();

  for (const entryName of names) {
    const path = join(root, entryName);
    const name = prefix ? `${prefix}/${entryName}` : entryName;
    const stats = await lstat(path);
    const mode = stats.mode & 0o7777;

    if (stats.isSymbolicLink()) {
      yield { name, path, type: 'symlink', size: 0, mode, mtime: stats.mtime, linkname: await readlink(path) };
    } else if (stats.isDirectory()) {
      yield { name, path, type: 'directory', size: 0, mode, mtime: stats.mtime };
      yield* walkTree(path, name);
    } else if (stats.isFile()) {
      yield { name, path, type: 'file', size: stats.size, mode, mtime: stats.mtime };
    }
  }
}
