/**
 * In-process stand-ins for the index rebuild tool and the signer.
 * @module simulation/index-tool
 */

import { access, symlink, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { DistError } from '../errors.js';
import { readIndexArchive, writeIndexArchive } from '../database/archive.js';
import { digestFile } from '../package/digest.js';
import type { PackageRecord } from '../package/record.js';
import { recordFromFile } from '../package/record.js';
import type { IndexTool, Signer } from '../process/tools.js';
import { compareVersions } from '../version/version.js';

/**
 * A recorded tool invocation.
 */
export interface IndexToolCall {
  readonly operation: 'create' | 'add' | 'remove';
  readonly path: string;
  readonly args: readonly string[];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * `IndexTool` that maintains gzip index archives directly, without repo-add.
 *
 * Creating `foo.db.tar.zst` also links `foo.db` to it, as repo-add does. The
 * archive is always gzip-compressed whatever its extension.
 */
export class ArchiveIndexTool implements IndexTool {
  readonly calls: IndexToolCall[] = [];
  /** When set, the next call of this operation fails */
  failNext?: IndexToolCall['operation'];

  async create(archivePath: string): Promise<void> {
    this.record('create', archivePath, []);
    await writeIndexArchive(archivePath, []);

    const dbPath = archivePath.replace(/\.tar(\.[a-z0-9]+)?$/, '');
    if (dbPath !== archivePath && !(await exists(dbPath))) {
      await symlink(basename(archivePath), dbPath);
    }
  }

  async add(
    dbPath: string,
    files: readonly string[],
    options: { preventDowngrade?: boolean } = {}
  ): Promise<void> {
    this.record('add', dbPath, files);

    const records = await this.readExisting(dbPath);
    const fileNames = new Map<string, string>();
    for (const file of files) {
      const record = recordFromFile(file, await digestFile(file));
      const existing = records.get(record.name);
      if (options.preventDowngrade && existing && compareVersions(record.version, existing.version) < 0) {
        continue;
      }
      records.set(record.name, record);
      fileNames.set(record.name, basename(file));
    }

    await writeIndexArchive(dbPath, [...records.values()], fileNames);
  }

  async remove(dbPath: string, names: readonly string[]): Promise<void> {
    this.record('remove', dbPath, names);

    const records = await this.readExisting(dbPath);
    for (const name of names) {
      records.delete(name);
    }
    await writeIndexArchive(dbPath, [...records.values()]);
  }

  private record(operation: IndexToolCall['operation'], path: string, args: readonly string[]): void {
    this.calls.push({ operation, path, args: [...args] });
    if (this.failNext === operation) {
      this.failNext = undefined;
      throw DistError.toolFailed(`repo-${operation}`, 1, 'simulated failure');
    }
  }

  private async readExisting(dbPath: string): Promise<Map<string, PackageRecord>> {
    if (!(await exists(dbPath))) {
      return new Map();
    }
    const records = await readIndexArchive(dbPath);
    return new Map(records.map(r => [r.name, r]));
  }
}

/**
 * `Signer` that writes a placeholder signature and remembers what it signed.
 */
export class StubSigner implements Signer {
  readonly signed: string[] = [];
  /** When true, every signing attempt fails */
  fail = false;

  async sign(file: string): Promise<string> {
    if (this.fail) {
      throw DistError.signingFailed(file);
    }
    const output = `${file}.sig`;
    await writeFile(output, `stub signature for ${basename(file)}\n`);
    this.signed.push(file);
    return output;
  }
}
