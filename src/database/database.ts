/**
 * Local repository index with batched add/remove operations.
 * @module database/database
 */

import { access, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DistError } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';
import type { ChunkDigest, FileDigest } from '../package/digest.js';
import type { PackageRecord } from '../package/record.js';
import { recordFromFile, registryName } from '../package/record.js';
import type { IndexTool, Signer } from '../process/tools.js';
import { compareVersions, formatVersion } from '../version/version.js';
import { readIndexArchive } from './archive.js';

/**
 * Default interval between lock file checks.
 */
export const DEFAULT_LOCK_POLL_INTERVAL_MS = 500;

/**
 * Default extension given to a newly created index archive.
 */
export const DEFAULT_ARCHIVE_EXTENSION = '.tar.zst';

/**
 * Collaborators and settings for a database.
 */
export interface LocalDatabaseOptions {
  indexTool: IndexTool;
  signer: Signer;
  logger?: Logger;
  lockPollIntervalMs?: number;
  /** Appended to the database path when creating a new index */
  archiveExtension?: string;
}

/**
 * A package file staged for addition.
 */
export interface StagedPackage {
  readonly record: PackageRecord;
  readonly file: string;
  /** Digests of the file's slices, as hashed when it was staged */
  readonly chunks: readonly ChunkDigest[];
}

/**
 * Options for `LocalDatabase.add`.
 */
export interface AddOptions {
  /** Accept a version older than the current one */
  allowDowngrade?: boolean;
}

/**
 * Operations waiting for the next `save()`.
 */
export interface PendingOperations {
  readonly removals: readonly PackageRecord[];
  readonly additions: readonly StagedPackage[];
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * In-memory mirror of an on-disk repository index.
 *
 * Not safe for concurrent use; callers serialize access per database.
 */
export class LocalDatabase {
  private records = new Map<string, PackageRecord>();
  private removals: PackageRecord[] = [];
  private stagedAdds = new Map<string, StagedPackage>();
  private readonly logger: Logger;
  private readonly lockPollIntervalMs: number;

  private constructor(
    readonly path: string,
    records: readonly PackageRecord[],
    private readonly options: LocalDatabaseOptions
  ) {
    this.logger = options.logger ?? new NoOpLogger();
    this.lockPollIntervalMs = options.lockPollIntervalMs ?? DEFAULT_LOCK_POLL_INTERVAL_MS;
    this.replaceRecords(records);
  }

  /**
   * Loads the index at `path`, creating an empty signed one if it is missing.
   */
  static async load(path: string, options: LocalDatabaseOptions): Promise<LocalDatabase> {
    const logger = options.logger ?? new NoOpLogger();

    if (!(await pathExists(path))) {
      await mkdir(dirname(path), { recursive: true });

      const archive = `${path}${options.archiveExtension ?? DEFAULT_ARCHIVE_EXTENSION}`;
      logger.info(`Creating new database ${path}`);
      await options.indexTool.create(archive);
      await options.signer.sign(path);

      return new LocalDatabase(path, [], options);
    }

    const records = await readIndexArchive(path);
    logger.info(`Loaded ${records.length} package${records.length === 1 ? '' : 's'} from ${path}`);
    return new LocalDatabase(path, records, options);
  }

  /**
   * Packages currently on disk, sorted by name.
   */
  packages(): PackageRecord[] {
    return [...this.records.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Gets the on-disk record for a package.
   */
  get(name: string): PackageRecord | undefined {
    return this.records.get(name);
  }

  /**
   * Checks whether a package is on disk.
   */
  contains(name: string): boolean {
    return this.records.has(name);
  }

  /**
   * Operations queued for the next save.
   */
  pending(): PendingOperations {
    return {
      removals: [...this.removals],
      additions: [...this.stagedAdds.values()],
    };
  }

  /**
   * Stages a package file.
   *
   * @returns false when the same version with the same content is already present
   * @throws DistError with kind `DowngradeRejected` for an older version
   */
  async add(file: string, digest: FileDigest, options: AddOptions = {}): Promise<boolean> {
    const record = recordFromFile(file, digest);
    registryName(record.name);

    const staged = this.stagedAdds.get(record.name);
    const onDisk = this.records.get(record.name);
    // a queued removal still sets the floor for what may replace the package
    const current = staged?.record ?? onDisk;
    const removing = staged === undefined && onDisk !== undefined && this.removals.includes(onDisk);

    if (current) {
      const cmp = compareVersions(record.version, current.version);
      if (cmp < 0 && !options.allowDowngrade) {
        throw DistError.downgradeRejected(
          record.name,
          formatVersion(record.version),
          formatVersion(current.version)
        );
      }
      if (cmp === 0 && record.contentHash !== current.contentHash) {
        this.logger.warn(
          `${record.name} ${formatVersion(record.version)}: content changed without a version change`,
          { previous: current.contentHash, current: record.contentHash }
        );
      } else if (cmp === 0 && !removing) {
        this.logger.info(`${record.name} ${formatVersion(record.version)} is already present`);
        return false;
      }
    }

    const sigFile = `${file}.sig`;
    if (!(await pathExists(sigFile))) {
      this.logger.debug(`Signing ${file}`);
      await this.options.signer.sign(file);
    }

    if (onDisk && !this.removals.includes(onDisk)) {
      this.removals.push(onDisk);
    }
    this.stagedAdds.set(record.name, { record, file, chunks: digest.chunks });

    if (current) {
      this.logger.info(
        `* ${record.name} (${formatVersion(current.version)} -> ${formatVersion(record.version)})`
      );
    } else {
      this.logger.info(`+ ${record.name}: ${formatVersion(record.version)}`);
    }
    return true;
  }

  /**
   * Queues removal of an on-disk package.
   *
   * A later `add` of the same name before `save()` is still checked against
   * the removed version.
   */
  remove(record: PackageRecord): void {
    const onDisk = this.records.get(record.name);
    if (!onDisk) {
      this.logger.warn(`Package '${record.name}' is not in the database, ignoring removal`);
      return;
    }
    if (!this.removals.includes(onDisk)) {
      this.removals.push(onDisk);
    }
  }

  /**
   * Applies queued removals then additions to the on-disk index, signs it and
   * reloads.
   *
   * @returns the packages that were staged, for upload
   */
  async save(): Promise<StagedPackage[]> {
    if (this.removals.length === 0 && this.stagedAdds.size === 0) {
      return [];
    }

    await this.waitForLock();

    const removals = this.removals;
    const additions = [...this.stagedAdds.values()];

    try {
      if (removals.length > 0) {
        this.logger.info(`Removing ${removals.length} package${removals.length === 1 ? '' : 's'}`);
        await this.options.indexTool.remove(this.path, removals.map(r => r.name));
      }

      if (additions.length > 0) {
        this.logger.info(`Adding ${additions.length} package${additions.length === 1 ? '' : 's'}`);
        await this.options.indexTool.add(this.path, additions.map(a => a.file), {
          preventDowngrade: true,
        });
      }

      await this.options.signer.sign(this.path);
    } finally {
      this.discardPending();
    }

    this.replaceRecords(await readIndexArchive(this.path));
    this.logger.info('Updated database on disk');

    return additions;
  }

  /**
   * Signs the index if its detached signature is missing.
   *
   * @returns the signature path
   */
  async ensureSignature(): Promise<string> {
    const sigFile = `${this.path}.sig`;
    if (!(await pathExists(sigFile))) {
      this.logger.info(`Signing ${this.path}`);
      await this.options.signer.sign(this.path);
    }
    return sigFile;
  }

  private async waitForLock(): Promise<void> {
    const lockFile = `${this.path}.lck`;
    while (await pathExists(lockFile)) {
      this.logger.info('Database is locked, waiting...', { lockFile });
      await this.sleep(this.lockPollIntervalMs);
    }
  }

  private discardPending(): void {
    this.removals = [];
    this.stagedAdds = new Map();
  }

  private replaceRecords(records: readonly PackageRecord[]): void {
    this.records = new Map(records.map(r => [r.name, r]));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
