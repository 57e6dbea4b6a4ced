/**
 * Collaborators that shell out: the repository index tools and the signer.
 * @module process/tools
 */

import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';
import { DistError, toError } from '../errors.js';
import type { CommandRunner } from './runner.js';
import { runChecked } from './runner.js';

/**
 * Warning printed by repo-add when it creates an empty index.
 */
const EMPTY_DATABASE_WARNING = '==> WARNING: No packages remain, creating empty database.';

/**
 * Rebuilds an on-disk repository index.
 */
export interface IndexTool {
  /** Creates an empty index archive at `archivePath`. */
  create(archivePath: string): Promise<void>;
  /** Adds package files to the index. */
  add(dbPath: string, files: readonly string[], options?: { preventDowngrade?: boolean }): Promise<void>;
  /** Removes packages from the index by name. */
  remove(dbPath: string, names: readonly string[]): Promise<void>;
}

/**
 * Produces detached signatures.
 */
export interface Signer {
  /**
   * Writes a detached signature for `file`, overwriting any existing one.
   * @returns the signature path
   */
  sign(file: string): Promise<string>;
}

/**
 * Executables used by the tools.
 */
export interface ToolPaths {
  repoAdd: string;
  repoRemove: string;
  gpg: string;
}

/**
 * `IndexTool` driving `repo-add` and `repo-remove`.
 */
export class RepoTool implements IndexTool {
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: Pick<ToolPaths, 'repoAdd' | 'repoRemove'>,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoOpLogger();
  }

  async create(archivePath: string): Promise<void> {
    const result = await runChecked(this.runner, this.paths.repoAdd, ['--quiet', archivePath]);
    for (const line of `${result.stdout}\n${result.stderr}`.split('\n')) {
      if (line.trim().length > 0 && line.trim() !== EMPTY_DATABASE_WARNING) {
        this.logger.info(line);
      }
    }
  }

  async add(
    dbPath: string,
    files: readonly string[],
    options: { preventDowngrade?: boolean } = {}
  ): Promise<void> {
    const flags = options.preventDowngrade === false ? ['--quiet'] : ['--quiet', '--prevent-downgrade'];
    await runChecked(this.runner, this.paths.repoAdd, [...flags, dbPath, ...files]);
  }

  async remove(dbPath: string, names: readonly string[]): Promise<void> {
    await runChecked(this.runner, this.paths.repoRemove, ['--quiet', dbPath, ...names]);
  }
}

/**
 * `Signer` that calls `gpg --detach-sig` through the agent.
 */
export class GpgSigner implements Signer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly gpgPath: string = 'gpg'
  ) {}

  async sign(file: string): Promise<string> {
    const output = `${file}.sig`;
    try {
      await runChecked(this.runner, this.gpgPath, [
        '--use-agent',
        '--yes',
        '--output',
        output,
        '--detach-sig',
        file,
      ]);
    } catch (error) {
      throw DistError.signingFailed(file, toError(error));
    }
    return output;
  }
}
