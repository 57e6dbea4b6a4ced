/**
 * Registry endpoint plus the repository channels published to it.
 * @module repository/package-registry
 */

import type { FetchFn } from '../auth/registry-auth.js';
import { RegistryAuth } from '../auth/registry-auth.js';
import type { BundleConfig, DistConfig, PipelineConfig } from '../config.js';
import {
  DEFAULT_BLOB_RETRIES,
  DEFAULT_BUNDLE_NAME,
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_MANIFEST_OS,
  DEFAULT_PIPELINE_BLOB_SIZE,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_SOURCE_URL_BASE,
  DEFAULT_WORKERS,
  validateConfig,
} from '../config.js';
import { LocalDatabase } from '../database/database.js';
import { uploadBundle } from '../pipeline/bundle.js';
import type { PipelineResult } from '../pipeline/pipeline.js';
import { StreamingUploadPipeline } from '../pipeline/pipeline.js';
import { DistError } from '../errors.js';
import type { Logger, ProgressReporter } from '../observability/index.js';
import { NoOpLogger, NoOpProgressReporter } from '../observability/index.js';
import type { CommandRunner } from '../process/runner.js';
import { ProcessRunner } from '../process/runner.js';
import type { IndexTool, Signer } from '../process/tools.js';
import { GpgSigner, RepoTool } from '../process/tools.js';
import { RegistryClient } from '../registry/client.js';
import type { ReleaseAssetHost } from '../releases/host.js';
import { GitHubReleaseHost } from '../releases/host.js';
import { Repository } from './repository.js';

/**
 * Registry-wide settings.
 */
export interface PackageRegistryOptions {
  registryUrl: string;
  /** User token exchanged for per-remote bearer tokens */
  userToken: string;
  userAgent?: string;
  manifestOs?: string;
  sourceUrlBase?: string;
  maxBlobSize?: number;
  /** Streaming upload settings for bundles */
  pipeline?: Partial<PipelineConfig>;
  bundle?: Partial<BundleConfig>;
  fetch?: FetchFn;
  logger?: Logger;
  progress?: ProgressReporter;
}

/**
 * Options for `PackageRegistry.uploadBundle`.
 */
export interface UploadBundleOptions {
  /** Channel whose remote receives the bundle, unless the bundle names its own */
  repository?: string;
  signal?: AbortSignal;
}

/**
 * A repository channel to register.
 */
export interface AddRepositoryOptions {
  name: string;
  remote: string;
  /** Index path ending in `.db` */
  database: string;
  releaseName: string;
  rootDir?: string;
  indexTool: IndexTool;
  signer: Signer;
  releaseHost: ReleaseAssetHost;
  lockPollIntervalMs?: number;
  archiveExtension?: string;
}

/**
 * Collaborators replacing the ones `fromConfig` would build.
 */
export interface PackageRegistryOverrides {
  fetch?: FetchFn;
  runner?: CommandRunner;
  indexTool?: IndexTool;
  signer?: Signer;
  releaseHost?: ReleaseAssetHost;
  logger?: Logger;
  progress?: ProgressReporter;
}

/**
 * Owns the registry credentials, the token cache shared by every channel,
 * and the named channels.
 */
export class PackageRegistry {
  readonly url: string;
  readonly auth: RegistryAuth;

  private readonly repos = new Map<string, Repository>();
  private readonly options: PackageRegistryOptions;
  private readonly logger: Logger;

  constructor(options: PackageRegistryOptions) {
    this.options = options;
    this.url = options.registryUrl.replace(/\/+$/, '');
    this.logger = options.logger ?? new NoOpLogger();
    this.auth = new RegistryAuth({
      registryUrl: this.url,
      userToken: options.userToken,
      userAgent: options.userAgent,
      fetch: options.fetch,
      logger: this.logger,
    });
  }

  /**
   * Builds a registry and loads every configured channel.
   */
  static async fromConfig(
    config: DistConfig,
    overrides: PackageRegistryOverrides = {}
  ): Promise<PackageRegistry> {
    validateConfig(config);
    if (config.registry.token.length === 0) {
      throw DistError.configError('A registry token is required');
    }

    const logger = overrides.logger ?? new NoOpLogger();
    const runner = overrides.runner ?? new ProcessRunner(logger);
    const indexTool = overrides.indexTool ?? new RepoTool(runner, config.tools, logger);
    const signer = overrides.signer ?? new GpgSigner(runner, config.tools.gpg);
    const releaseHost =
      overrides.releaseHost ??
      new GitHubReleaseHost({
        token: config.registry.token,
        apiBase: config.releases.apiBase,
        uploadsBase: config.releases.uploadsBase,
        userAgent: config.registry.userAgent,
        fetch: overrides.fetch,
      });

    const registry = new PackageRegistry({
      registryUrl: config.registry.url,
      userToken: config.registry.token,
      userAgent: config.registry.userAgent,
      manifestOs: config.registry.manifestOs,
      sourceUrlBase: config.registry.sourceUrlBase,
      maxBlobSize: config.upload.maxBlobSize,
      pipeline: config.pipeline,
      bundle: config.bundle,
      fetch: overrides.fetch,
      logger,
      progress: overrides.progress,
    });

    for (const repo of config.repositories) {
      await registry.addRepository({
        ...repo,
        indexTool,
        signer,
        releaseHost,
        lockPollIntervalMs: config.database.lockPollIntervalMs,
        archiveExtension: config.database.archiveExtension,
      });
    }

    return registry;
  }

  /**
   * Loads a channel's index and registers it.
   *
   * @throws DistError with kind `InvalidConfig` for a duplicate name or a
   * database path not ending in `.db`
   */
  async addRepository(options: AddRepositoryOptions): Promise<Repository> {
    if (this.repos.has(options.name)) {
      throw DistError.configError(`Duplicate repository '${options.name}'`);
    }
    if (!options.database.endsWith('.db')) {
      throw DistError.configError(`Database path '${options.database}' should end in .db, without .tar.*`);
    }

    const database = await LocalDatabase.load(options.database, {
      indexTool: options.indexTool,
      signer: options.signer,
      logger: this.logger,
      lockPollIntervalMs: options.lockPollIntervalMs,
      archiveExtension: options.archiveExtension,
    });

    const repository = new Repository({
      name: options.name,
      remote: options.remote,
      releaseName: options.releaseName,
      rootDir: options.rootDir,
      database,
      client: this.createClient(options.remote),
      releaseHost: options.releaseHost,
      manifestOs: this.options.manifestOs ?? DEFAULT_MANIFEST_OS,
      sourceUrlBase: this.options.sourceUrlBase ?? DEFAULT_SOURCE_URL_BASE,
      maxBlobSize: this.options.maxBlobSize,
      logger: this.logger,
      progress: this.options.progress ?? new NoOpProgressReporter(),
    });

    // a duplicate may have been registered while the index was loading
    if (this.repos.has(options.name)) {
      throw DistError.configError(`Duplicate repository '${options.name}'`);
    }
    this.repos.set(options.name, repository);
    return repository;
  }

  getRepository(name: string): Repository | undefined {
    return this.repos.get(name);
  }

  /**
   * Registered channels in registration order.
   */
  repositories(): Repository[] {
    return [...this.repos.values()];
  }

  /**
   * The only channel, when exactly one is registered.
   */
  defaultRepository(): Repository | undefined {
    const [only, ...rest] = this.repos.values();
    return rest.length === 0 ? only : undefined;
  }

  /**
   * Uploads the configured sandbox bundle through the streaming pipeline.
   *
   * @throws DistError with kind `InvalidConfig` when no bundle path is set
   * or no remote can be chosen
   */
  async uploadBundle(options: UploadBundleOptions = {}): Promise<PipelineResult> {
    const bundle = this.options.bundle ?? {};
    if (!bundle.path) {
      throw DistError.configError('Sandbox bundle path is not configured');
    }

    let remote = bundle.remote;
    if (!remote) {
      const repository = options.repository
        ? this.getRepository(options.repository)
        : this.defaultRepository();
      if (!repository) {
        throw DistError.configError(
          options.repository
            ? `Repository '${options.repository}' does not exist`
            : 'Name a repository to upload the bundle to'
        );
      }
      remote = repository.remote;
    }

    const settings = this.options.pipeline ?? {};
    const pipeline = new StreamingUploadPipeline({
      client: this.createClient(remote),
      blobSize: settings.blobSize ?? DEFAULT_PIPELINE_BLOB_SIZE,
      queueCapacity: settings.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
      workers: settings.workers ?? DEFAULT_WORKERS,
      compressionLevel: settings.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL,
      maxRetries: settings.maxRetries ?? DEFAULT_BLOB_RETRIES,
      retryDelayMs: settings.retryDelayMs,
      logger: this.logger,
      progress: this.options.progress,
    });

    return uploadBundle(pipeline, {
      sandboxPath: bundle.path,
      name: bundle.name ?? DEFAULT_BUNDLE_NAME,
      remote,
      sourceUrlBase: this.options.sourceUrlBase ?? DEFAULT_SOURCE_URL_BASE,
      os: this.options.manifestOs ?? DEFAULT_MANIFEST_OS,
      signal: options.signal,
    });
  }

  /**
   * Client for a remote, sharing this registry's token cache.
   */
  createClient(remote: string): RegistryClient {
    return new RegistryClient({
      registryUrl: this.url,
      remote,
      auth: this.auth,
      userAgent: this.options.userAgent,
      fetch: this.options.fetch,
      logger: this.logger,
    });
  }
}
