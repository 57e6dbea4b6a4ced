/**
 * Configuration for the package distribution engine.
 * @module config
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute } from 'node:path';
import { z } from 'zod';
import { DEFAULT_ARCHIVE_EXTENSION, DEFAULT_LOCK_POLL_INTERVAL_MS } from './database/database.js';
import { DistError, toError } from './errors.js';
import { DEFAULT_API_BASE, DEFAULT_UPLOADS_BASE } from './releases/host.js';

/**
 * Default registry URL.
 */
export const DEFAULT_REGISTRY_URL = 'https://ghcr.io';

/**
 * Default OS recorded on platform-specific manifests.
 */
export const DEFAULT_MANIFEST_OS = 'darwin';

/**
 * Default prefix of the source URL annotation.
 */
export const DEFAULT_SOURCE_URL_BASE = 'https://github.com/';

/**
 * Default User-Agent header.
 */
export const DEFAULT_USER_AGENT = 'pacman-registry-sync/0.1.0';

/**
 * Default maximum size of one package layer (500 MiB).
 */
export const DEFAULT_MAX_BLOB_SIZE = 500 * 1024 * 1024;

/**
 * Default bundle blob size (512 MiB).
 */
export const DEFAULT_PIPELINE_BLOB_SIZE = 512 * 1024 * 1024;

/**
 * Default bundle queue capacity.
 */
export const DEFAULT_QUEUE_CAPACITY = 20;

/**
 * Default number of bundle upload workers.
 */
export const DEFAULT_WORKERS = 2;

/**
 * Default gzip level for bundles.
 */
export const DEFAULT_COMPRESSION_LEVEL = 6;

/**
 * Default extra attempts per bundle blob.
 */
export const DEFAULT_BLOB_RETRIES = 2;

/**
 * Default bundle manifest name.
 */
export const DEFAULT_BUNDLE_NAME = 'sandbox-vm';

/**
 * Registry connection settings.
 */
export interface RegistryConfig {
  /** Registry base URL */
  readonly url: string;
  /** User token exchanged for bearer tokens; also used for release assets */
  readonly token: string;
  /** OS recorded on platform-specific manifests */
  readonly manifestOs: string;
  /** Prefix joined with a remote to form the source annotation */
  readonly sourceUrlBase: string;
  readonly userAgent: string;
}

/**
 * One package channel.
 */
export interface RepositoryConfig {
  readonly name: string;
  /** Owner path on the registry and the release host, e.g. `owner/repo` */
  readonly remote: string;
  /** Index path, ending in `.db` */
  readonly database: string;
  /** Release holding the index assets */
  readonly releaseName: string;
  /** Absolute directory holding package sources */
  readonly rootDir?: string;
}

/**
 * Release host endpoints.
 */
export interface ReleasesConfig {
  readonly apiBase: string;
  readonly uploadsBase: string;
}

/**
 * Local index settings.
 */
export interface DatabaseConfig {
  readonly lockPollIntervalMs: number;
  readonly archiveExtension: string;
}

/**
 * External executables.
 */
export interface ToolsConfig {
  readonly repoAdd: string;
  readonly repoRemove: string;
  readonly gpg: string;
}

/**
 * Package upload settings.
 */
export interface UploadConfig {
  readonly maxBlobSize: number;
}

/**
 * Streaming bundle pipeline settings.
 */
export interface PipelineConfig {
  readonly blobSize: number;
  readonly queueCapacity: number;
  readonly workers: number;
  readonly compressionLevel: number;
  /** Extra attempts per blob after the first failure */
  readonly maxRetries: number;
  /** Delay before the first retry */
  readonly retryDelayMs: number;
}

/**
 * Bundle settings.
 */
export interface BundleConfig {
  /** Manifest and namespace name */
  readonly name: string;
  /** Directory containing `vm.bundle` */
  readonly path?: string;
  /** Remote overriding the repository's */
  readonly remote?: string;
}

/**
 * Complete configuration.
 */
export interface DistConfig {
  readonly registry: RegistryConfig;
  readonly repositories: readonly RepositoryConfig[];
  readonly releases: ReleasesConfig;
  readonly database: DatabaseConfig;
  readonly tools: ToolsConfig;
  readonly upload: UploadConfig;
  readonly pipeline: PipelineConfig;
  readonly bundle: BundleConfig;
}

const repositorySchema = z.object({
  name: z.string().min(1),
  remote: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo'),
  database: z.string().min(1).refine(p => p.endsWith('.db'), 'database path should end in .db, without .tar.*'),
  releaseName: z.string().min(1),
  rootDir: z.string().refine(p => isAbsolute(p), 'root dir should be an absolute path').optional(),
});

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  registry: z.object({
    url: z.string().url(),
    token: z.string(),
    manifestOs: z.string().min(1),
    sourceUrlBase: z.string().url(),
    userAgent: z.string().min(1),
  }),
  repositories: z.array(repositorySchema).superRefine((repos, ctx) => {
    const seen = new Set<string>();
    for (const repo of repos) {
      if (seen.has(repo.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate repository '${repo.name}'` });
      }
      seen.add(repo.name);
    }
  }),
  releases: z.object({
    apiBase: z.string().url(),
    uploadsBase: z.string().url(),
  }),
  database: z.object({
    lockPollIntervalMs: z.number().int().positive(),
    archiveExtension: z.string().regex(/^\.tar(\.(gz|xz|zst|bz2))?$/),
  }),
  tools: z.object({
    repoAdd: z.string().min(1),
    repoRemove: z.string().min(1),
    gpg: z.string().min(1),
  }),
  upload: z.object({
    maxBlobSize: z.number().int().positive(),
  }),
  pipeline: z.object({
    blobSize: z.number().int().positive(),
    queueCapacity: z.number().int().positive(),
    workers: z.number().int().positive().max(64),
    compressionLevel: z.number().int().min(0).max(9),
    maxRetries: z.number().int().nonnegative().max(10),
    retryDelayMs: z.number().nonnegative(),
  }),
  bundle: z.object({
    name: z.string().min(1),
    path: z.string().optional(),
    remote: z.string().optional(),
  }),
});

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): DistConfig {
  return {
    registry: {
      url: DEFAULT_REGISTRY_URL,
      token: '',
      manifestOs: DEFAULT_MANIFEST_OS,
      sourceUrlBase: DEFAULT_SOURCE_URL_BASE,
      userAgent: DEFAULT_USER_AGENT,
    },
    repositories: [],
    releases: {
      apiBase: DEFAULT_API_BASE,
      uploadsBase: DEFAULT_UPLOADS_BASE,
    },
    database: {
      lockPollIntervalMs: DEFAULT_LOCK_POLL_INTERVAL_MS,
      archiveExtension: DEFAULT_ARCHIVE_EXTENSION,
    },
    tools: {
      repoAdd: 'repo-add',
      repoRemove: 'repo-remove',
      gpg: 'gpg',
    },
    upload: {
      maxBlobSize: DEFAULT_MAX_BLOB_SIZE,
    },
    pipeline: {
      blobSize: DEFAULT_PIPELINE_BLOB_SIZE,
      queueCapacity: DEFAULT_QUEUE_CAPACITY,
      workers: DEFAULT_WORKERS,
      compressionLevel: DEFAULT_COMPRESSION_LEVEL,
      maxRetries: DEFAULT_BLOB_RETRIES,
      retryDelayMs: 1000,
    },
    bundle: {
      name: DEFAULT_BUNDLE_NAME,
    },
  };
}

/**
 * Validates a configuration.
 */
export function validateConfig(config: DistConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw DistError.configError(`Invalid configuration: ${issues.join(', ')}`);
  }
}

/**
 * Partial configuration for `DistConfig.from`.
 */
export type PartialDistConfig = Partial<{
  registry: Partial<RegistryConfig>;
  repositories: readonly RepositoryConfig[];
  releases: Partial<ReleasesConfig>;
  database: Partial<DatabaseConfig>;
  tools: Partial<ToolsConfig>;
  upload: Partial<UploadConfig>;
  pipeline: Partial<PipelineConfig>;
  bundle: Partial<BundleConfig>;
}>;

/**
 * Configuration builder.
 */
export class DistConfigBuilder {
  private config: DistConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Sets the registry URL.
   */
  registryUrl(value: string): this {
    this.config = { ...this.config, registry: { ...this.config.registry, url: value } };
    return this;
  }

  /**
   * Sets the user token.
   */
  token(value: string): this {
    this.config = { ...this.config, registry: { ...this.config.registry, token: value } };
    return this;
  }

  /**
   * Sets the manifest OS.
   */
  manifestOs(value: string): this {
    this.config = { ...this.config, registry: { ...this.config.registry, manifestOs: value } };
    return this;
  }

  /**
   * Sets the User-Agent header.
   */
  userAgent(value: string): this {
    this.config = { ...this.config, registry: { ...this.config.registry, userAgent: value } };
    return this;
  }

  /**
   * Adds a repository.
   */
  repository(value: RepositoryConfig): this {
    this.config = { ...this.config, repositories: [...this.config.repositories, value] };
    return this;
  }

  releases(value: Partial<ReleasesConfig>): this {
    this.config = { ...this.config, releases: { ...this.config.releases, ...value } };
    return this;
  }

  database(value: Partial<DatabaseConfig>): this {
    this.config = { ...this.config, database: { ...this.config.database, ...value } };
    return this;
  }

  tools(value: Partial<ToolsConfig>): this {
    this.config = { ...this.config, tools: { ...this.config.tools, ...value } };
    return this;
  }

  /**
   * Sets the maximum package layer size.
   */
  maxBlobSize(value: number): this {
    this.config = { ...this.config, upload: { maxBlobSize: value } };
    return this;
  }

  pipeline(value: Partial<PipelineConfig>): this {
    this.config = { ...this.config, pipeline: { ...this.config.pipeline, ...value } };
    return this;
  }

  bundle(value: Partial<BundleConfig>): this {
    this.config = { ...this.config, bundle: { ...this.config.bundle, ...value } };
    return this;
  }

  /**
   * Builds and validates the configuration.
   */
  build(): DistConfig {
    validateConfig(this.config);
    return { ...this.config };
  }
}

const optionalPositiveInt = z.number().int().positive().optional();

/**
 * On-disk configuration layout (kebab-case keys).
 */
const fileSchema = z.object({
  registry: z.object({
    'url': z.string(),
    'token': z.string(),
    'manifest-os': z.string().optional(),
    'source-url-base': z.string().optional(),
    'user-agent': z.string().optional(),
  }),
  repository: z.record(z.object({
    'remote': z.string(),
    'database': z.string(),
    'release-name': z.string(),
    'root-dir': z.string().optional(),
  })).optional(),
  releases: z.object({
    'api-base': z.string().optional(),
    'uploads-base': z.string().optional(),
  }).optional(),
  database: z.object({
    'lock-poll-interval-ms': optionalPositiveInt,
    'archive-extension': z.string().optional(),
  }).optional(),
  tools: z.object({
    'repo-add': z.string().optional(),
    'repo-remove': z.string().optional(),
    'gpg': z.string().optional(),
  }).optional(),
  upload: z.object({
    'max-blob-size': optionalPositiveInt,
  }).optional(),
  pipeline: z.object({
    'blob-size': optionalPositiveInt,
    'queue-capacity': optionalPositiveInt,
    'workers': optionalPositiveInt,
    'compression-level': z.number().int().optional(),
    'max-retries': z.number().int().optional(),
    'retry-delay-ms': z.number().optional(),
  }).optional(),
  sandbox: z.object({
    'bundle-name': z.string().optional(),
    'path': z.string().optional(),
    'remote': z.string().optional(),
  }).optional(),
});

type ConfigFile = z.infer<typeof fileSchema>;

/**
 * Overlays the defined values of `overrides` onto `defaults`.
 */
function merge<T extends object>(defaults: T, overrides?: Partial<T>): T {
  if (!overrides) {
    return { ...defaults };
  }
  const defined = Object.entries(overrides).filter(([, v]) => v !== undefined);
  return { ...defaults, ...Object.fromEntries(defined) };
}

function fromFileLayout(file: ConfigFile): PartialDistConfig {
  return {
    registry: {
      url: file.registry['url'],
      token: file.registry['token'],
      manifestOs: file.registry['manifest-os'],
      sourceUrlBase: file.registry['source-url-base'],
      userAgent: file.registry['user-agent'],
    },
    repositories: Object.entries(file.repository ?? {}).map(([name, repo]) => ({
      name,
      remote: repo['remote'],
      database: repo['database'],
      releaseName: repo['release-name'],
      ...(repo['root-dir'] !== undefined ? { rootDir: repo['root-dir'] } : {}),
    })),
    releases: {
      apiBase: file.releases?.['api-base'],
      uploadsBase: file.releases?.['uploads-base'],
    },
    database: {
      lockPollIntervalMs: file.database?.['lock-poll-interval-ms'],
      archiveExtension: file.database?.['archive-extension'],
    },
    tools: {
      repoAdd: file.tools?.['repo-add'],
      repoRemove: file.tools?.['repo-remove'],
      gpg: file.tools?.['gpg'],
    },
    upload: {
      maxBlobSize: file.upload?.['max-blob-size'],
    },
    pipeline: {
      blobSize: file.pipeline?.['blob-size'],
      queueCapacity: file.pipeline?.['queue-capacity'],
      workers: file.pipeline?.['workers'],
      compressionLevel: file.pipeline?.['compression-level'],
      maxRetries: file.pipeline?.['max-retries'],
      retryDelayMs: file.pipeline?.['retry-delay-ms'],
    },
    bundle: {
      name: file.sandbox?.['bundle-name'],
      path: file.sandbox?.['path'],
      remote: file.sandbox?.['remote'],
    },
  };
}

function parseIntEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw DistError.configError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * DistConfig namespace with factory methods.
 */
export const DistConfig = {
  /**
   * Creates a new configuration builder.
   */
  builder(): DistConfigBuilder {
    return new DistConfigBuilder();
  },

  /**
   * Creates the default configuration.
   */
  default(): DistConfig {
    return createDefaultConfig();
  },

  /**
   * Creates configuration from `PMSYNC_*` environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): DistConfig {
    const builder = new DistConfigBuilder();

    if (env['PMSYNC_REGISTRY_URL']) {
      builder.registryUrl(env['PMSYNC_REGISTRY_URL']);
    }

    if (env['PMSYNC_REGISTRY_TOKEN']) {
      builder.token(env['PMSYNC_REGISTRY_TOKEN']);
    }

    if (env['PMSYNC_MANIFEST_OS']) {
      builder.manifestOs(env['PMSYNC_MANIFEST_OS']);
    }

    if (env['PMSYNC_USER_AGENT']) {
      builder.userAgent(env['PMSYNC_USER_AGENT']);
    }

    if (env['PMSYNC_MAX_BLOB_SIZE']) {
      builder.maxBlobSize(parseIntEnv('PMSYNC_MAX_BLOB_SIZE', env['PMSYNC_MAX_BLOB_SIZE']));
    }

    if (env['PMSYNC_LOCK_POLL_INTERVAL_MS']) {
      builder.database({
        lockPollIntervalMs: parseIntEnv('PMSYNC_LOCK_POLL_INTERVAL_MS', env['PMSYNC_LOCK_POLL_INTERVAL_MS']),
      });
    }

    if (env['PMSYNC_PIPELINE_WORKERS']) {
      builder.pipeline({ workers: parseIntEnv('PMSYNC_PIPELINE_WORKERS', env['PMSYNC_PIPELINE_WORKERS']) });
    }

    if (env['PMSYNC_QUEUE_CAPACITY']) {
      builder.pipeline({ queueCapacity: parseIntEnv('PMSYNC_QUEUE_CAPACITY', env['PMSYNC_QUEUE_CAPACITY']) });
    }

    if (env['PMSYNC_BUNDLE_PATH']) {
      builder.bundle({ path: env['PMSYNC_BUNDLE_PATH'] });
    }

    return builder.build();
  },

  /**
   * Loads configuration from a JSON file.
   */
  async fromFile(path: string): Promise<DistConfig> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      throw DistError.configError(`Cannot read config file '${path}': ${toError(error).message}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw DistError.configError(`Config file '${path}' is not valid JSON: ${toError(error).message}`);
    }

    const result = fileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw DistError.configError(`Invalid config file '${path}': ${issues.join(', ')}`);
    }

    const config = DistConfig.from(fromFileLayout(result.data));
    validateConfig(config);
    return config;
  },

  /**
   * Creates configuration from partial values.
   */
  from(partial: PartialDistConfig): DistConfig {
    const defaults = createDefaultConfig();
    return {
      registry: merge(defaults.registry, partial.registry),
      repositories: partial.repositories ?? defaults.repositories,
      releases: merge(defaults.releases, partial.releases),
      database: merge(defaults.database, partial.database),
      tools: merge(defaults.tools, partial.tools),
      upload: merge(defaults.upload, partial.upload),
      pipeline: merge(defaults.pipeline, partial.pipeline),
      bundle: merge(defaults.bundle, partial.bundle),
    };
  },

  /**
   * Validates a configuration.
   */
  validate(config: DistConfig): void {
    validateConfig(config);
  },
};
