/**
 * Pacman package distribution over an OCI registry.
 *
 * - Local repository index with batched, signed rebuilds
 * - Content-addressed package upload with multi-platform indexes
 * - Index publication as release assets
 * - Package download with version and platform selection
 * - Streaming upload of large directory trees
 * - In-memory registry and release host for testing
 *
 * @module pacman-registry-sync
 */

// Errors
export {
  DistError,
  DistErrorKind,
  categoryOf,
  errorKindFromStatus,
  isDistError,
  isRetryable,
  toError,
  type DistErrorCategory,
  type DistErrorOptions,
} from './errors.js';

// Config
export {
  DistConfig,
  DistConfigBuilder,
  createDefaultConfig,
  validateConfig,
  DEFAULT_REGISTRY_URL,
  DEFAULT_MANIFEST_OS,
  DEFAULT_SOURCE_URL_BASE,
  DEFAULT_USER_AGENT,
  DEFAULT_MAX_BLOB_SIZE,
  DEFAULT_PIPELINE_BLOB_SIZE,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_WORKERS,
  DEFAULT_BUNDLE_NAME,
  type RegistryConfig,
  type RepositoryConfig,
  type ReleasesConfig,
  type DatabaseConfig,
  type ToolsConfig,
  type UploadConfig,
  type PipelineConfig,
  type BundleConfig,
  type PartialDistConfig,
} from './config.js';

// Observability
export {
  ConsoleLogger,
  NoOpLogger,
  InMemoryLogger,
  NoOpProgressReporter,
  LoggerProgressReporter,
  type Logger,
  type LogLevel,
  type LogEntry,
  type ProgressReporter,
  type ProgressHandle,
} from './observability/index.js';

// Versions
export {
  vercmp,
  compareSegments,
} from './version/vercmp.js';
export {
  createVersion,
  formatVersion,
  parseVersion,
  compareVersions,
  versionsEqual,
  sanitizeVersion,
  sanitizeVersionString,
  unsanitizeVersion,
  type Version,
} from './version/version.js';

// Packages
export {
  SUPPORTED_ARCHES,
  PACKAGE_EXTENSIONS,
  NAME_REPLACEMENTS,
  checkArch,
  parsePackageFileName,
  recordFromFile,
  recordFromDesc,
  recordToDesc,
  registryName,
  platformForArch,
  formatRecord,
  type PackageArch,
  type PackageRecord,
} from './package/record.js';
export {
  DEFAULT_CHUNK_SIZE,
  digestFile,
  readFileChunks,
  sha256Hex,
  type ChunkDigest,
  type FileDigest,
} from './package/digest.js';

// External tools
export {
  ProcessRunner,
  runChecked,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './process/runner.js';
export {
  RepoTool,
  GpgSigner,
  type IndexTool,
  type Signer,
  type ToolPaths,
} from './process/tools.js';

// Local database
export {
  detectCompression,
  readIndexArchive,
  writeIndexArchive,
  type ArchiveCompression,
} from './database/archive.js';
export {
  LocalDatabase,
  type LocalDatabaseOptions,
  type StagedPackage,
  type AddOptions,
  type PendingOperations,
} from './database/database.js';

// Registry
export {
  RegistryAuth,
  SecretString,
  buildScope,
  type FetchFn,
  type RegistryAuthOptions,
} from './auth/registry-auth.js';
export {
  MediaType,
  Annotation,
  PlatformUtils,
  contentDigest,
  manifestConfig,
  serializeManifest,
  parseManifest,
  serializeIndex,
  parseIndex,
  type Platform,
  type BlobRef,
  type PackageManifest,
  type ManifestDescriptor,
  type ManifestIndex,
} from './registry/types.js';
export {
  RegistryClient,
  Existence,
  UploadResult,
  type ExistenceCheck,
  type RegistryClientOptions,
} from './registry/client.js';

// Release assets
export {
  GitHubReleaseHost,
  replaceReleaseAssets,
  type ReleaseAssetHost,
  type Release,
  type ReleaseAsset,
  type AssetFile,
  type GitHubReleaseHostOptions,
} from './releases/host.js';

// Repositories
export {
  Repository,
  type RepositoryOptions,
  type SyncOptions,
  type SyncReport,
  type PackageFailure,
  type PublishedVersion,
  type FetchPackageOptions,
  type FetchedPackage,
} from './repository/repository.js';
export {
  PackageRegistry,
  type PackageRegistryOptions,
  type AddRepositoryOptions,
  type PackageRegistryOverrides,
  type UploadBundleOptions,
} from './repository/package-registry.js';

// Streaming upload
export { BoundedQueue, type QueueResult } from './pipeline/queue.js';
export { RetryExecutor, createRetryExecutor, type RetryConfig, type RetryHooks } from './pipeline/retry.js';
export { walkTree, type TreeEntry } from './pipeline/tree.js';
export {
  StreamingUploadPipeline,
  type StreamingUploadOptions,
  type UploadTarget,
  type PipelineStats,
  type PipelineResult,
} from './pipeline/pipeline.js';
export {
  BUNDLE_DIR,
  readBundleInfo,
  uploadBundle,
  type BundleInfo,
  type BundleUploadOptions,
} from './pipeline/bundle.js';

// Simulation
export { MockRegistry, type MockRegistryOptions, type LoggedRequest } from './simulation/mock-registry.js';
export { MemoryReleaseHost, type ReleaseHostOperation } from './simulation/memory-release-host.js';
export { ArchiveIndexTool, StubSigner, type IndexToolCall } from './simulation/index-tool.js';
