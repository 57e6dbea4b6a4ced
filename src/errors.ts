/**
 * Error types for the package distribution engine.
 * @module errors
 */

/**
 * Error kinds for categorizing distribution errors.
 */
export enum DistErrorKind {
  // Integrity errors
  Conflict = 'conflict',
  InvalidManifest = 'invalid_manifest',
  DigestMismatch = 'digest_mismatch',
  InvalidIndexArchive = 'invalid_index_archive',

  // Transient errors
  UploadFailed = 'upload_failed',
  ConnectionFailed = 'connection_failed',
  RateLimited = 'rate_limited',
  ServerError = 'server_error',
  ServiceUnavailable = 'service_unavailable',

  // Resource contention
  DatabaseLocked = 'database_locked',

  // Policy violations
  DowngradeRejected = 'downgrade_rejected',
  InvalidPackageName = 'invalid_package_name',
  UnsupportedArch = 'unsupported_arch',
  InvalidPackageFile = 'invalid_package_file',
  InvalidVersion = 'invalid_version',

  // Fatal configuration/process errors
  AuthFailed = 'auth_failed',
  Unauthorized = 'unauthorized',
  Forbidden = 'forbidden',
  ToolFailed = 'tool_failed',
  SigningFailed = 'signing_failed',
  InvalidConfig = 'invalid_config',
  InvalidBundle = 'invalid_bundle',

  // Lookup errors
  NotFound = 'not_found',
  ReleaseNotFound = 'release_not_found',
  PackageNotFound = 'package_not_found',
  AmbiguousPlatform = 'ambiguous_platform',

  // Aggregate errors
  SyncFailed = 'sync_failed',
  PipelineAborted = 'pipeline_aborted',

  Unknown = 'unknown',
}

/**
 * Error categories, following how each class of failure is handled.
 */
export type DistErrorCategory =
  | 'integrity'
  | 'transient'
  | 'contention'
  | 'policy'
  | 'fatal'
  | 'not_found'
  | 'aggregate';

const CATEGORIES: Readonly<Record<DistErrorKind, DistErrorCategory>> = {
  [DistErrorKind.Conflict]: 'integrity',
  [DistErrorKind.InvalidManifest]: 'integrity',
  [DistErrorKind.DigestMismatch]: 'integrity',
  [DistErrorKind.InvalidIndexArchive]: 'integrity',
  [DistErrorKind.UploadFailed]: 'transient',
  [DistErrorKind.ConnectionFailed]: 'transient',
  [DistErrorKind.RateLimited]: 'transient',
  [DistErrorKind.ServerError]: 'transient',
  [DistErrorKind.ServiceUnavailable]: 'transient',
  [DistErrorKind.DatabaseLocked]: 'contention',
  [DistErrorKind.DowngradeRejected]: 'policy',
  [DistErrorKind.InvalidPackageName]: 'policy',
  [DistErrorKind.UnsupportedArch]: 'policy',
  [DistErrorKind.InvalidPackageFile]: 'policy',
  [DistErrorKind.InvalidVersion]: 'policy',
  [DistErrorKind.AuthFailed]: 'fatal',
  [DistErrorKind.Unauthorized]: 'fatal',
  [DistErrorKind.Forbidden]: 'fatal',
  [DistErrorKind.ToolFailed]: 'fatal',
  [DistErrorKind.SigningFailed]: 'fatal',
  [DistErrorKind.InvalidConfig]: 'fatal',
  [DistErrorKind.InvalidBundle]: 'fatal',
  [DistErrorKind.NotFound]: 'not_found',
  [DistErrorKind.ReleaseNotFound]: 'not_found',
  [DistErrorKind.PackageNotFound]: 'not_found',
  [DistErrorKind.AmbiguousPlatform]: 'not_found',
  [DistErrorKind.SyncFailed]: 'aggregate',
  [DistErrorKind.PipelineAborted]: 'aggregate',
  [DistErrorKind.Unknown]: 'fatal',
};

/**
 * Gets the category of an error kind.
 */
export function categoryOf(kind: DistErrorKind): DistErrorCategory {
  return CATEGORIES[kind];
}

/**
 * Maps HTTP status codes to error kinds.
 */
export function errorKindFromStatus(status: number): DistErrorKind {
  switch (status) {
    case 400:
      return DistErrorKind.InvalidManifest;
    case 401:
      return DistErrorKind.Unauthorized;
    case 403:
      return DistErrorKind.Forbidden;
    case 404:
      return DistErrorKind.NotFound;
    case 429:
      return DistErrorKind.RateLimited;
    case 503:
      return DistErrorKind.ServiceUnavailable;
    default:
      if (status >= 500) {
        return DistErrorKind.ServerError;
      }
      return DistErrorKind.Unknown;
  }
}

/**
 * Checks if an error kind is retryable.
 */
export function isRetryable(kind: DistErrorKind): boolean {
  return categoryOf(kind) === 'transient';
}

/**
 * Error options for DistError constructor.
 */
export interface DistErrorOptions {
  /** HTTP status code */
  statusCode?: number;
  /** Underlying cause */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Package distribution error.
 */
export class DistError extends Error {
  /** Error kind */
  public readonly kind: DistErrorKind;
  /** HTTP status code */
  public readonly statusCode?: number;
  /** Underlying cause */
  public override readonly cause?: Error;
  /** Additional context */
  public readonly context?: Record<string, unknown>;

  constructor(kind: DistErrorKind, message: string, options?: DistErrorOptions) {
    super(message);
    this.name = 'DistError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DistError);
    }
  }

  /**
   * Gets the category of this error.
   */
  get category(): DistErrorCategory {
    return categoryOf(this.kind);
  }

  /**
   * Checks if this error is retryable.
   */
  isRetryable(): boolean {
    return isRetryable(this.kind);
  }

  /**
   * Creates a new error with additional context.
   */
  withContext(context: Record<string, unknown>): DistError {
    return new DistError(this.kind, this.message, {
      statusCode: this.statusCode,
      cause: this.cause,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Formats the error for logging.
   */
  override toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }

  /**
   * Converts to JSON for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      category: this.category,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
    };
  }

  // Factory methods for common errors

  static conflict(namespace: string, tag: string): DistError {
    return new DistError(
      DistErrorKind.Conflict,
      `Content changed under existing tag ${namespace}:${tag}`,
      { context: { namespace, tag } }
    );
  }

  static invalidManifest(reason: string, cause?: Error): DistError {
    return new DistError(DistErrorKind.InvalidManifest, `Invalid manifest: ${reason}`, { cause });
  }

  static digestMismatch(expected: string, actual: string): DistError {
    return new DistError(
      DistErrorKind.DigestMismatch,
      `Digest mismatch: expected ${expected}, got ${actual}`,
      { context: { expected, actual } }
    );
  }

  static invalidIndexArchive(path: string, reason: string, cause?: Error): DistError {
    return new DistError(
      DistErrorKind.InvalidIndexArchive,
      `Invalid repository index '${path}': ${reason}`,
      { cause, context: { path } }
    );
  }

  static uploadFailed(reason: string, cause?: Error): DistError {
    return new DistError(DistErrorKind.UploadFailed, `Upload failed: ${reason}`, { cause });
  }

  static downgradeRejected(name: string, attempted: string, current: string): DistError {
    return new DistError(
      DistErrorKind.DowngradeRejected,
      `Refusing to downgrade '${name}' from ${current} to ${attempted}`,
      { context: { name, attempted, current } }
    );
  }

  static invalidPackageName(name: string, reason: string): DistError {
    return new DistError(
      DistErrorKind.InvalidPackageName,
      `Package '${name}' ${reason}`,
      { context: { name } }
    );
  }

  static unsupportedArch(name: string, arch: string): DistError {
    return new DistError(
      DistErrorKind.UnsupportedArch,
      `Package '${name}' has unsupported arch '${arch}'`,
      { context: { name, arch } }
    );
  }

  static invalidPackageFile(file: string, reason: string): DistError {
    return new DistError(
      DistErrorKind.InvalidPackageFile,
      `Invalid package file '${file}': ${reason}`,
      { context: { file } }
    );
  }

  static invalidVersion(value: string): DistError {
    return new DistError(DistErrorKind.InvalidVersion, `Invalid version '${value}'`);
  }

  static authFailed(message: string, statusCode?: number): DistError {
    return new DistError(DistErrorKind.AuthFailed, message, { statusCode });
  }

  static toolFailed(command: string, exitCode: number | null, output: string): DistError {
    return new DistError(
      DistErrorKind.ToolFailed,
      `'${command}' failed with exit code ${exitCode ?? 'unknown'}`,
      { context: { command, exitCode, output } }
    );
  }

  static signingFailed(file: string, cause?: Error): DistError {
    return new DistError(DistErrorKind.SigningFailed, `Failed to sign '${file}'`, {
      cause,
      context: { file },
    });
  }

  static configError(message: string): DistError {
    return new DistError(DistErrorKind.InvalidConfig, message);
  }

  static releaseNotFound(remote: string, releaseName: string): DistError {
    return new DistError(
      DistErrorKind.ReleaseNotFound,
      `Did not find release named '${releaseName}' in ${remote}`,
      { context: { remote, releaseName } }
    );
  }

  static packageNotFound(name: string, reason?: string): DistError {
    return new DistError(
      DistErrorKind.PackageNotFound,
      reason ? `Package '${name}': ${reason}` : `Package '${name}' does not exist`,
      { context: { name } }
    );
  }

  static syncFailed(repository: string, failed: readonly string[]): DistError {
    return new DistError(
      DistErrorKind.SyncFailed,
      `Failed to upload ${failed.length} package(s) in ${repository}: ${failed.join(', ')}`,
      { context: { repository, failed: [...failed] } }
    );
  }

  static pipelineAborted(reason?: string, cause?: Error, context?: Record<string, unknown>): DistError {
    return new DistError(
      DistErrorKind.PipelineAborted,
      `Upload pipeline aborted${reason ? `: ${reason}` : ''}`,
      { cause, context }
    );
  }

  static invalidBundle(path: string, reason: string, cause?: Error): DistError {
    return new DistError(DistErrorKind.InvalidBundle, `Invalid bundle '${path}': ${reason}`, {
      cause,
      context: { path },
    });
  }

  static fromResponse(status: number, message: string): DistError {
    return new DistError(errorKindFromStatus(status), message, { statusCode: status });
  }
}

/**
 * Type guard for DistError.
 */
export function isDistError(error: unknown): error is DistError {
  return error instanceof DistError;
}

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
