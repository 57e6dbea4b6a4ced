/**
 * Repository channel coordinator.
 * @module repository/repository
 */

import { createHash } from 'node:crypto';
import { open, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { AddOptions, LocalDatabase, StagedPackage } from '../database/database.js';
import { DistError, DistErrorKind, toError } from '../errors.js';
import type { Logger, ProgressReporter } from '../observability/index.js';
import { NoOpLogger, NoOpProgressReporter } from '../observability/index.js';
import type { ChunkDigest } from '../package/digest.js';
import { DEFAULT_CHUNK_SIZE, digestFile, readFileChunks, sha256Hex } from '../package/digest.js';
import type { PackageRecord } from '../package/record.js';
import { formatRecord, platformForArch, registryName } from '../package/record.js';
import type { RegistryClient } from '../registry/client.js';
import { UploadResult } from '../registry/client.js';
import type { BlobRef, ManifestDescriptor, PackageManifest } from '../registry/types.js';
import { MediaType, PlatformUtils } from '../registry/types.js';
import type { ReleaseAssetHost } from '../releases/host.js';
import { replaceReleaseAssets } from '../releases/host.js';
import type { Version } from '../version/version.js';
import {
  compareVersions,
  formatVersion,
  parseVersion,
  unsanitizeVersion,
  versionsEqual,
} from '../version/version.js';

/**
 * Repository options.
 */
export interface RepositoryOptions {
  /** Channel name; index assets are published as `<name>.db` and `<name>.db.sig` */
  name: string;
  remote: string;
  releaseName: string;
  database: LocalDatabase;
  client: RegistryClient;
  releaseHost: ReleaseAssetHost;
  rootDir?: string;
  /** OS recorded on platform-specific manifests */
  manifestOs: string;
  /** Joined with the remote to form the source annotation */
  sourceUrlBase: string;
  /** Upper bound of one package layer */
  maxBlobSize?: number;
  logger?: Logger;
  progress?: ProgressReporter;
}

/**
 * Options for `Repository.sync`.
 */
export interface SyncOptions {
  /** Publish packages and the index; defaults to true */
  upload?: boolean;
}

/**
 * A package that failed to upload.
 */
export interface PackageFailure {
  readonly record: PackageRecord;
  readonly error: Error;
}

/**
 * Outcome of `Repository.sync`.
 */
export interface SyncReport {
  /** Packages written to the local index by this sync */
  readonly saved: readonly StagedPackage[];
  readonly uploaded: readonly PackageRecord[];
  /** Packages whose manifest was already published */
  readonly existing: readonly PackageRecord[];
  readonly failures: readonly PackageFailure[];
  readonly databaseUploaded: boolean;
}

/**
 * A published version of a package.
 */
export interface PublishedVersion {
  readonly version: Version;
  /** Registry tag the version was read from */
  readonly tag: string;
}

/**
 * Options for `Repository.fetchPackage`.
 */
export interface FetchPackageOptions {
  /** Exact version, or a prefix of one; the latest version when omitted */
  version?: string;
  os?: string;
  arch?: string;
  /** Directory the package file is written to; the working directory when omitted */
  outputDir?: string;
}

/**
 * A downloaded package file.
 */
export interface FetchedPackage {
  readonly file: string;
  readonly version: Version;
  readonly tag: string;
  /** Manifest digest the layers were read from */
  readonly digest: string;
  readonly size: number;
}

function tryParseVersion(value: string): Version | undefined {
  try {
    return parseVersion(value);
  } catch {
    return undefined;
  }
}

/**
 * A package channel: one local index mirrored to the registry and its index
 * published as release assets.
 *
 * Uploads within a sync run one package at a time.
 */
export class Repository {
  readonly name: string;
  readonly remote: string;
  readonly releaseName: string;
  readonly database: LocalDatabase;
  readonly rootDir?: string;

  private readonly client: RegistryClient;
  private readonly releaseHost: ReleaseAssetHost;
  private readonly manifestOs: string;
  private readonly sourceUrl: string;
  private readonly maxBlobSize: number;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;

  constructor(options: RepositoryOptions) {
    this.name = options.name;
    this.remote = options.remote;
    this.releaseName = options.releaseName;
    this.database = options.database;
    this.rootDir = options.rootDir;
    this.client = options.client;
    this.releaseHost = options.releaseHost;
    this.manifestOs = options.manifestOs;
    this.sourceUrl = `${options.sourceUrlBase.replace(/\/+$/, '')}/${options.remote}`;
    this.maxBlobSize = options.maxBlobSize ?? DEFAULT_CHUNK_SIZE;
    this.logger = options.logger ?? new NoOpLogger();
    this.progress = options.progress ?? new NoOpProgressReporter();
  }

  /**
   * Hashes a package file and stages it in the local index.
   *
   * @returns false when the same version and content is already present
   */
  async addPackage(file: string, options: AddOptions = {}): Promise<boolean> {
    const digest = await digestFile(file, this.maxBlobSize);
    return this.database.add(file, digest, options);
  }

  /**
   * Saves the local index and publishes what changed.
   *
   * @throws DistError with kind `SyncFailed` after the index is published,
   * when any package failed to upload
   */
  async sync(options: SyncOptions = {}): Promise<SyncReport> {
    const saved = await this.database.save();
    const uploaded: PackageRecord[] = [];
    const existing: PackageRecord[] = [];
    const failures: PackageFailure[] = [];

    if (saved.length === 0 || options.upload === false) {
      return { saved, uploaded, existing, failures, databaseUploaded: false };
    }

    this.logger.info(`Uploading ${saved.length} package${saved.length === 1 ? '' : 's'}`);

    for (const { record, file, chunks } of saved) {
      try {
        const result = await this.uploadPackage(record, file, chunks);
        (result === UploadResult.Uploaded ? uploaded : existing).push(record);
      } catch (error) {
        const err = toError(error);
        this.logger.error(`Failed to upload ${formatRecord(record)}: ${err.message}`, {
          kind: error instanceof DistError ? error.kind : undefined,
        });
        failures.push({ record, error: err });
      }
    }

    this.logger.info('Uploading database');
    await this.uploadDatabase();

    if (failures.length > 0) {
      throw DistError.syncFailed(this.name, failures.map(f => formatRecord(f.record)));
    }

    return { saved, uploaded, existing, failures, databaseUploaded: true };
  }

  /**
   * Uploads one package file as layers of at most `maxBlobSize` bytes and
   * publishes its manifest.
   *
   * When `chunks` holds the digests taken at staging time, each slice is
   * checked before it is sent and the first one that differs stops the
   * upload.
   */
  async uploadPackage(
    record: PackageRecord,
    file: string,
    chunks?: readonly ChunkDigest[]
  ): Promise<UploadResult> {
    const name = registryName(record.name);
    const platform = platformForArch(record, this.manifestOs);
    const namespace = this.client.namespace(name);
    const version = formatVersion(record.version);

    const layers: BlobRef[] = [];
    const whole = createHash('sha256');
    const handle = this.progress.start(`${record.name} ${version}`, record.sizeBytes, 0);

    const expected = chunks && this.matchesLayout(chunks, record.sizeBytes) ? chunks : undefined;
    let offset = 0;

    try {
      for await (const chunk of readFileChunks(file, this.maxBlobSize)) {
        whole.update(chunk);
        const sha256 = sha256Hex(chunk);
        const staged = expected?.[layers.length];
        if (expected && staged?.sha256 !== sha256) {
          throw DistError.digestMismatch(staged?.sha256 ?? '<none>', sha256).withContext({ file, offset });
        }
        offset += chunk.length;
        await this.client.uploadBlob(namespace, sha256, chunk);
        layers.push({ sha256, mediaType: MediaType.Bytes, size: chunk.length });
        handle.advance(chunk.length);
      }
    } finally {
      handle.done();
    }

    const actual = whole.digest('hex');
    if (actual !== record.contentHash) {
      throw DistError.digestMismatch(record.contentHash, actual).withContext({ file });
    }

    const manifest: PackageManifest = {
      name,
      version,
      sourceUrl: this.sourceUrl,
      description: record.name,
      layers,
    };

    const result = await this.client.upload(manifest, platform);
    this.logger.info(
      `${record.name} (${version}, ${PlatformUtils.toString(platform)}): ${
        result === UploadResult.Uploaded ? 'uploaded' : 'already published'
      }`
    );
    return result;
  }

  /**
   * Publishes the index and its signature as release assets.
   */
  async uploadDatabase(): Promise<void> {
    const sigFile = await this.database.ensureSignature();
    await replaceReleaseAssets(
      this.releaseHost,
      this.remote,
      this.releaseName,
      [
        { name: `${this.name}.db`, path: this.database.path },
        { name: `${this.name}.db.sig`, path: sigFile },
      ],
      this.logger
    );
  }

  /**
   * Lists the published versions of a package, newest first.
   *
   * @throws DistError with kind `PackageNotFound` when nothing is published
   */
  async listVersions(packageName: string): Promise<PublishedVersion[]> {
    const namespace = this.client.namespace(registryName(packageName));
    const tags = await this.client.getTagList(namespace);

    const versions: PublishedVersion[] = [];
    for (const tag of tags) {
      try {
        versions.push({ version: unsanitizeVersion(tag), tag });
      } catch (error) {
        this.logger.debug(`Ignoring tag ${tag}: ${toError(error).message}`, { namespace });
      }
    }

    if (versions.length === 0) {
      throw DistError.packageNotFound(packageName);
    }

    return versions.sort((a, b) => compareVersions(b.version, a.version));
  }

  /**
   * Downloads a published package to `<name>-<version>-<arch|any>.pkg.tar.zst`.
   *
   * Every layer digest is verified; a partial file is removed on failure.
   */
  async fetchPackage(packageName: string, options: FetchPackageOptions = {}): Promise<FetchedPackage> {
    const namespace = this.client.namespace(registryName(packageName));
    const selected = this.selectVersion(packageName, await this.listVersions(packageName), options.version);
    this.logger.info(`Selected ${packageName} ${formatVersion(selected.version)}`, { tag: selected.tag });

    const index = await this.client.getIndex(namespace, selected.tag);
    if (!index) {
      throw DistError.packageNotFound(packageName, `no manifest index for tag '${selected.tag}'`);
    }

    const descriptor = this.selectManifest(packageName, index.manifests, options.os, options.arch);
    const manifest = await this.client.getPackageManifest(namespace, descriptor.digest);
    if (!manifest) {
      throw DistError.invalidManifest(`manifest ${descriptor.digest} referenced by ${namespace}:${selected.tag} is missing`);
    }

    // tags lose `+`; the manifest keeps the version as published
    const version = tryParseVersion(manifest.version) ?? selected.version;
    const arch = descriptor.platform?.architecture ?? 'any';
    const fileName = `${manifest.name}-${formatVersion(version)}-${arch}.pkg.tar.zst`;
    const file = join(options.outputDir ?? process.cwd(), fileName);
    const totalSize = manifest.layers.reduce((sum, layer) => sum + layer.size, 0);

    const handle = this.progress.start(`Downloading ${fileName}`, totalSize, 0);
    const out = await open(file, 'w');
    let written = 0;
    try {
      for (const layer of manifest.layers) {
        const hash = createHash('sha256');
        for await (const chunk of this.client.getBlob(namespace, layer.sha256)) {
          hash.update(chunk);
          await out.write(chunk);
          written += chunk.length;
          handle.advance(chunk.length);
        }
        const actual = hash.digest('hex');
        if (actual !== layer.sha256) {
          throw DistError.digestMismatch(layer.sha256, actual).withContext({ namespace });
        }
      }
    } catch (error) {
      await out.close();
      await rm(file, { force: true });
      throw error;
    } finally {
      handle.done();
    }
    await out.close();

    this.logger.info(`Downloaded ${basename(file)}`);
    return { file, version, tag: selected.tag, digest: descriptor.digest, size: written };
  }

  /** Whether `chunks` were cut at this repository's layer size */
  private matchesLayout(chunks: readonly ChunkDigest[], size: number): boolean {
    let offset = 0;
    for (const [i, chunk] of chunks.entries()) {
      const last = i === chunks.length - 1;
      if (chunk.offset !== offset || chunk.size > this.maxBlobSize || (!last && chunk.size !== this.maxBlobSize)) {
        return false;
      }
      offset += chunk.size;
    }
    return offset === size;
  }

  private selectVersion(
    packageName: string,
    versions: readonly PublishedVersion[],
    requested?: string
  ): PublishedVersion {
    const latest = versions[0];
    if (!latest) {
      throw DistError.packageNotFound(packageName);
    }
    if (requested === undefined) {
      return latest;
    }

    const wanted = tryParseVersion(requested);
    const exact = wanted ? versions.find(v => versionsEqual(v.version, wanted)) : undefined;
    if (exact) {
      return exact;
    }

    // newest first, so the first prefix match is the latest
    const prefixed = versions.find(v => formatVersion(v.version).startsWith(requested));
    if (!prefixed) {
      throw DistError.packageNotFound(packageName, `no version matching '${requested}'`);
    }
    return prefixed;
  }

  private selectManifest(
    packageName: string,
    manifests: readonly ManifestDescriptor[],
    os?: string,
    arch?: string
  ): ManifestDescriptor {
    const [only, ...rest] = manifests;
    if (!only) {
      throw DistError.invalidManifest(`index for '${packageName}' has no manifests`);
    }

    if (rest.length === 0) {
      if ((os !== undefined && only.platform?.os !== os) || (arch !== undefined && only.platform?.architecture !== arch)) {
        throw DistError.packageNotFound(
          packageName,
          `no manifest for ${os ?? '*'}/${arch ?? '*'}; have ${PlatformUtils.toString(only.platform)}`
        );
      }
      return only;
    }

    const candidates = manifests.filter(
      m =>
        (m.platform === undefined || m.platform.os === os) &&
        (m.platform === undefined || m.platform.architecture === arch)
    );

    const [candidate, ...others] = candidates;
    if (!candidate) {
      throw DistError.packageNotFound(packageName, `no manifest for ${os ?? '*'}/${arch ?? '*'}`);
    }
    if (others.length > 0) {
      throw new DistError(
        DistErrorKind.AmbiguousPlatform,
        `${candidates.length} manifests of '${packageName}' match; narrow down with an OS or architecture`,
        { context: { platforms: candidates.map(c => PlatformUtils.toString(c.platform)) } }
      );
    }
    return candidate;
  }
}
