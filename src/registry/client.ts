/**
 * OCI Distribution client for package releases.
 * @module registry/client
 */

import type { FetchFn, RegistryAuth } from '../auth/registry-auth.js';
import { DistError, DistErrorKind } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';
import { sanitizeVersionString } from '../version/version.js';
import type {
  ManifestDescriptor,
  ManifestIndex,
  PackageManifest,
  Platform,
} from './types.js';
import {
  MediaType,
  PlatformUtils,
  contentDigest,
  getManifestAcceptHeader,
  manifestConfig,
  parseIndex,
  parseManifest,
  serializeIndex,
  serializeManifest,
} from './types.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'HEAD';

/**
 * Request body accepted by the client.
 */
export type RequestBody = RequestInit['body'];

/**
 * State of a version tag relative to a manifest being pushed.
 */
export enum Existence {
  /** No manifest occupies this platform slot */
  None = 'none',
  /** The slot holds a manifest with the same config blob */
  Exists = 'exists',
  /** The slot holds a manifest with a different config blob */
  Conflicts = 'conflicts',
}

/**
 * Outcome of `RegistryClient.upload`.
 */
export enum UploadResult {
  Uploaded = 'uploaded',
  Exists = 'exists',
}

/**
 * Result of an existence check.
 */
export interface ExistenceCheck {
  readonly existence: Existence;
  /** Descriptors in other platform slots, preserved on re-push */
  readonly otherManifests: readonly ManifestDescriptor[];
}

/**
 * Client options.
 */
export interface RegistryClientOptions {
  /** Registry base URL, e.g. `https://ghcr.io` */
  registryUrl: string;
  /** Owner path all namespaces live under, e.g. `owner/repo` */
  remote: string;
  auth: RegistryAuth;
  userAgent?: string;
  fetch?: FetchFn;
  logger?: Logger;
}

interface RequestOptions {
  body?: RequestBody;
  contentType?: string;
  accept?: string;
  /** Statuses returned to the caller instead of thrown */
  allowStatus?: readonly number[];
}

/**
 * Typed client over the blob and manifest endpoints of a registry.
 */
export class RegistryClient {
  readonly remote: string;
  private readonly registryUrl: string;
  private readonly auth: RegistryAuth;
  private readonly userAgent?: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: RegistryClientOptions) {
    this.registryUrl = options.registryUrl.replace(/\/+$/, '');
    this.remote = options.remote;
    this.auth = options.auth;
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? new NoOpLogger();
  }

  /**
   * Namespace holding a package's blobs and manifests.
   */
  namespace(name: string): string {
    return `${this.remote}/${name}`;
  }

  // Protocol operations

  /**
   * Checks whether a blob exists.
   */
  async headBlob(namespace: string, sha256: string): Promise<boolean> {
    const response = await this.request('HEAD', `/v2/${namespace}/blobs/sha256:${sha256}`, {
      allowStatus: [404],
    });
    return response.status === 200;
  }

  /**
   * Starts a blob upload.
   * @returns the absolute upload location
   */
  async initiateBlobUpload(namespace: string): Promise<string> {
    const response = await this.request('POST', `/v2/${namespace}/blobs/uploads/`);
    const location = response.headers.get('Location');
    if (!location) {
      throw DistError.uploadFailed(`registry returned no upload location for ${namespace}`);
    }
    return new URL(location, `${this.registryUrl}/`).toString();
  }

  /**
   * Completes a blob upload in a single PUT.
   */
  async putBlob(location: string, data: Uint8Array, sha256: string): Promise<void> {
    const url = new URL(location);
    url.searchParams.set('digest', `sha256:${sha256}`);
    await this.request('PUT', url.toString(), {
      body: data,
      contentType: MediaType.Bytes,
    });
  }

  /**
   * Pushes a manifest or index under a reference (tag or digest).
   */
  async putManifest(
    namespace: string,
    reference: string,
    data: Uint8Array,
    mediaType: string
  ): Promise<void> {
    await this.request('PUT', `/v2/${namespace}/manifests/${reference}`, {
      body: data,
      contentType: mediaType,
    });
  }

  /**
   * Fetches raw manifest bytes, or undefined when the reference is unknown.
   */
  async getManifest(namespace: string, reference: string): Promise<Buffer | undefined> {
    const response = await this.request('GET', `/v2/${namespace}/manifests/${reference}`, {
      accept: getManifestAcceptHeader(),
      allowStatus: [404],
    });
    if (response.status === 404) {
      return undefined;
    }
    return Buffer.from(await response.arrayBuffer());
  }

  /**
   * Lists the tags of a namespace. An unknown namespace has no tags.
   */
  async getTagList(namespace: string): Promise<string[]> {
    const response = await this.request('GET', `/v2/${namespace}/tags/list`, {
      allowStatus: [404],
    });
    if (response.status === 404) {
      return [];
    }

    const json: unknown = await response.json();
    if (typeof json !== 'object' || json === null || !('tags' in json)) {
      throw DistError.invalidManifest(`tag list for ${namespace} has no tags field`);
    }
    const tags = json.tags;
    if (tags === null) {
      return [];
    }
    if (!Array.isArray(tags) || !tags.every((t): t is string => typeof t === 'string')) {
      throw DistError.invalidManifest(`tag list for ${namespace} is malformed`);
    }
    return tags;
  }

  /**
   * Streams a blob's bytes.
   */
  async *getBlob(namespace: string, sha256: string): AsyncGenerator<Uint8Array> {
    const response = await this.request('GET', `/v2/${namespace}/blobs/sha256:${sha256}`, {
      accept: MediaType.Bytes,
    });
    if (!response.body) {
      return;
    }
    for await (const chunk of response.body) {
      yield chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
    }
  }

  // Composite operations

  /**
   * Uploads a blob unless the registry already has it.
   * @returns true when bytes were sent
   */
  async uploadBlob(namespace: string, sha256: string, data: Uint8Array): Promise<boolean> {
    if (await this.headBlob(namespace, sha256)) {
      this.logger.debug('Blob already present', { namespace, sha256 });
      return false;
    }

    const location = await this.initiateBlobUpload(namespace);
    await this.putBlob(location, data, sha256);
    return true;
  }

  /**
   * Fetches the index at a tag.
   * @throws DistError with kind `InvalidManifest` if the tag holds something else
   */
  async getIndex(namespace: string, tag: string): Promise<ManifestIndex | undefined> {
    const data = await this.getManifest(namespace, tag);
    return data === undefined ? undefined : parseIndex(data);
  }

  /**
   * Fetches a single-platform manifest.
   */
  async getPackageManifest(namespace: string, digest: string): Promise<PackageManifest | undefined> {
    const data = await this.getManifest(namespace, digest);
    return data === undefined ? undefined : parseManifest(data);
  }

  /**
   * Determines whether `manifest` is already published for `platform`.
   *
   * A descriptor without a platform matches any search, and a search
   * without a platform matches every descriptor. An exact platform match
   * wins over an unplatformed one; every other match is dropped so the new
   * descriptor replaces rather than duplicates it.
   */
  async checkExistence(
    namespace: string,
    manifest: PackageManifest,
    platform?: Platform
  ): Promise<ExistenceCheck> {
    const tag = sanitizeVersionString(manifest.version);
    const index = await this.getIndex(namespace, tag);
    if (!index) {
      return { existence: Existence.None, otherManifests: [] };
    }

    if (index.version !== manifest.version) {
      this.logger.warn(
        `Tag ${namespace}:${tag} holds version ${index.version}, not ${manifest.version}`,
        { namespace, tag }
      );
    }

    const otherManifests: ManifestDescriptor[] = [];
    let exact: ManifestDescriptor | undefined;
    let fallback: ManifestDescriptor | undefined;

    for (const descriptor of index.manifests) {
      if (descriptor.mediaType !== MediaType.OciManifest) {
        otherManifests.push(descriptor);
        continue;
      }
      if (platform && descriptor.platform) {
        if (PlatformUtils.matches(descriptor.platform, platform)) {
          exact ??= descriptor;
        } else {
          otherManifests.push(descriptor);
        }
      } else {
        fallback ??= descriptor;
      }
    }

    const current = exact ?? fallback;
    if (!current) {
      return { existence: Existence.None, otherManifests };
    }

    const data = await this.getManifest(namespace, current.digest);
    if (data === undefined) {
      return { existence: Existence.None, otherManifests };
    }

    let existing: PackageManifest;
    try {
      existing = parseManifest(data);
    } catch (error) {
      if (error instanceof DistError && error.kind === DistErrorKind.InvalidManifest) {
        this.logger.warn(`Malformed manifest ${current.digest} in ${namespace}: ${error.message}`);
        return { existence: Existence.Conflicts, otherManifests };
      }
      throw error;
    }

    if (manifestConfig(existing).sha256 === manifestConfig(manifest).sha256) {
      return { existence: Existence.Exists, otherManifests };
    }

    this.logger.warn(
      `Content of ${namespace}:${tag} (${PlatformUtils.toString(platform)}) differs from the published manifest`,
      { namespace, tag, digest: current.digest }
    );
    return { existence: Existence.Conflicts, otherManifests };
  }

  /**
   * Publishes a manifest for a platform.
   *
   * The manifest goes up at its own digest first; the index at the version
   * tag is always the last write.
   */
  async upload(manifest: PackageManifest, platform?: Platform): Promise<UploadResult> {
    const namespace = this.namespace(manifest.name);
    const { existence, otherManifests } = await this.checkExistence(namespace, manifest, platform);

    if (existence === Existence.Exists) {
      return UploadResult.Exists;
    }

    const manifestBytes = serializeManifest(manifest);
    const digest = contentDigest(manifestBytes);
    await this.putManifest(namespace, digest, manifestBytes, MediaType.OciManifest);

    const descriptor: ManifestDescriptor = {
      mediaType: MediaType.OciManifest,
      digest,
      size: manifestBytes.length,
      ...(platform ? { platform: { os: platform.os, architecture: platform.architecture } } : {}),
    };

    const index: ManifestIndex = {
      name: manifest.name,
      version: manifest.version,
      sourceUrl: manifest.sourceUrl,
      description: manifest.description,
      manifests: [...otherManifests, descriptor],
    };

    await this.putManifest(
      namespace,
      sanitizeVersionString(manifest.version),
      serializeIndex(index),
      MediaType.OciIndex
    );

    return UploadResult.Uploaded;
  }

  // Transport

  private async request(method: HttpMethod, pathOrUrl: string, options: RequestOptions = {}): Promise<Response> {
    const url = pathOrUrl.startsWith('/') ? `${this.registryUrl}${pathOrUrl}` : pathOrUrl;
    const token = await this.auth.getToken(this.remote);

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${token.expose()}`,
    };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (options.contentType) {
      headers['Content-Type'] = options.contentType;
    }
    if (options.accept) {
      headers['Accept'] = options.accept;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body: options.body });
    } catch (error) {
      throw new DistError(
        DistErrorKind.ConnectionFailed,
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    if (!response.ok && !options.allowStatus?.includes(response.status)) {
      throw await this.parseErrorResponse(method, url, response);
    }
    return response;
  }

  private async parseErrorResponse(method: HttpMethod, url: string, response: Response): Promise<DistError> {
    const status = response.status;
    let message = `${method} ${url} failed with HTTP ${status}`;

    if (method !== 'HEAD') {
      const text = await response.text();
      const detail = errorDetail(text);
      if (detail) {
        message += `: ${detail}`;
      }
    }

    return DistError.fromResponse(status, message);
  }
}

function errorDetail(text: string): string | undefined {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const json: unknown = JSON.parse(text);
    if (typeof json === 'object' && json !== null && 'errors' in json && Array.isArray(json.errors)) {
      const messages = json.errors
        .map((e: unknown) =>
          typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string'
            ? e.message
            : undefined
        )
        .filter((m): m is string => m !== undefined);
      if (messages.length > 0) {
        return messages.join(', ');
      }
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return text.slice(0, 200);
}
