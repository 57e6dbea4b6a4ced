/**
 * Release-asset hosting for repository index files.
 * @module releases/host
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FetchFn } from '../auth/registry-auth.js';
import { SecretString } from '../auth/registry-auth.js';
import { DistError, DistErrorKind } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';

/**
 * Default GitHub REST API base.
 */
export const DEFAULT_API_BASE = 'https://api.github.com';

/**
 * Default GitHub asset upload base.
 */
export const DEFAULT_UPLOADS_BASE = 'https://uploads.github.com';

const API_VERSION = '2022-11-28';

/**
 * A named binary asset attached to a release.
 */
export interface ReleaseAsset {
  readonly id: number;
  readonly name: string;
}

/**
 * A release holding assets.
 */
export interface Release {
  readonly id: number;
  readonly name: string | null;
  readonly assets: readonly ReleaseAsset[];
}

/**
 * Durable named-file host. There is no atomic replace: an asset is
 * replaced by deleting it and uploading again.
 */
export interface ReleaseAssetHost {
  listReleases(remote: string): Promise<Release[]>;
  deleteAsset(remote: string, assetId: number): Promise<void>;
  uploadAsset(remote: string, releaseId: number, name: string, data: Uint8Array): Promise<ReleaseAsset>;
}

/**
 * A local file to publish under an asset name.
 */
export interface AssetFile {
  readonly name: string;
  readonly path: string;
}

/**
 * Replaces assets on the release named `releaseName`, in order.
 *
 * @throws DistError with kind `ReleaseNotFound`
 */
export async function replaceReleaseAssets(
  host: ReleaseAssetHost,
  remote: string,
  releaseName: string,
  files: readonly AssetFile[],
  logger: Logger = new NoOpLogger()
): Promise<void> {
  const releases = await host.listReleases(remote);
  const release = releases.find(r => r.name === releaseName);
  if (!release) {
    throw DistError.releaseNotFound(remote, releaseName);
  }

  for (const file of files) {
    const existing = release.assets.find(a => a.name === file.name);
    if (existing) {
      logger.debug(`Deleting existing asset ${file.name}`, { assetId: existing.id });
      await host.deleteAsset(remote, existing.id);
    }
    const data = await readFile(file.path);
    await host.uploadAsset(remote, release.id, file.name, data);
    logger.info(`Uploaded ${file.name}`);
  }
}

const assetSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const releaseSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  assets: z.array(assetSchema),
});

/**
 * GitHub release host options.
 */
export interface GitHubReleaseHostOptions {
  token: SecretString | string;
  apiBase?: string;
  uploadsBase?: string;
  userAgent?: string;
  fetch?: FetchFn;
}

/**
 * `ReleaseAssetHost` on GitHub releases.
 */
export class GitHubReleaseHost implements ReleaseAssetHost {
  private readonly token: SecretString;
  private readonly apiBase: string;
  private readonly uploadsBase: string;
  private readonly userAgent?: string;
  private readonly fetchFn: FetchFn;

  constructor(options: GitHubReleaseHostOptions) {
    this.token = typeof options.token === 'string' ? new SecretString(options.token) : options.token;
    this.apiBase = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, '');
    this.uploadsBase = (options.uploadsBase ?? DEFAULT_UPLOADS_BASE).replace(/\/+$/, '');
    this.userAgent = options.userAgent;
    this.fetchFn = options.fetch ?? fetch;
  }

  async listReleases(remote: string): Promise<Release[]> {
    const response = await this.request('GET', `${this.apiBase}/repos/${remote}/releases`);
    const result = z.array(releaseSchema).safeParse(await response.json());
    if (!result.success) {
      throw new DistError(DistErrorKind.Unknown, `Unexpected release list for ${remote}`);
    }
    return result.data;
  }

  async deleteAsset(remote: string, assetId: number): Promise<void> {
    await this.request('DELETE', `${this.apiBase}/repos/${remote}/releases/assets/${assetId}`);
  }

  async uploadAsset(remote: string, releaseId: number, name: string, data: Uint8Array): Promise<ReleaseAsset> {
    const url = new URL(`${this.uploadsBase}/repos/${remote}/releases/${releaseId}/assets`);
    url.searchParams.set('name', name);

    const response = await this.request('POST', url.toString(), data);
    const result = assetSchema.safeParse(await response.json());
    if (!result.success) {
      throw new DistError(DistErrorKind.Unknown, `Unexpected asset upload response for ${name}`);
    }
    return result.data;
  }

  private async request(
    method: 'GET' | 'POST' | 'DELETE',
    url: string,
    body?: Uint8Array
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': API_VERSION,
      'Authorization': `Bearer ${this.token.expose()}`,
    };
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }
    if (body) {
      headers['Content-Type'] = 'application/octet-stream';
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body });
    } catch (error) {
      throw new DistError(
        DistErrorKind.ConnectionFailed,
        `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    if (!response.ok) {
      const text = await response.text();
      throw DistError.fromResponse(
        response.status,
        `${method} ${url} failed with HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`
      );
    }
    return response;
  }
}
