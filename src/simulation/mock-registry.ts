/**
 * In-memory OCI Distribution registry.
 *
 * Exposes a `fetch`-compatible function serving the token endpoint and the
 * blob, manifest and tag endpoints the client uses, so tests and dry runs
 * never leave the process.
 *
 * @module simulation/mock-registry
 */

import { createHash, randomUUID } from 'node:crypto';
import type { FetchFn } from '../auth/registry-auth.js';

/**
 * A served request.
 */
export interface LoggedRequest {
  readonly method: string;
  readonly path: string;
  readonly status: number;
}

/**
 * Stored manifest content.
 */
interface StoredManifest {
  readonly data: Buffer;
  readonly mediaType: string;
}

/**
 * Mock registry options.
 */
export interface MockRegistryOptions {
  /** Base URL requests are addressed to */
  baseUrl?: string;
  /** When set, token requests must present this user token */
  userToken?: string;
  /** Delay applied to every blob PUT */
  blobPutDelayMs?: number;
}

function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

function bodyBytes(body: RequestInit['body']): Buffer | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (body instanceof ArrayBuffer) {
    return Buffer.from(body);
  }
  return undefined;
}

function json(status: number, value: unknown): Response {
  return new Response(JSON.stringify(value), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function registryError(status: number, code: string, message: string): Response {
  return json(status, { errors: [{ code, message }] });
}

/**
 * In-memory registry simulation.
 */
export class MockRegistry {
  readonly baseUrl: string;
  readonly requests: LoggedRequest[] = [];

  private readonly userToken?: string;
  private blobPutDelayMs: number;
  private readonly issuedTokens = new Map<string, string>(); // token -> remote
  private readonly blobs = new Map<string, Map<string, Buffer>>(); // ns -> sha256 -> data
  private readonly manifests = new Map<string, Map<string, StoredManifest>>(); // ns -> digest -> manifest
  private readonly tags = new Map<string, Map<string, string>>(); // ns -> tag -> digest
  private readonly uploads = new Map<string, string>(); // upload id -> ns
  private failBlobPuts = 0;
  private blobPutsStarted = 0;
  private blobPutListener?: (started: number) => void;
  private inFlightBlobPuts = 0;
  private maxInFlight = 0;

  constructor(options: MockRegistryOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://registry.test').replace(/\/+$/, '');
    this.userToken = options.userToken;
    this.blobPutDelayMs = options.blobPutDelayMs ?? 0;
  }

  /**
   * `fetch`-compatible entry point.
   */
  readonly fetch: FetchFn = async (input, init) => {
    const url = new URL(input.toString());
    const method = (init?.method ?? 'GET').toUpperCase();
    const response = await this.handle(method, url, new Headers(init?.headers), bodyBytes(init?.body));
    this.requests.push({ method, path: url.pathname, status: response.status });
    return response;
  };

  // Test controls

  /**
   * Makes the next `count` blob PUTs fail with HTTP 500.
   */
  failNextBlobPuts(count: number): void {
    this.failBlobPuts = count;
  }

  setBlobPutDelay(ms: number): void {
    this.blobPutDelayMs = ms;
  }

  /**
   * Calls `listener` with the running count as each blob PUT starts.
   */
  onBlobPut(listener: (started: number) => void): void {
    this.blobPutListener = listener;
  }

  // Inspection

  hasBlob(namespace: string, sha256: string): boolean {
    return this.blobs.get(namespace)?.has(sha256) ?? false;
  }

  blobCount(namespace: string): number {
    return this.blobs.get(namespace)?.size ?? 0;
  }

  getBlobData(namespace: string, sha256: string): Buffer | undefined {
    return this.blobs.get(namespace)?.get(sha256);
  }

  /**
   * Gets the parsed JSON stored at a tag or digest.
   */
  getManifestJson(namespace: string, reference: string): unknown {
    const stored = this.lookupManifest(namespace, reference);
    return stored ? JSON.parse(stored.data.toString('utf8')) : undefined;
  }

  /**
   * Stores raw manifest bytes at a reference, bypassing validation.
   */
  putRawManifest(namespace: string, reference: string, data: string, mediaType: string): void {
    this.storeManifest(namespace, reference, Buffer.from(data, 'utf8'), mediaType);
  }

  listTags(namespace: string): string[] {
    return [...(this.tags.get(namespace)?.keys() ?? [])].sort();
  }

  /**
   * Counts served requests matching a method and path pattern.
   */
  countRequests(method: string, pathPattern: RegExp): number {
    return this.requests.filter(r => r.method === method && pathPattern.test(r.path)).length;
  }

  get tokenRequests(): number {
    return this.countRequests('GET', /^\/token$/);
  }

  /** Highest number of blob PUTs in progress at once */
  get maxConcurrentBlobPuts(): number {
    return this.maxInFlight;
  }

  // Request handling

  private async handle(method: string, url: URL, headers: Headers, body?: Buffer): Promise<Response> {
    const path = url.pathname;

    if (path === '/token' && method === 'GET') {
      return this.handleToken(url, headers);
    }

    if (!path.startsWith('/v2/')) {
      return registryError(404, 'NOT_FOUND', `no route for ${path}`);
    }

    const bearer = headers.get('Authorization')?.replace(/^Bearer /, '');
    if (!bearer || !this.issuedTokens.has(bearer)) {
      return registryError(401, 'UNAUTHORIZED', 'authentication required');
    }

    let match = /^\/v2\/(.+)\/blobs\/uploads\/$/.exec(path);
    if (match?.[1] && method === 'POST') {
      const id = randomUUID();
      this.uploads.set(id, match[1]);
      return new Response(null, {
        status: 202,
        headers: { 'Location': `/v2/${match[1]}/blobs/uploads/${id}` },
      });
    }

    match = /^\/v2\/(.+)\/blobs\/uploads\/([^/]+)$/.exec(path);
    if (match?.[1] && match[2] && method === 'PUT') {
      return this.handleBlobPut(match[1], match[2], url.searchParams.get('digest'), body);
    }

    match = /^\/v2\/(.+)\/blobs\/sha256:([a-f0-9]{64})$/.exec(path);
    if (match?.[1] && match[2] && (method === 'HEAD' || method === 'GET')) {
      const data = this.blobs.get(match[1])?.get(match[2]);
      if (!data) {
        return method === 'HEAD'
          ? new Response(null, { status: 404 })
          : registryError(404, 'BLOB_UNKNOWN', 'blob unknown');
      }
      return new Response(method === 'HEAD' ? null : data, {
        status: 200,
        headers: { 'Content-Length': String(data.length), 'Content-Type': 'application/octet-stream' },
      });
    }

    match = /^\/v2\/(.+)\/manifests\/([^/]+)$/.exec(path);
    if (match?.[1] && match[2]) {
      if (method === 'PUT') {
        return this.handleManifestPut(match[1], match[2], headers.get('Content-Type'), body);
      }
      if (method === 'GET' || method === 'HEAD') {
        const stored = this.lookupManifest(match[1], match[2]);
        if (!stored) {
          return registryError(404, 'MANIFEST_UNKNOWN', 'manifest unknown');
        }
        return new Response(method === 'HEAD' ? null : stored.data, {
          status: 200,
          headers: {
            'Content-Type': stored.mediaType,
            'Docker-Content-Digest': `sha256:${sha256Hex(stored.data)}`,
          },
        });
      }
    }

    match = /^\/v2\/(.+)\/tags\/list$/.exec(path);
    if (match?.[1] && method === 'GET') {
      const tags = this.tags.get(match[1]);
      if (!tags) {
        return registryError(404, 'NAME_UNKNOWN', 'repository name not known to registry');
      }
      return json(200, { name: match[1], tags: [...tags.keys()].sort() });
    }

    return registryError(405, 'UNSUPPORTED', `${method} ${path} is not supported`);
  }

  private handleToken(url: URL, headers: Headers): Response {
    const scope = url.searchParams.get('scope') ?? '';
    const scopeMatch = /^repository:(.+):\*$/.exec(scope);
    if (!scopeMatch?.[1]) {
      return json(400, { message: 'invalid scope' });
    }
    const remote = scopeMatch[1];

    const basic = headers.get('Authorization')?.replace(/^Basic /, '');
    const decoded = basic ? Buffer.from(basic, 'base64').toString('utf8') : '';
    const sep = decoded.indexOf(':');
    const username = decoded.slice(0, sep);
    const password = decoded.slice(sep + 1);

    if (sep === -1 || username !== remote || (this.userToken !== undefined && password !== this.userToken)) {
      return json(401, { message: 'bad credentials' });
    }

    const token = `token-${this.issuedTokens.size + 1}`;
    this.issuedTokens.set(token, remote);
    return json(200, { token });
  }

  private async handleBlobPut(
    namespace: string,
    uploadId: string,
    digest: string | null,
    body?: Buffer
  ): Promise<Response> {
    if (this.uploads.get(uploadId) !== namespace) {
      return registryError(404, 'BLOB_UPLOAD_UNKNOWN', 'upload unknown');
    }

    this.blobPutsStarted++;
    this.blobPutListener?.(this.blobPutsStarted);
    this.inFlightBlobPuts++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlightBlobPuts);
    try {
      if (this.blobPutDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.blobPutDelayMs));
      }

      if (this.failBlobPuts > 0) {
        this.failBlobPuts--;
        return registryError(500, 'INTERNAL', 'simulated failure');
      }

      const data = body ?? Buffer.alloc(0);
      const actual = `sha256:${sha256Hex(data)}`;
      if (digest !== actual) {
        return registryError(400, 'DIGEST_INVALID', `digest ${digest ?? '<none>'} does not match ${actual}`);
      }

      this.uploads.delete(uploadId);
      const nsBlobs = this.blobs.get(namespace) ?? new Map<string, Buffer>();
      nsBlobs.set(actual.slice('sha256:'.length), data);
      this.blobs.set(namespace, nsBlobs);
      return new Response(null, { status: 201, headers: { 'Docker-Content-Digest': actual } });
    } finally {
      this.inFlightBlobPuts--;
    }
  }

  private handleManifestPut(
    namespace: string,
    reference: string,
    contentType: string | null,
    body?: Buffer
  ): Response {
    if (!body || !contentType) {
      return registryError(400, 'MANIFEST_INVALID', 'manifest body and content type required');
    }
    const digest = `sha256:${sha256Hex(body)}`;
    if (reference.startsWith('sha256:') && reference !== digest) {
      return registryError(400, 'DIGEST_INVALID', `reference ${reference} does not match ${digest}`);
    }
    this.storeManifest(namespace, reference, body, contentType);
    return new Response(null, { status: 201, headers: { 'Docker-Content-Digest': digest } });
  }

  private storeManifest(namespace: string, reference: string, data: Buffer, mediaType: string): void {
    const digest = `sha256:${sha256Hex(data)}`;
    const nsManifests = this.manifests.get(namespace) ?? new Map<string, StoredManifest>();
    nsManifests.set(digest, { data, mediaType });
    this.manifests.set(namespace, nsManifests);

    const nsTags = this.tags.get(namespace) ?? new Map<string, string>();
    if (!reference.startsWith('sha256:')) {
      nsTags.set(reference, digest);
    }
    this.tags.set(namespace, nsTags);
  }

  private lookupManifest(namespace: string, reference: string): StoredManifest | undefined {
    const digest = reference.startsWith('sha256:') ? reference : this.tags.get(namespace)?.get(reference);
    return digest ? this.manifests.get(namespace)?.get(digest) : undefined;
  }
}
