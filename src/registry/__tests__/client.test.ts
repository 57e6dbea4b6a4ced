import { describe, it, expect, beforeEach } from 'vitest';
import { RegistryAuth } from '../../auth/registry-auth.js';
import { DistErrorKind } from '../../errors.js';
import { InMemoryLogger } from '../../observability/index.js';
import { sha256Hex } from '../../package/digest.js';
import { MockRegistry } from '../../simulation/mock-registry.js';
import { Existence, RegistryClient, UploadResult } from '../client.js';
import type { PackageManifest } from '../types.js';
import { MediaType, contentDigest } from '../types.js';

const REMOTE = 'acme/pkgs';
const NAMESPACE = 'acme/pkgs/foo';

function manifestFor(content: string, version = '1.0-1'): PackageManifest {
  const data = Buffer.from(content);
  return {
    name: 'foo',
    version,
    sourceUrl: 'https://github.com/acme/pkgs',
    layers: [{ sha256: sha256Hex(data), mediaType: MediaType.Bytes, size: data.length }],
  };
}

describe('RegistryClient', () => {
  let registry: MockRegistry;
  let auth: RegistryAuth;
  let logger: InMemoryLogger;
  let client: RegistryClient;

  beforeEach(() => {
    registry = new MockRegistry({ userToken: 'test-secret' });
    logger = new InMemoryLogger();
    auth = new RegistryAuth({ registryUrl: registry.baseUrl, userToken: 'test-secret', fetch: registry.fetch });
    client = new RegistryClient({ registryUrl: registry.baseUrl, remote: REMOTE, auth, fetch: registry.fetch, logger });
  });

  describe('blobs', () => {
    it('should upload a blob once', async () => {
      const data = Buffer.from('hello');
      const sha = sha256Hex(data);

      expect(await client.uploadBlob(NAMESPACE, sha, data)).toBe(true);
      expect(await client.uploadBlob(NAMESPACE, sha, data)).toBe(false);

      expect(registry.hasBlob(NAMESPACE, sha)).toBe(true);
      expect(registry.countRequests('PUT', /\/blobs\/uploads\//)).toBe(1);
    });

    it('should stream a blob back', async () => {
      const data = Buffer.from('hello world');
      const sha = sha256Hex(data);
      await client.uploadBlob(NAMESPACE, sha, data);

      const chunks: Uint8Array[] = [];
      for await (const chunk of client.getBlob(NAMESPACE, sha)) {
        chunks.push(chunk);
      }

      expect(Buffer.concat(chunks).toString('utf8')).toBe('hello world');
    });

    it('should surface a failed blob PUT', async () => {
      const data = Buffer.from('hello');
      registry.failNextBlobPuts(1);

      await expect(client.uploadBlob(NAMESPACE, sha256Hex(data), data)).rejects.toMatchObject({
        kind: DistErrorKind.ServerError,
        statusCode: 500,
      });
    });

    it('should include the registry error message', async () => {
      const sha = sha256Hex(Buffer.from('missing'));
      const read = async (): Promise<Uint8Array[]> => {
        const chunks: Uint8Array[] = [];
        for await (const chunk of client.getBlob(NAMESPACE, sha)) {
          chunks.push(chunk);
        }
        return chunks;
      };

      await expect(read()).rejects.toMatchObject({
        kind: DistErrorKind.NotFound,
        message: `GET ${registry.baseUrl}/v2/${NAMESPACE}/blobs/sha256:${sha} failed with HTTP 404: blob unknown`,
      });
    });
  });

  describe('tags', () => {
    it('should list no tags for an unknown namespace', async () => {
      expect(await client.getTagList(NAMESPACE)).toEqual([]);
    });

    it('should tag uploads with the sanitized version', async () => {
      await client.upload(manifestFor('a', '1:2.0+git-1'));

      expect(await client.getTagList(NAMESPACE)).toEqual(['1-2.0_git-1']);
    });
  });

  describe('upload', () => {
    it('should publish a manifest and an index', async () => {
      const manifest = manifestFor('a');

      expect(await client.upload(manifest, { os: 'darwin', architecture: 'amd64' })).toBe(UploadResult.Uploaded);

      const index = await client.getIndex(NAMESPACE, '1.0-1');
      expect(index?.manifests).toHaveLength(1);
      expect(index?.manifests[0]?.platform).toEqual({ os: 'darwin', architecture: 'amd64' });
      expect(index?.sourceUrl).toBe('https://github.com/acme/pkgs');

      const digest = index?.manifests[0]?.digest ?? '';
      const published = await client.getPackageManifest(NAMESPACE, digest);
      expect(published?.layers).toEqual(manifest.layers);
      expect(published?.description).toBe('foo 1.0-1');
    });

    it('should short-circuit when the same content is published', async () => {
      const manifest = manifestFor('a');
      await client.upload(manifest, { os: 'darwin', architecture: 'amd64' });
      const manifestPuts = registry.countRequests('PUT', /\/manifests\//);

      expect(await client.upload(manifest, { os: 'darwin', architecture: 'amd64' })).toBe(UploadResult.Exists);
      expect(registry.countRequests('PUT', /\/manifests\//)).toBe(manifestPuts);
    });

    it('should keep other platforms when adding one', async () => {
      await client.upload(manifestFor('intel'), { os: 'darwin', architecture: 'amd64' });
      await client.upload(manifestFor('arm'), { os: 'darwin', architecture: 'arm64' });

      const index = await client.getIndex(NAMESPACE, '1.0-1');
      expect(index?.manifests.map(m => m.platform?.architecture)).toEqual(['amd64', 'arm64']);
    });

    it('should replace a conflicting manifest in the same platform slot', async () => {
      await client.upload(manifestFor('first'), { os: 'darwin', architecture: 'amd64' });
      const changed = manifestFor('second');

      const check = await client.checkExistence(NAMESPACE, changed, { os: 'darwin', architecture: 'amd64' });
      expect(check).toEqual({ existence: Existence.Conflicts, otherManifests: [] });

      expect(await client.upload(changed, { os: 'darwin', architecture: 'amd64' })).toBe(UploadResult.Uploaded);
      const index = await client.getIndex(NAMESPACE, '1.0-1');
      expect(index?.manifests).toHaveLength(1);
      expect(logger.messages('warn')).toContain(
        `Content of ${NAMESPACE}:1.0-1 (darwin/amd64) differs from the published manifest`
      );
    });

    it('should preserve descriptors that are not manifests', async () => {
      const attestation = {
        mediaType: 'application/vnd.in-toto+json',
        digest: `sha256:${'c'.repeat(64)}`,
        size: 10,
        annotations: { kind: 'provenance' },
      };
      registry.putRawManifest(
        NAMESPACE,
        '1.0-1',
        JSON.stringify({
          schemaVersion: 2,
          mediaType: MediaType.OciIndex,
          manifests: [attestation],
          annotations: {
            'org.opencontainers.image.title': 'foo',
            'org.opencontainers.image.version': '1.0-1',
            'org.opencontainers.image.source': 'https://github.com/acme/pkgs',
          },
        }),
        MediaType.OciIndex
      );

      await client.upload(manifestFor('a'), { os: 'darwin', architecture: 'amd64' });

      const index = await client.getIndex(NAMESPACE, '1.0-1');
      expect(index?.manifests[0]).toEqual(attestation);
      expect(index?.manifests[1]?.mediaType).toBe(MediaType.OciManifest);
    });

    it('should treat a malformed published manifest as a conflict', async () => {
      const bad = JSON.stringify({ bad: true });
      const badDigest = contentDigest(Buffer.from(bad));
      registry.putRawManifest(NAMESPACE, badDigest, bad, MediaType.OciManifest);
      registry.putRawManifest(
        NAMESPACE,
        '1.0-1',
        JSON.stringify({
          schemaVersion: 2,
          mediaType: MediaType.OciIndex,
          manifests: [{ mediaType: MediaType.OciManifest, digest: badDigest, size: bad.length }],
          annotations: {
            'org.opencontainers.image.title': 'foo',
            'org.opencontainers.image.version': '1.0-1',
            'org.opencontainers.image.source': 'https://github.com/acme/pkgs',
          },
        }),
        MediaType.OciIndex
      );

      const check = await client.checkExistence(NAMESPACE, manifestFor('a'));

      expect(check.existence).toBe(Existence.Conflicts);
      expect(logger.messages('warn').some(m => m.startsWith(`Malformed manifest ${badDigest} in ${NAMESPACE}`))).toBe(true);
    });

    it('should reject a tag holding something other than an index', async () => {
      registry.putRawManifest(NAMESPACE, '1.0-1', 'not json', MediaType.OciIndex);

      await expect(client.upload(manifestFor('a'))).rejects.toMatchObject({
        kind: DistErrorKind.InvalidManifest,
        message: 'Invalid manifest: index is not valid JSON',
      });
    });
  });

  describe('authentication', () => {
    it('should exchange the user token once per remote', async () => {
      const data = Buffer.from('hello');
      await client.uploadBlob(NAMESPACE, sha256Hex(data), data);
      await client.getTagList(NAMESPACE);

      const other = new RegistryClient({
        registryUrl: registry.baseUrl,
        remote: 'acme/other',
        auth,
        fetch: registry.fetch,
      });
      await other.getTagList('acme/other/bar');

      expect(registry.tokenRequests).toBe(2);
    });

    it('should fail with a wrong user token', async () => {
      const badAuth = new RegistryAuth({ registryUrl: registry.baseUrl, userToken: 'wrong', fetch: registry.fetch });
      const badClient = new RegistryClient({ registryUrl: registry.baseUrl, remote: REMOTE, auth: badAuth, fetch: registry.fetch });

      await expect(badClient.getTagList(NAMESPACE)).rejects.toMatchObject({
        kind: DistErrorKind.AuthFailed,
        message: 'Failed to get registry token for acme/pkgs: 401',
      });
    });
  });
});
