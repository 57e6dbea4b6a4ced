import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RegistryAuth } from '../../auth/registry-auth.js';
import { DistErrorKind } from '../../errors.js';
import { RegistryClient } from '../../registry/client.js';
import { MockRegistry } from '../../simulation/mock-registry.js';
import { scratchDir } from '../../__tests__/helpers.js';
import { BUNDLE_DIR, readBundleInfo, uploadBundle } from '../bundle.js';
import { StreamingUploadPipeline } from '../pipeline.js';

describe('bundles', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let bundlePath: string;

  beforeEach(async () => {
    ({ dir, cleanup } = await scratchDir());
    bundlePath = join(dir, BUNDLE_DIR);
    await mkdir(bundlePath);
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('readBundleInfo', () => {
    it('should read the OS version and architecture', async () => {
      await writeFile(join(bundlePath, 'config.json'), JSON.stringify({ os_ver: 14, arch: 'arm64', cpus: 4 }));

      expect(await readBundleInfo(bundlePath)).toEqual({ osVersion: '14', arch: 'arm64' });
    });

    it('should reject a missing bundle', async () => {
      const missing = join(dir, 'nope');

      await expect(readBundleInfo(missing)).rejects.toMatchObject({
        kind: DistErrorKind.InvalidBundle,
        message: `Invalid bundle '${missing}': does not exist`,
      });
    });

    it('should reject a file in place of the bundle', async () => {
      const file = join(dir, 'file');
      await writeFile(file, '');

      await expect(readBundleInfo(file)).rejects.toThrow(`Invalid bundle '${file}': is not a directory`);
    });

    it('should reject a bundle without config.json', async () => {
      await expect(readBundleInfo(bundlePath)).rejects.toThrow(
        `Invalid bundle '${bundlePath}': does not contain config.json`
      );
    });

    it('should reject config.json that is not JSON', async () => {
      await writeFile(join(bundlePath, 'config.json'), 'os_ver=14');

      await expect(readBundleInfo(bundlePath)).rejects.toThrow(
        `Invalid bundle '${bundlePath}': config.json is not valid JSON`
      );
    });

    it('should name missing fields', async () => {
      await writeFile(join(bundlePath, 'config.json'), JSON.stringify({ os_ver: '14.2' }));

      await expect(readBundleInfo(bundlePath)).rejects.toThrow(
        `Invalid bundle '${bundlePath}': config.json is missing or has invalid arch`
      );
    });
  });

  describe('uploadBundle', () => {
    it('should publish the bundle under its OS version', async () => {
      await writeFile(join(bundlePath, 'config.json'), JSON.stringify({ os_ver: '14.2', arch: 'arm64' }));
      await writeFile(join(bundlePath, 'disk.img'), 'disk contents');

      const registry = new MockRegistry({ userToken: 'test-secret' });
      const auth = new RegistryAuth({ registryUrl: registry.baseUrl, userToken: 'test-secret', fetch: registry.fetch });
      const client = new RegistryClient({ registryUrl: registry.baseUrl, remote: 'acme/pkgs', auth, fetch: registry.fetch });
      const pipeline = new StreamingUploadPipeline({ client, blobSize: 1024, queueCapacity: 2, workers: 1 });

      const { manifest } = await uploadBundle(pipeline, {
        sandboxPath: dir,
        name: 'sandbox-vm',
        remote: 'acme/pkgs',
        sourceUrlBase: 'https://github.com/',
        os: 'darwin',
      });

      expect(manifest.version).toBe('14.2');
      expect(manifest.description).toBe('sandbox-vm 14.2');
      expect(manifest.sourceUrl).toBe('https://github.com/acme/pkgs');
      expect(registry.listTags('acme/pkgs/sandbox-vm')).toEqual(['14.2']);

      const index = await client.getIndex('acme/pkgs/sandbox-vm', '14.2');
      expect(index?.manifests[0]?.platform).toEqual({ os: 'darwin', architecture: 'arm64' });
    });
  });
});
