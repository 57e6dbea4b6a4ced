import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FetchFn } from '../../auth/registry-auth.js';
import { DistErrorKind } from '../../errors.js';
import { scratchDir } from '../../__tests__/helpers.js';
import { MemoryReleaseHost } from '../../simulation/memory-release-host.js';
import { GitHubReleaseHost, replaceReleaseAssets } from '../host.js';

describe('replaceReleaseAssets', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let host: MemoryReleaseHost;

  beforeEach(async () => {
    ({ dir, cleanup } = await scratchDir());
    host = new MemoryReleaseHost();
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should delete an existing asset before uploading its replacement', async () => {
    const releaseId = host.createRelease('acme/pkgs', 'packages');
    const old = await host.uploadAsset('acme/pkgs', releaseId, 'core.db', Buffer.from('old index'));
    host.operations.length = 0;

    const db = join(dir, 'core.db');
    const sig = join(dir, 'core.db.sig');
    await writeFile(db, 'new index');
    await writeFile(sig, 'signature');

    await replaceReleaseAssets(host, 'acme/pkgs', 'packages', [
      { name: 'core.db', path: db },
      { name: 'core.db.sig', path: sig },
    ]);

    expect(host.operations).toEqual([
      { kind: 'list', remote: 'acme/pkgs' },
      { kind: 'delete', remote: 'acme/pkgs', assetId: old.id },
      { kind: 'upload', remote: 'acme/pkgs', releaseId, name: 'core.db' },
      { kind: 'upload', remote: 'acme/pkgs', releaseId, name: 'core.db.sig' },
    ]);
    expect(host.getAsset('acme/pkgs', 'packages', 'core.db')?.toString('utf8')).toBe('new index');
    expect(host.getAsset('acme/pkgs', 'packages', 'core.db.sig')?.toString('utf8')).toBe('signature');
  });

  it('should fail when the release does not exist', async () => {
    host.createRelease('acme/pkgs', 'nightly');

    await expect(replaceReleaseAssets(host, 'acme/pkgs', 'packages', [])).rejects.toMatchObject({
      kind: DistErrorKind.ReleaseNotFound,
      message: "Did not find release named 'packages' in acme/pkgs",
    });
  });
});

interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
}

describe('GitHubReleaseHost', () => {
  let calls: RecordedCall[];
  let responses: Response[];
  let host: GitHubReleaseHost;

  const fetchStub: FetchFn = async (input, init) => {
    calls.push({ url: input.toString(), method: init?.method ?? 'GET', headers: new Headers(init?.headers) });
    return responses.shift() ?? new Response('no response queued', { status: 500 });
  };

  beforeEach(() => {
    calls = [];
    responses = [];
    host = new GitHubReleaseHost({ token: 'test-secret', userAgent: 'pmsync-test', fetch: fetchStub });
  });

  it('should list releases with their assets', async () => {
    responses.push(
      Response.json([{ id: 1, name: 'packages', draft: false, assets: [{ id: 5, name: 'core.db', size: 10 }] }])
    );

    const releases = await host.listReleases('acme/pkgs');

    expect(releases).toEqual([{ id: 1, name: 'packages', assets: [{ id: 5, name: 'core.db' }] }]);
    expect(calls[0]?.url).toBe('https://api.github.com/repos/acme/pkgs/releases');
    expect(calls[0]?.headers.get('Authorization')).toBe('Bearer test-secret');
    expect(calls[0]?.headers.get('User-Agent')).toBe('pmsync-test');
  });

  it('should upload an asset by name', async () => {
    responses.push(Response.json({ id: 9, name: 'core.db' }, { status: 201 }));

    const asset = await host.uploadAsset('acme/pkgs', 1, 'core.db', Buffer.from('index'));

    expect(asset).toEqual({ id: 9, name: 'core.db' });
    expect(calls[0]?.method).toBe('POST');
    expect(calls[0]?.url).toBe('https://uploads.github.com/repos/acme/pkgs/releases/1/assets?name=core.db');
    expect(calls[0]?.headers.get('Content-Type')).toBe('application/octet-stream');
  });

  it('should map error statuses', async () => {
    responses.push(new Response('Not Found', { status: 404 }));

    await expect(host.deleteAsset('acme/pkgs', 5)).rejects.toMatchObject({
      kind: DistErrorKind.NotFound,
      message: 'DELETE https://api.github.com/repos/acme/pkgs/releases/assets/5 failed with HTTP 404: Not Found',
    });
  });
});
