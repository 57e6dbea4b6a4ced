/**
 * In-memory release-asset host.
 * @module simulation/memory-release-host
 */

import { DistError } from '../errors.js';
import type { Release, ReleaseAsset, ReleaseAssetHost } from '../releases/host.js';

interface StoredAsset {
  id: number;
  name: string;
  data: Buffer;
}

interface StoredRelease {
  id: number;
  name: string;
  assets: StoredAsset[];
}

/**
 * A recorded host operation.
 */
export type ReleaseHostOperation =
  | { kind: 'list'; remote: string }
  | { kind: 'delete'; remote: string; assetId: number }
  | { kind: 'upload'; remote: string; releaseId: number; name: string };

/**
 * `ReleaseAssetHost` kept in memory, with an operation log.
 */
export class MemoryReleaseHost implements ReleaseAssetHost {
  readonly operations: ReleaseHostOperation[] = [];
  private readonly releases = new Map<string, StoredRelease[]>();
  private nextId = 1;

  /**
   * Creates a release under a remote.
   */
  createRelease(remote: string, name: string): number {
    const release: StoredRelease = { id: this.nextId++, name, assets: [] };
    const list = this.releases.get(remote) ?? [];
    list.push(release);
    this.releases.set(remote, list);
    return release.id;
  }

  /**
   * Gets an asset's content.
   */
  getAsset(remote: string, releaseName: string, assetName: string): Buffer | undefined {
    const release = this.releases.get(remote)?.find(r => r.name === releaseName);
    return release?.assets.find(a => a.name === assetName)?.data;
  }

  async listReleases(remote: string): Promise<Release[]> {
    this.operations.push({ kind: 'list', remote });
    return (this.releases.get(remote) ?? []).map(r => ({
      id: r.id,
      name: r.name,
      assets: r.assets.map(a => ({ id: a.id, name: a.name })),
    }));
  }

  async deleteAsset(remote: string, assetId: number): Promise<void> {
    this.operations.push({ kind: 'delete', remote, assetId });
    for (const release of this.releases.get(remote) ?? []) {
      const idx = release.assets.findIndex(a => a.id === assetId);
      if (idx !== -1) {
        release.assets.splice(idx, 1);
        return;
      }
    }
    throw DistError.fromResponse(404, `asset ${assetId} not found`);
  }

  async uploadAsset(remote: string, releaseId: number, name: string, data: Uint8Array): Promise<ReleaseAsset> {
    this.operations.push({ kind: 'upload', remote, releaseId, name });
    const release = this.releases.get(remote)?.find(r => r.id === releaseId);
    if (!release) {
      throw DistError.fromResponse(404, `release ${releaseId} not found`);
    }
    if (release.assets.some(a => a.name === name)) {
      throw DistError.fromResponse(422, `asset ${name} already exists`);
    }
    const asset: StoredAsset = { id: this.nextId++, name, data: Buffer.from(data) };
    release.assets.push(asset);
    return { id: asset.id, name: asset.name };
  }
}
