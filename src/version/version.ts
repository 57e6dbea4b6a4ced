/**
 * Package version triples and their registry tag projection.
 * @module version/version
 */

import { DistError } from '../errors.js';
import { vercmp } from './vercmp.js';

/**
 * Package version: `[epoch:]upstream-release`.
 */
export interface Version {
  /** Epoch (0 when absent) */
  readonly epoch: number;
  /** Upstream version (pkgver) */
  readonly upstream: string;
  /** Package release (pkgrel) */
  readonly release: string;
}

/**
 * Creates a version.
 */
export function createVersion(epoch: number, upstream: string, release: string): Version {
  if (!Number.isInteger(epoch) || epoch < 0) {
    throw DistError.invalidVersion(`${epoch}:${upstream}-${release}`);
  }
  if (upstream.length === 0 || release.length === 0 || upstream.includes('-')) {
    throw DistError.invalidVersion(`${upstream}-${release}`);
  }
  return { epoch, upstream, release };
}

/**
 * Formats a version as `[epoch:]upstream-release`.
 */
export function formatVersion(version: Version): string {
  const epoch = version.epoch > 0 ? `${version.epoch}:` : '';
  return `${epoch}${version.upstream}-${version.release}`;
}

/**
 * Parses `[epoch:]upstream-release`.
 */
export function parseVersion(value: string): Version {
  let rest = value;
  let epoch = 0;

  const colon = rest.indexOf(':');
  if (colon !== -1) {
    const epochStr = rest.slice(0, colon);
    if (!/^\d+$/.test(epochStr)) {
      throw DistError.invalidVersion(value);
    }
    epoch = parseInt(epochStr, 10);
    rest = rest.slice(colon + 1);
  }

  const dash = rest.lastIndexOf('-');
  if (dash <= 0 || dash === rest.length - 1) {
    throw DistError.invalidVersion(value);
  }

  return createVersion(epoch, rest.slice(0, dash), rest.slice(dash + 1));
}

/**
 * Compares two versions. Returns -1, 0 or 1.
 */
export function compareVersions(a: Version, b: Version): number {
  return vercmp(formatVersion(a), formatVersion(b));
}

/**
 * Version equality as defined by the ordering, not by structure.
 */
export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0;
}

/**
 * Rewrites a version string into legal registry tag syntax.
 */
export function sanitizeVersionString(value: string): string {
  return value.replace(/:/g, '-').replace(/\+/g, '_');
}

/**
 * Registry tag for a version.
 */
export function sanitizeVersion(version: Version): string {
  return sanitizeVersionString(formatVersion(version));
}

/**
 * Recovers a version from a registry tag.
 *
 * Lossy: `+` and `_` both come back as `_`, which orders identically since
 * both are segment separators. Two versions differing only there share a tag.
 */
export function unsanitizeVersion(tag: string): Version {
  const dashes = tag.split('-').length - 1;
  const value = dashes === 2 ? tag.replace('-', ':') : tag;
  return parseVersion(value);
}
