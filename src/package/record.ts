/**
 * Package records parsed from package files and index entries.
 * @module package/record
 */

import { basename } from 'node:path';
import { DistError } from '../errors.js';
import type { Version } from '../version/version.js';
import { formatVersion, parseVersion } from '../version/version.js';
import type { Platform } from '../registry/types.js';
import type { FileDigest } from './digest.js';

/**
 * Package architectures accepted into a repository.
 */
export const SUPPORTED_ARCHES = ['any', 'x86_64', 'arm64', 'arm64e', 'aarch64'] as const;

export type PackageArch = typeof SUPPORTED_ARCHES[number];

/**
 * Package file extensions.
 */
export const PACKAGE_EXTENSIONS = ['.pkg.tar.gz', '.pkg.tar.xz', '.pkg.tar.zst'] as const;

/**
 * Names that are not legal registry path components, with their remaps.
 */
export const NAME_REPLACEMENTS: Readonly<Record<string, string>> = {
  'crypto++': 'cryptopp',
  'libsigc++': 'libsigcpp',
  'libsigc++-docs': 'libsigcpp-docs',
};

/**
 * Registry path component grammar (OCI distribution spec).
 */
const PATH_COMPONENT = /^[a-z0-9]+(?:(?:\.|_|__|-+)[a-z0-9]+)*$/;

/**
 * Immutable package record.
 */
export interface PackageRecord {
  readonly name: string;
  readonly version: Version;
  readonly arch: PackageArch;
  /** SHA-256 of the package file, hex */
  readonly contentHash: string;
  readonly sizeBytes: number;
}

function isSupportedArch(arch: string): arch is PackageArch {
  return (SUPPORTED_ARCHES as readonly string[]).includes(arch);
}

/**
 * Validates an architecture string.
 */
export function checkArch(name: string, arch: string): PackageArch {
  if (!isSupportedArch(arch)) {
    throw DistError.unsupportedArch(name, arch);
  }
  return arch;
}

/**
 * Parses `$name-[$epoch:]$pkgver-$pkgrel-$arch.pkg.tar.<ext>`.
 */
export function parsePackageFileName(file: string): {
  name: string;
  version: Version;
  arch: PackageArch;
} {
  const fileName = basename(file);
  const ext = PACKAGE_EXTENSIONS.find(e => fileName.endsWith(e));
  if (!ext) {
    throw DistError.invalidPackageFile(file, 'not a package archive');
  }

  // name may contain dashes; version fields and arch cannot
  const parts = fileName.slice(0, -ext.length).split('-');
  if (parts.length < 4) {
    throw DistError.invalidPackageFile(file, 'expected name-version-release-arch');
  }

  const arch = parts.pop() ?? '';
  const release = parts.pop() ?? '';
  const upstream = parts.pop() ?? '';
  const name = parts.join('-');

  if (name.length === 0) {
    throw DistError.invalidPackageFile(file, 'missing package name');
  }

  return {
    name,
    version: parseVersion(`${upstream}-${release}`),
    arch: checkArch(name, arch),
  };
}

/**
 * Builds a record from a package file and its digest.
 */
export function recordFromFile(file: string, digest: FileDigest): PackageRecord {
  const { name, version, arch } = parsePackageFileName(file);
  return {
    name,
    version,
    arch,
    contentHash: digest.sha256,
    sizeBytes: digest.size,
  };
}

/**
 * Parses a `desc` file from a repository index.
 */
export function recordFromDesc(desc: string, source = 'desc'): PackageRecord {
  const lines = desc.split(/\r?\n/);

  const field = (key: string): string => {
    const idx = lines.indexOf(`%${key}%`);
    const value = idx === -1 ? undefined : lines[idx + 1];
    if (value === undefined || value.length === 0) {
      throw DistError.invalidIndexArchive(source, `missing %${key}%`);
    }
    return value;
  };

  const name = field('NAME');
  const size = Number(field('CSIZE'));
  if (!Number.isSafeInteger(size) || size < 0) {
    throw DistError.invalidIndexArchive(source, `bad %CSIZE% for ${name}`);
  }

  return {
    name,
    version: parseVersion(field('VERSION')),
    arch: checkArch(name, field('ARCH')),
    contentHash: field('SHA256SUM'),
    sizeBytes: size,
  };
}

/**
 * Renders the `desc` fields this module reads back.
 */
export function recordToDesc(record: PackageRecord, fileName?: string): string {
  const fields: Array<[string, string]> = [];
  if (fileName !== undefined) {
    fields.push(['FILENAME', fileName]);
  }
  fields.push(
    ['NAME', record.name],
    ['VERSION', formatVersion(record.version)],
    ['CSIZE', String(record.sizeBytes)],
    ['SHA256SUM', record.contentHash],
    ['ARCH', record.arch]
  );
  return fields.map(([key, value]) => `%${key}%\n${value}\n`).join('\n');
}

/**
 * Name used for the package's registry namespace.
 */
export function registryName(name: string): string {
  const replacement = NAME_REPLACEMENTS[name];
  if (replacement !== undefined) {
    return replacement;
  }
  if (name.includes('+')) {
    throw DistError.invalidPackageName(name, "contains invalid character '+'");
  }
  if (!PATH_COMPONENT.test(name)) {
    throw DistError.invalidPackageName(name, 'is not a valid registry path component');
  }
  return name;
}

/**
 * Maps a package architecture to a registry platform.
 * Returns undefined for architecture-independent packages.
 */
export function platformForArch(
  record: Pick<PackageRecord, 'name' | 'arch'>,
  os: string
): Platform | undefined {
  switch (record.arch) {
    case 'any':
      return undefined;
    case 'x86_64':
      return { os, architecture: 'amd64' };
    case 'arm64':
    case 'arm64e':
    case 'aarch64':
      return { os, architecture: 'arm64' };
    default:
      throw DistError.unsupportedArch(record.name, String(record.arch));
  }
}

/**
 * Formats a record as `name-version-arch`.
 */
export function formatRecord(record: PackageRecord): string {
  return `${record.name}-${formatVersion(record.version)}-${record.arch}`;
}
