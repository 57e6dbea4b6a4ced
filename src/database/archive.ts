/**
 * Reading and writing repository index archives.
 *
 * An index is a tar archive holding one `<name>-<version>/desc` entry per
 * package, compressed with gzip or zstd (or left as plain tar).
 * @module database/archive
 */

import { createWriteStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGzip, gunzipSync } from 'node:zlib';
import { decompress as zstdDecompress } from 'fzstd';
import tar from 'tar-stream';
import { DistError, toError } from '../errors.js';
import type { PackageRecord } from '../package/record.js';
import { recordFromDesc, recordToDesc } from '../package/record.js';
import { formatVersion } from '../version/version.js';

/**
 * Compression detected from leading bytes.
 */
export type ArchiveCompression = 'gzip' | 'zstd' | 'xz' | 'bzip2' | 'none';

const GZIP_MAGIC = [0x1f, 0x8b];
const ZSTD_MAGIC = [0x28, 0xb5, 0x2f, 0xfd];
const XZ_MAGIC = [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00];
const BZIP2_MAGIC = [0x42, 0x5a, 0x68];

function startsWith(data: Uint8Array, magic: readonly number[]): boolean {
  return data.length >= magic.length && magic.every((b, i) => data[i] === b);
}

/**
 * Detects the compression of an archive.
 */
export function detectCompression(data: Uint8Array): ArchiveCompression {
  if (startsWith(data, GZIP_MAGIC)) return 'gzip';
  if (startsWith(data, ZSTD_MAGIC)) return 'zstd';
  if (startsWith(data, XZ_MAGIC)) return 'xz';
  if (startsWith(data, BZIP2_MAGIC)) return 'bzip2';
  return 'none';
}

function decompressArchive(data: Uint8Array, path: string): Uint8Array {
  const compression = detectCompression(data);
  try {
    switch (compression) {
      case 'gzip':
        return gunzipSync(data);
      case 'zstd':
        return zstdDecompress(data);
      case 'none':
        return data;
      default:
        throw DistError.invalidIndexArchive(path, `unsupported compression '${compression}'`);
    }
  } catch (error) {
    if (error instanceof DistError) {
      throw error;
    }
    throw DistError.invalidIndexArchive(path, `cannot decompress ${compression} data`, toError(error));
  }
}

/**
 * A regular file read out of a tar archive.
 */
export interface TarFile {
  readonly name: string;
  readonly content: Buffer;
}

/**
 * Extracts the regular files accepted by `wanted` from uncompressed tar data.
 */
export function extractTarFiles(
  data: Uint8Array,
  wanted: (name: string) => boolean = () => true
): Promise<TarFile[]> {
  return new Promise((resolve, reject) => {
    const extract = tar.extract();
    const files: TarFile[] = [];

    extract.on('entry', (header, stream, next) => {
      const keep = header.type === 'file' && wanted(header.name);
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        if (keep) {
          chunks.push(chunk);
        }
      });
      stream.on('end', () => {
        if (keep) {
          files.push({ name: header.name, content: Buffer.concat(chunks) });
        }
        next();
      });
      stream.on('error', reject);
    });

    extract.on('finish', () => resolve(files));
    extract.on('error', reject);
    extract.end(Buffer.from(data));
  });
}

/**
 * Reads every package record from an index archive.
 */
export async function readIndexArchive(path: string): Promise<PackageRecord[]> {
  let raw: Buffer;
  try {
    raw = await readFile(path);
  } catch (error) {
    throw DistError.invalidIndexArchive(path, 'cannot read file', toError(error));
  }

  const tarData = decompressArchive(raw, path);

  let files: TarFile[];
  try {
    files = await extractTarFiles(tarData, name => basename(name) === 'desc');
  } catch (error) {
    throw DistError.invalidIndexArchive(path, 'malformed tar data', toError(error));
  }

  return files.map(file => recordFromDesc(file.content.toString('utf8'), `${path}:${file.name}`));
}

/**
 * Writes a gzip-compressed index archive holding `records`.
 *
 * Output matches the layout `repo-add` produces, restricted to `desc` entries.
 */
export async function writeIndexArchive(
  path: string,
  records: readonly PackageRecord[],
  fileNames: ReadonlyMap<string, string> = new Map()
): Promise<void> {
  const pack = tar.pack();
  const sorted = [...records].sort((a, b) => a.name.localeCompare(b.name));

  for (const record of sorted) {
    const dir = `${record.name}-${formatVersion(record.version)}`;
    pack.entry({ name: `${dir}/`, type: 'directory', mode: 0o755 });
    pack.entry({ name: `${dir}/desc`, mode: 0o644 }, recordToDesc(record, fileNames.get(record.name)));
  }
  pack.finalize();

  await pipeline(Readable.from(pack), createGzip(), createWriteStream(path));
}
