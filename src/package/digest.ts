/**
 * Chunked file hashing.
 * @module package/digest
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { open } from 'node:fs/promises';

/**
 * Default chunk size when hashing package files: 500 MiB.
 */
export const DEFAULT_CHUNK_SIZE = 500 * 1024 * 1024;

/**
 * Digest of one bounded slice of a file.
 */
export interface ChunkDigest {
  /** SHA-256 of the slice, hex */
  readonly sha256: string;
  /** Byte offset of the slice in the file */
  readonly offset: number;
  readonly size: number;
}

/**
 * Whole-file digest plus per-chunk digests.
 */
export interface FileDigest {
  /** SHA-256 of the whole file, hex */
  readonly sha256: string;
  readonly size: number;
  readonly chunks: readonly ChunkDigest[];
}

/**
 * Hashes a buffer as lowercase hex SHA-256.
 */
export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Streams a file once, computing the whole-file SHA-256 and the digest of
 * each consecutive `chunkSize` slice. Memory stays bounded by the stream's
 * read buffer.
 */
export async function digestFile(
  path: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<FileDigest> {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const whole = createHash('sha256');
  const chunks: ChunkDigest[] = [];
  let size = 0;
  let chunkHash = createHash('sha256');
  let chunkOffset = 0;
  let chunkFill = 0;

  const finishChunk = (): void => {
    chunks.push({ sha256: chunkHash.digest('hex'), offset: chunkOffset, size: chunkFill });
    chunkOffset += chunkFill;
    chunkFill = 0;
    chunkHash = createHash('sha256');
  };

  for await (const data of createReadStream(path)) {
    const buf: Buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
    whole.update(buf);
    size += buf.length;

    let pos = 0;
    while (pos < buf.length) {
      const take = Math.min(chunkSize - chunkFill, buf.length - pos);
      chunkHash.update(buf.subarray(pos, pos + take));
      chunkFill += take;
      pos += take;
      if (chunkFill === chunkSize) {
        finishChunk();
      }
    }
  }

  if (chunkFill > 0 || chunks.length === 0) {
    finishChunk();
  }

  return { sha256: whole.digest('hex'), size, chunks };
}

/**
 * Reads a file as consecutive `chunkSize` buffers, one at a time.
 * An empty file yields a single empty buffer.
 */
export async function* readFileChunks(
  path: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): AsyncGenerator<Buffer> {
  const handle = await open(path, 'r');
  try {
    const { size } = await handle.stat();
    if (size === 0) {
      yield Buffer.alloc(0);
      return;
    }

    let position = 0;
    while (position < size) {
      const length = Math.min(chunkSize, size - position);
      const buffer = Buffer.alloc(length);
      let filled = 0;
      while (filled < length) {
        const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
        if (bytesRead === 0) {
          throw new Error(`${path} shrank while reading`);
        }
        filled += bytesRead;
      }
      position += length;
      yield buffer;
    }
  } finally {
    await handle.close();
  }
}
