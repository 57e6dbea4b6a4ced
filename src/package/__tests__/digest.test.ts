import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { scratchDir } from '../../__tests__/helpers.js';
import { digestFile, readFileChunks, sha256Hex } from '../digest.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('digest', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await scratchDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should hash the empty buffer', () => {
    expect(sha256Hex(new Uint8Array())).toBe(EMPTY_SHA256);
  });

  it('should digest the whole file and each chunk', async () => {
    const file = join(dir, 'data.bin');
    await writeFile(file, 'abcdefghij');

    const digest = await digestFile(file, 4);

    expect(digest.sha256).toBe(sha256Hex(Buffer.from('abcdefghij')));
    expect(digest.size).toBe(10);
    expect(digest.chunks).toEqual([
      { sha256: sha256Hex(Buffer.from('abcd')), offset: 0, size: 4 },
      { sha256: sha256Hex(Buffer.from('efgh')), offset: 4, size: 4 },
      { sha256: sha256Hex(Buffer.from('ij')), offset: 8, size: 2 },
    ]);
  });

  it('should produce a single empty chunk for an empty file', async () => {
    const file = join(dir, 'empty.bin');
    await writeFile(file, '');

    const digest = await digestFile(file, 4);

    expect(digest).toEqual({ sha256: EMPTY_SHA256, size: 0, chunks: [{ sha256: EMPTY_SHA256, offset: 0, size: 0 }] });
  });

  it('should reject a non-positive chunk size', async () => {
    await expect(digestFile(join(dir, 'missing'), 0)).rejects.toThrow(RangeError);
  });

  it('should read a file in bounded chunks', async () => {
    const file = join(dir, 'data.bin');
    await writeFile(file, 'abcdefghij');

    const chunks: string[] = [];
    for await (const chunk of readFileChunks(file, 4)) {
      chunks.push(chunk.toString('utf8'));
    }

    expect(chunks).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('should yield one empty chunk for an empty file', async () => {
    const file = join(dir, 'empty.bin');
    await writeFile(file, '');

    const sizes: number[] = [];
    for await (const chunk of readFileChunks(file, 4)) {
      sizes.push(chunk.length);
    }

    expect(sizes).toEqual([0]);
  });
});
