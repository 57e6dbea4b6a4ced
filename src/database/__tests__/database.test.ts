import { mkdir, readFile, readlink, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DistErrorKind } from '../../errors.js';
import { InMemoryLogger } from '../../observability/index.js';
import { digestFile } from '../../package/digest.js';
import { scratchDir } from '../../__tests__/helpers.js';
import { ArchiveIndexTool, StubSigner } from '../../simulation/index-tool.js';
import { compareVersions, formatVersion, parseVersion } from '../../version/version.js';
import { LocalDatabase } from '../database.js';

// mulberry32
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('LocalDatabase', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let dbPath: string;
  let indexTool: ArchiveIndexTool;
  let signer: StubSigner;
  let logger: InMemoryLogger;

  const load = (): Promise<LocalDatabase> =>
    LocalDatabase.load(dbPath, { indexTool, signer, logger, lockPollIntervalMs: 5 });

  const writePackage = async (fileName: string, content: string, subdir = 'pkgs') => {
    const folder = join(dir, subdir);
    await mkdir(folder, { recursive: true });
    const file = join(folder, fileName);
    await writeFile(file, content);
    return { file, digest: await digestFile(file) };
  };

  beforeEach(async () => {
    ({ dir, cleanup } = await scratchDir());
    dbPath = join(dir, 'repo', 'core.db');
    indexTool = new ArchiveIndexTool();
    signer = new StubSigner();
    logger = new InMemoryLogger();
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('load', () => {
    it('should create and sign a missing index', async () => {
      const db = await load();

      expect(db.packages()).toEqual([]);
      expect(indexTool.calls).toEqual([{ operation: 'create', path: `${dbPath}.tar.zst`, args: [] }]);
      expect(await readlink(dbPath)).toBe('core.db.tar.zst');
      expect(signer.signed).toEqual([dbPath]);
      expect(await readFile(`${dbPath}.sig`, 'utf8')).toBe('stub signature for core.db\n');
    });

    it('should read an existing index', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      await db.save();

      const reloaded = await load();

      expect(reloaded.packages()).toEqual(db.packages());
      expect(logger.messages('info')).toContain(`Loaded 1 package from ${dbPath}`);
    });
  });

  describe('add and save', () => {
    it('should stage a new package and write it on save', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');

      expect(await db.add(file, digest)).toBe(true);
      expect(db.contains('foo')).toBe(false);
      expect(db.pending().additions).toHaveLength(1);
      expect(signer.signed).toContain(file);

      const saved = await db.save();

      expect(saved.map(s => s.file)).toEqual([file]);
      expect(db.packages().map(p => p.name)).toEqual(['foo']);
      expect(db.get('foo')?.contentHash).toBe(digest.sha256);
      expect(db.pending()).toEqual({ removals: [], additions: [] });
      expect(indexTool.calls.map(c => c.operation)).toEqual(['create', 'add']);
    });

    it('should not sign a package that already has a signature', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await writeFile(`${file}.sig`, 'existing');

      await db.add(file, digest);

      expect(signer.signed).not.toContain(file);
    });

    it('should skip the same version with the same content', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      await db.save();

      expect(await db.add(file, digest)).toBe(false);
      expect(logger.messages('info')).toContain('foo 1.0-1 is already present');
      expect(await db.save()).toEqual([]);
    });

    it('should warn when content changes without a version change', async () => {
      const db = await load();
      const first = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(first.file, first.digest);
      await db.save();

      const rebuilt = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo rebuilt', 'rebuilt');

      expect(await db.add(rebuilt.file, rebuilt.digest)).toBe(true);
      expect(logger.messages('warn')).toContain('foo 1.0-1: content changed without a version change');
    });

    it('should supersede an older version and reject a downgrade', async () => {
      const db = await load();
      const v1 = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(v1.file, v1.digest);
      await db.save();

      const v2 = await writePackage('foo-1.0-2-x86_64.pkg.tar.zst', 'foo two');
      expect(await db.add(v2.file, v2.digest)).toBe(true);
      expect(db.pending().removals.map(r => formatVersion(r.version))).toEqual(['1.0-1']);

      await db.save();

      expect(indexTool.calls.map(c => c.operation)).toEqual(['create', 'add', 'remove', 'add']);
      expect(db.get('foo')?.version).toEqual({ epoch: 0, upstream: '1.0', release: '2' });

      await expect(db.add(v1.file, v1.digest)).rejects.toMatchObject({
        kind: DistErrorKind.DowngradeRejected,
        message: "Refusing to downgrade 'foo' from 1.0-2 to 1.0-1",
      });
      expect(db.pending().additions).toEqual([]);
    });

    it('should reject a downgrade below a version that is only staged', async () => {
      const db = await load();
      const v1 = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      const v2 = await writePackage('foo-1.0-2-x86_64.pkg.tar.zst', 'foo two');

      expect(await db.add(v1.file, v1.digest)).toBe(true);
      expect(await db.add(v2.file, v2.digest)).toBe(true);
      await expect(db.add(v1.file, v1.digest)).rejects.toMatchObject({
        kind: DistErrorKind.DowngradeRejected,
        message: "Refusing to downgrade 'foo' from 1.0-2 to 1.0-1",
      });

      expect(db.pending().additions.map(a => a.file)).toEqual([v2.file]);
      expect(indexTool.calls.map(c => c.operation)).toEqual(['create']);
    });

    it('should never lower the effective version over any sequence of adds', async () => {
      const packages = await Promise.all(
        ['0.9-5', '1.0-1', '1.0-2', '1.1-1', '2.0-1'].map(async version => ({
          version: parseVersion(version),
          ...(await writePackage(`foo-${version}-any.pkg.tar.zst`, `foo ${version}`, version)),
        }))
      );
      const random = seededRandom(7);

      for (let round = 0; round < 4; round++) {
        const db = await LocalDatabase.load(join(dir, `round-${round}`, 'core.db'), {
          indexTool,
          signer,
          logger,
          lockPollIntervalMs: 5,
        });
        const effective = () =>
          db.pending().additions.find(a => a.record.name === 'foo')?.record.version ?? db.get('foo')?.version;

        for (let step = 0; step < 25; step++) {
          if (random() < 0.2) {
            await db.save();
            continue;
          }
          const pkg = packages[Math.floor(random() * packages.length)];
          if (!pkg) {
            throw new Error('package index out of range');
          }

          const before = effective();
          const outcome = await db.add(pkg.file, pkg.digest).then(
            () => 'staged',
            (error: unknown) => error
          );
          const after = effective();

          if (before && compareVersions(pkg.version, before) < 0) {
            expect(outcome).toMatchObject({ kind: DistErrorKind.DowngradeRejected });
            expect(after).toEqual(before);
          } else {
            expect(outcome).toBe('staged');
            expect(after).toEqual(pkg.version);
          }
        }
      }
    });

    it('should accept a downgrade when allowed', async () => {
      const db = await load();
      const v2 = await writePackage('foo-1.0-2-x86_64.pkg.tar.zst', 'foo two');
      await db.add(v2.file, v2.digest);
      await db.save();

      const v1 = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      expect(await db.add(v1.file, v1.digest, { allowDowngrade: true })).toBe(true);
      await db.save();

      expect(db.get('foo')?.version.release).toBe('1');
    });

    it('should reject a name that cannot be a registry namespace', async () => {
      const db = await load();
      const { file, digest } = await writePackage('gtk+-1.0-1-x86_64.pkg.tar.zst', 'gtk');

      await expect(db.add(file, digest)).rejects.toMatchObject({ kind: DistErrorKind.InvalidPackageName });
      expect(db.pending().additions).toEqual([]);
    });
  });

  describe('remove', () => {
    it('should remove an on-disk package on save', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      await db.save();

      const record = db.get('foo');
      expect(record).toBeDefined();
      if (record) {
        db.remove(record);
      }
      await db.save();

      expect(db.packages()).toEqual([]);
      expect(indexTool.calls.at(-1)).toEqual({ operation: 'remove', path: dbPath, args: ['foo'] });
    });

    it('should still reject an older version after queueing a removal', async () => {
      const db = await load();
      const v2 = await writePackage('foo-1.0-2-x86_64.pkg.tar.zst', 'foo two');
      await db.add(v2.file, v2.digest);
      await db.save();
      const v1 = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');

      const record = db.get('foo');
      expect(record).toBeDefined();
      if (record) {
        db.remove(record);
      }

      await expect(db.add(v1.file, v1.digest)).rejects.toMatchObject({
        kind: DistErrorKind.DowngradeRejected,
        message: "Refusing to downgrade 'foo' from 1.0-2 to 1.0-1",
      });
      expect(db.pending().removals.map(r => formatVersion(r.version))).toEqual(['1.0-2']);
      expect(db.pending().additions).toEqual([]);

      expect(await db.add(v1.file, v1.digest, { allowDowngrade: true })).toBe(true);
      await db.save();

      expect(db.get('foo')?.version).toEqual({ epoch: 0, upstream: '1.0', release: '1' });
      expect(indexTool.calls.slice(-2).map(c => c.operation)).toEqual(['remove', 'add']);
    });

    it('should keep a package that is removed and then added again', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      await db.save();

      const record = db.get('foo');
      expect(record).toBeDefined();
      if (record) {
        db.remove(record);
      }

      expect(await db.add(file, digest)).toBe(true);
      await db.save();

      expect(db.get('foo')?.contentHash).toBe(digest.sha256);
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should ignore a package that is not on disk', async () => {
      const db = await load();

      db.remove({ name: 'bar', version: { epoch: 0, upstream: '1.0', release: '1' }, arch: 'any', contentHash: 'x', sizeBytes: 1 });

      expect(db.pending().removals).toEqual([]);
      expect(logger.messages('warn')).toEqual(["Package 'bar' is not in the database, ignoring removal"]);
    });
  });

  describe('failures', () => {
    it('should discard pending operations when the tool fails', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      indexTool.failNext = 'add';

      await expect(db.save()).rejects.toMatchObject({ kind: DistErrorKind.ToolFailed });

      expect(db.pending()).toEqual({ removals: [], additions: [] });
      expect(db.packages()).toEqual([]);
    });

    it('should wait for the lock file to go away', async () => {
      const db = await load();
      const { file, digest } = await writePackage('foo-1.0-1-x86_64.pkg.tar.zst', 'foo one');
      await db.add(file, digest);
      await writeFile(`${dbPath}.lck`, '');

      const saving = db.save();
      setTimeout(() => {
        void rm(`${dbPath}.lck`);
      }, 30);
      await saving;

      expect(logger.messages('info')).toContain('Database is locked, waiting...');
      expect(db.contains('foo')).toBe(true);
    });
  });

  describe('ensureSignature', () => {
    it('should sign the index only when its signature is missing', async () => {
      const db = await load();
      expect(await db.ensureSignature()).toBe(`${dbPath}.sig`);
      expect(signer.signed).toEqual([dbPath]);

      await rm(`${dbPath}.sig`);
      await db.ensureSignature();

      expect(signer.signed).toEqual([dbPath, dbPath]);
    });
  });
});
