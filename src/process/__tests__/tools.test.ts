import { describe, it, expect, beforeEach } from 'vitest';
import { DistErrorKind } from '../../errors.js';
import { InMemoryLogger } from '../../observability/index.js';
import type { CommandResult, CommandRunner } from '../runner.js';
import { ProcessRunner, runChecked } from '../runner.js';
import { GpgSigner, RepoTool } from '../tools.js';

class FakeRunner implements CommandRunner {
  readonly commands: string[][] = [];
  results: CommandResult[] = [];

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.commands.push([command, ...args]);
    return this.results.shift() ?? { exitCode: 0, stdout: '', stderr: '' };
  }
}

describe('runChecked', () => {
  it('should report the output of a failed command', async () => {
    const runner = new FakeRunner();
    runner.results.push({ exitCode: 2, stdout: '', stderr: 'no such file' });

    await expect(runChecked(runner, 'repo-add', ['core.db'])).rejects.toMatchObject({
      kind: DistErrorKind.ToolFailed,
      message: "'repo-add core.db' failed with exit code 2",
      context: { command: 'repo-add core.db', exitCode: 2, output: 'no such file' },
    });
  });
});

describe('ProcessRunner', () => {
  it('should fail when the command cannot be started', async () => {
    await expect(new ProcessRunner().run('pmsync-no-such-tool', [])).rejects.toMatchObject({
      kind: DistErrorKind.ToolFailed,
      message: "'pmsync-no-such-tool' failed with exit code unknown",
    });
  });
});

describe('RepoTool', () => {
  let runner: FakeRunner;
  let logger: InMemoryLogger;
  let tool: RepoTool;

  beforeEach(() => {
    runner = new FakeRunner();
    logger = new InMemoryLogger();
    tool = new RepoTool(runner, { repoAdd: '/usr/bin/repo-add', repoRemove: '/usr/bin/repo-remove' }, logger);
  });

  it('should create an index quietly', async () => {
    runner.results.push({
      exitCode: 0,
      stdout: '==> WARNING: No packages remain, creating empty database.\n',
      stderr: 'note: created\n',
    });

    await tool.create('/srv/core.db.tar.zst');

    expect(runner.commands).toEqual([['/usr/bin/repo-add', '--quiet', '/srv/core.db.tar.zst']]);
    expect(logger.messages('info')).toEqual(['note: created']);
  });

  it('should prevent downgrades unless told otherwise', async () => {
    await tool.add('/srv/core.db', ['a.pkg.tar.zst', 'b.pkg.tar.zst'], { preventDowngrade: true });
    await tool.add('/srv/core.db', ['c.pkg.tar.zst'], { preventDowngrade: false });

    expect(runner.commands).toEqual([
      ['/usr/bin/repo-add', '--quiet', '--prevent-downgrade', '/srv/core.db', 'a.pkg.tar.zst', 'b.pkg.tar.zst'],
      ['/usr/bin/repo-add', '--quiet', '/srv/core.db', 'c.pkg.tar.zst'],
    ]);
  });

  it('should remove packages by name', async () => {
    await tool.remove('/srv/core.db', ['foo', 'bar']);

    expect(runner.commands).toEqual([['/usr/bin/repo-remove', '--quiet', '/srv/core.db', 'foo', 'bar']]);
  });
});

describe('GpgSigner', () => {
  it('should write a detached signature beside the file', async () => {
    const runner = new FakeRunner();

    expect(await new GpgSigner(runner).sign('/srv/core.db')).toBe('/srv/core.db.sig');
    expect(runner.commands).toEqual([
      ['gpg', '--use-agent', '--yes', '--output', '/srv/core.db.sig', '--detach-sig', '/srv/core.db'],
    ]);
  });

  it('should wrap a failed signing', async () => {
    const runner = new FakeRunner();
    runner.results.push({ exitCode: 2, stdout: '', stderr: 'no secret key' });

    await expect(new GpgSigner(runner, '/usr/bin/gpg2').sign('/srv/core.db')).rejects.toMatchObject({
      kind: DistErrorKind.SigningFailed,
      message: "Failed to sign '/srv/core.db'",
    });
  });
});
