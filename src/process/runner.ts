/**
 * Blocking external process execution.
 * @module process/runner
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { DistError } from '../errors.js';
import type { Logger } from '../observability/index.js';
import { NoOpLogger } from '../observability/index.js';

/**
 * Result of a finished command.
 */
export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Options for a single command.
 */
export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Narrow contract for running an external command to completion.
 *
 * Implementations resolve with the result of any process that exited, whatever
 * its exit code, and reject only when the process could not run at all.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Runs a command and throws a `ToolFailed` error on a non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw DistError.toolFailed(
      [command, ...args].join(' '),
      result.exitCode,
      result.stderr || result.stdout
    );
  }
  return result;
}

/**
 * `CommandRunner` backed by `child_process.spawn`.
 */
export class ProcessRunner implements CommandRunner {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new NoOpLogger();
  }

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    this.logger.debug('Running command', { command, args });

    let proc: ChildProcess;
    try {
      proc = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw DistError.toolFailed(
        command,
        null,
        error instanceof Error ? error.message : String(error)
      );
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const { exitCode, signal } = await this.waitForExit(proc, command);
    const stdout = Buffer.concat(stdoutChunks).toString();
    const stderr = Buffer.concat(stderrChunks).toString();

    if (exitCode === null) {
      throw DistError.toolFailed(command, null, `terminated by ${signal ?? 'unknown signal'}\n${stderr}`);
    }

    return { exitCode, stdout, stderr };
  }

  private waitForExit(
    proc: ChildProcess,
    command: string
  ): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }> {
    return new Promise((resolve, reject) => {
      // 'close' fires after stdio is flushed
      proc.on('close', (code, signal) => {
        resolve({ exitCode: code, signal });
      });

      proc.on('error', (err) => {
        reject(DistError.toolFailed(command, null, err.message));
      });
    });
  }
}
