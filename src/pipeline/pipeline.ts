/**
 * Streaming upload of a directory tree as content-addressed blobs.
 *
 * The tree is archived with tar, compressed with gzip and cut into
 * fixed-size blobs. Blobs pass through a bounded queue to a pool of upload
 * workers, so memory stays bounded by the queue capacity when uploads lag
 * behind compression.
 *
 * @module pipeline/pipeline
 */

import { createReadStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import tar from 'tar-stream';
import type { Pack } from 'tar-stream';
import { DistError, toError } from '../errors.js';
import type { Logger, ProgressReporter } from '../observability/index.js';
import { NoOpLogger, NoOpProgressReporter } from '../observability/index.js';
import { sha256Hex } from '../package/digest.js';
import type { RegistryClient, UploadResult } from '../registry/client.js';
import type { BlobRef, PackageManifest, Platform } from '../registry/types.js';
import { MediaType } from '../registry/types.js';
import { BoundedQueue } from './queue.js';
import { RetryExecutor } from './retry.js';
import { walkTree } from './tree.js';

/**
 * Pipeline settings.
 */
export interface StreamingUploadOptions {
  client: RegistryClient;
  /** Size of every blob but the last */
  blobSize: number;
  queueCapacity: number;
  workers: number;
  /** gzip level, 0-9 */
  compressionLevel?: number;
  /** Extra attempts per blob */
  maxRetries?: number;
  retryDelayMs?: number;
  logger?: Logger;
  progress?: ProgressReporter;
}

/**
 * What the uploaded tree is published as.
 */
export interface UploadTarget {
  /** Manifest name; also the namespace under the client's remote */
  readonly name: string;
  readonly version: string;
  readonly sourceUrl: string;
  readonly description?: string;
  readonly platform?: Platform;
  /** Prefix of every archive entry name */
  readonly entryPrefix?: string;
}

/**
 * Counters of one run.
 */
export interface PipelineStats {
  blobsProduced: number;
  bytesProduced: number;
  blobsUploaded: number;
  /** Blobs the registry already had */
  blobsSkipped: number;
  blobsFailed: number;
  /** Highest queue length observed */
  maxQueueLength: number;
}

/**
 * Outcome of a successful run.
 */
export interface PipelineResult {
  readonly manifest: PackageManifest;
  readonly result: UploadResult;
  readonly stats: PipelineStats;
}

interface QueuedBlob {
  readonly sequence: number;
  readonly sha256: string;
  readonly data: Buffer;
}

interface BlobFailure {
  readonly sequence: number;
  readonly error: Error;
}

/**
 * Archives, compresses and uploads a directory tree.
 *
 * A run fails with `PipelineAborted` when cancelled or when reading or
 * compressing fails; queued blobs are dropped and uploads in flight are
 * allowed to finish first. It fails with `UploadFailed` when a blob exhausts
 * its retries, after every other blob was attempted.
 */
export class StreamingUploadPipeline {
  private readonly client: RegistryClient;
  private readonly blobSize: number;
  private readonly queueCapacity: number;
  private readonly workers: number;
  private readonly compressionLevel: number;
  private readonly retry: RetryExecutor;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private slotCounter = 0;

  constructor(options: StreamingUploadOptions) {
    if (!Number.isSafeInteger(options.blobSize) || options.blobSize <= 0) {
      throw new RangeError(`blobSize must be a positive integer, got ${options.blobSize}`);
    }
    if (!Number.isSafeInteger(options.workers) || options.workers <= 0) {
      throw new RangeError(`workers must be a positive integer, got ${options.workers}`);
    }

    this.client = options.client;
    this.blobSize = options.blobSize;
    this.queueCapacity = options.queueCapacity;
    this.workers = options.workers;
    this.compressionLevel = options.compressionLevel ?? 6;
    this.logger = options.logger ?? new NoOpLogger();
    this.progress = options.progress ?? new NoOpProgressReporter();
    this.retry = new RetryExecutor(
      {
        maxRetries: options.maxRetries ?? 2,
        initialBackoffMs: options.retryDelayMs ?? 1000,
        maxBackoffMs: 30000,
        backoffMultiplier: 2,
        jitterFactor: 0,
      },
      {
        onRetry: (attempt, error, delayMs) =>
          this.logger.warn(`Blob upload failed (attempt ${attempt}), retrying in ${delayMs}ms: ${error.message}`),
      }
    );
  }

  /**
   * Uploads the tree at `root` and publishes its manifest.
   */
  async run(root: string, target: UploadTarget, signal?: AbortSignal): Promise<PipelineResult> {
    const namespace = this.client.namespace(target.name);
    const queue = new BoundedQueue<QueuedBlob>(this.queueCapacity);
    const stats: PipelineStats = {
      blobsProduced: 0,
      bytesProduced: 0,
      blobsUploaded: 0,
      blobsSkipped: 0,
      blobsFailed: 0,
      maxQueueLength: 0,
    };
    const layers: BlobRef[] = [];
    const failures: BlobFailure[] = [];

    const controller = new AbortController();
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const workers = Array.from({ length: this.workers }, () =>
      this.work(queue, namespace, stats, failures, controller.signal)
    );

    let producerError: Error | undefined;
    try {
      await this.produce(root, target.entryPrefix ?? '', queue, layers, stats, controller.signal);
    } catch (error) {
      producerError = toError(error);
      controller.abort(producerError);
      queue.close();
      const dropped = queue.drain();
      this.logger.warn(`Stopping upload, dropped ${dropped.length} queued blob${dropped.length === 1 ? '' : 's'}`);
    } finally {
      queue.close();
      signal?.removeEventListener('abort', onAbort);
    }

    // uploads in flight always finish
    await Promise.all(workers);
    stats.maxQueueLength = queue.maxLength;

    // cancelled after the last blob was queued
    if (!producerError && controller.signal.aborted) {
      producerError = toError(controller.signal.reason);
    }

    if (producerError) {
      const reason = signal?.aborted ? 'cancelled' : producerError.message;
      throw DistError.pipelineAborted(reason, producerError, {
        blobsProduced: stats.blobsProduced,
        blobsUploaded: stats.blobsUploaded,
      });
    }

    if (failures.length > 0) {
      const sequences = failures.map(f => f.sequence).sort((a, b) => a - b);
      throw DistError.uploadFailed(
        `${failures.length} blob${failures.length === 1 ? '' : 's'} of ${target.name} failed after retries (${sequences.join(', ')})`,
        failures[0]?.error
      );
    }

    const manifest: PackageManifest = {
      name: target.name,
      version: target.version,
      sourceUrl: target.sourceUrl,
      description: target.description,
      layers,
    };
    const result = await this.client.upload(manifest, target.platform);
    this.logger.info(`Published ${target.name} ${target.version}: ${layers.length} blobs, ${stats.bytesProduced} bytes`);

    return { manifest, result, stats };
  }

  private async produce(
    root: string,
    prefix: string,
    queue: BoundedQueue<QueuedBlob>,
    layers: BlobRef[],
    stats: PipelineStats,
    signal: AbortSignal
  ): Promise<void> {
    const pack = tar.pack();
    const gzip = createGzip({ level: this.compressionLevel });

    let pending: Buffer[] = [];
    let pendingSize = 0;

    const emit = async (data: Buffer): Promise<void> => {
      const blob: QueuedBlob = { sequence: layers.length, sha256: sha256Hex(data), data };
      layers.push({ sha256: blob.sha256, mediaType: MediaType.Bytes, size: data.length });
      stats.blobsProduced++;
      stats.bytesProduced += data.length;
      if (!(await queue.put(blob))) {
        throw DistError.pipelineAborted('queue closed');
      }
    };

    const cut = async (source: AsyncIterable<Buffer>): Promise<void> => {
      for await (const chunk of source) {
        let offset = 0;
        while (offset < chunk.length) {
          const take = Math.min(this.blobSize - pendingSize, chunk.length - offset);
          pending.push(chunk.subarray(offset, offset + take));
          pendingSize += take;
          offset += take;
          if (pendingSize === this.blobSize) {
            const data = Buffer.concat(pending);
            pending = [];
            pendingSize = 0;
            await emit(data);
          }
        }
      }
      if (pendingSize > 0) {
        await emit(Buffer.concat(pending));
      }
    };

    await Promise.all([
      this.archive(root, prefix, pack, signal),
      pipeline(pack, gzip, cut, { signal }),
    ]);
  }

  private async archive(root: string, prefix: string, pack: Pack, signal: AbortSignal): Promise<void> {
    try {
      for await (const entry of walkTree(root, prefix)) {
        signal.throwIfAborted();

        if (entry.type === 'directory') {
          pack.entry({ name: `${entry.name}/`, type: 'directory', mode: entry.mode, mtime: entry.mtime });
        } else if (entry.type === 'symlink') {
          pack.entry({ name: entry.name, type: 'symlink', linkname: entry.linkname, mode: entry.mode, mtime: entry.mtime });
        } else {
          const sink = pack.entry({ name: entry.name, size: entry.size, mode: entry.mode, mtime: entry.mtime });
          await pipeline(createReadStream(entry.path), sink, { signal });
        }
      }
      pack.finalize();
    } catch (error) {
      pack.destroy(toError(error));
      throw error;
    }
  }

  private async work(
    queue: BoundedQueue<QueuedBlob>,
    namespace: string,
    stats: PipelineStats,
    failures: BlobFailure[],
    signal: AbortSignal
  ): Promise<void> {
    for (;;) {
      const next = await queue.take();
      // once aborted, only uploads already under way may finish
      if (next.closed || signal.aborted) {
        return;
      }

      const blob = next.item;
      // display placement only
      const slot = this.slotCounter++ % this.workers;
      const handle = this.progress.start(`blob ${blob.sequence}`, blob.data.length, slot);

      try {
        const sent = await this.retry.execute(() => this.client.uploadBlob(namespace, blob.sha256, blob.data));
        if (sent) {
          stats.blobsUploaded++;
        } else {
          stats.blobsSkipped++;
        }
        handle.advance(blob.data.length);
      } catch (error) {
        const err = toError(error);
        stats.blobsFailed++;
        failures.push({ sequence: blob.sequence, error: err });
        this.logger.error(`Giving up on blob ${blob.sequence} (${blob.sha256}): ${err.message}`);
      } finally {
        handle.done();
      }
    }
  }
}
