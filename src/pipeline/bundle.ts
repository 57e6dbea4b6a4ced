/**
 * Sandbox VM bundle upload.
 * @module pipeline/bundle
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { DistError, toError } from '../errors.js';
import type { PipelineResult, StreamingUploadPipeline } from './pipeline.js';

/**
 * Directory name of a bundle inside the sandbox path.
 */
export const BUNDLE_DIR = 'vm.bundle';

const bundleConfigSchema = z.object({
  os_ver: z.union([z.string().min(1), z.number()]).transform(String),
  arch: z.string().min(1),
}).passthrough();

/**
 * Fields read from a bundle's `config.json`.
 */
export interface BundleInfo {
  readonly osVersion: string;
  readonly arch: string;
}

/**
 * Where and as what a bundle is published.
 */
export interface BundleUploadOptions {
  /** Directory containing `vm.bundle` */
  sandboxPath: string;
  /** Manifest name */
  name: string;
  /** Owner path, used for the source annotation */
  remote: string;
  sourceUrlBase: string;
  /** Platform OS of the index entry */
  os: string;
  signal?: AbortSignal;
}

/**
 * Reads and validates `<bundle>/config.json`.
 *
 * @throws DistError with kind `InvalidBundle`
 */
export async function readBundleInfo(bundlePath: string): Promise<BundleInfo> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(bundlePath)).isDirectory();
  } catch (error) {
    throw DistError.invalidBundle(bundlePath, 'does not exist', toError(error));
  }
  if (!isDirectory) {
    throw DistError.invalidBundle(bundlePath, 'is not a directory');
  }

  const configPath = join(bundlePath, 'config.json');
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error) {
    throw DistError.invalidBundle(bundlePath, 'does not contain config.json', toError(error));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw DistError.invalidBundle(bundlePath, 'config.json is not valid JSON', toError(error));
  }

  const result = bundleConfigSchema.safeParse(json);
  if (!result.success) {
    const missing = result.error.issues.map(i => i.path.join('.')).join(', ');
    throw DistError.invalidBundle(bundlePath, `config.json is missing or has invalid ${missing}`);
  }

  return { osVersion: result.data.os_ver, arch: result.data.arch };
}

/**
 * Uploads `<sandboxPath>/vm.bundle` through the pipeline, versioned by the
 * bundle's OS version and tagged with its architecture.
 */
export async function uploadBundle(
  pipeline: StreamingUploadPipeline,
  options: BundleUploadOptions
): Promise<PipelineResult> {
  const bundlePath = join(options.sandboxPath, BUNDLE_DIR);
  const info = await readBundleInfo(bundlePath);

  return pipeline.run(
    bundlePath,
    {
      name: options.name,
      version: info.osVersion,
      sourceUrl: `${options.sourceUrlBase.replace(/\/+$/, '')}/${options.remote}`,
      description: `${options.name} ${info.osVersion}`,
      platform: { os: options.os, architecture: info.arch },
      entryPrefix: BUNDLE_DIR,
    },
    options.signal
  );
}
