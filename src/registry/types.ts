/**
 * OCI manifest and index types for package releases.
 * @module registry/types
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { DistError } from '../errors.js';

/**
 * Media type constants.
 */
export const MediaType = {
  OciManifest: 'application/vnd.oci.image.manifest.v1+json',
  OciIndex: 'application/vnd.oci.image.index.v1+json',
  OciConfig: 'application/vnd.oci.image.config.v1+json',
  Bytes: 'application/octet-stream',
} as const;

/**
 * Annotation keys written on manifests and indexes.
 */
export const Annotation = {
  Title: 'org.opencontainers.image.title',
  Version: 'org.opencontainers.image.version',
  Source: 'org.opencontainers.image.source',
  Description: 'org.opencontainers.image.description',
} as const;

/**
 * Gets the Accept header value for manifest requests.
 */
export function getManifestAcceptHeader(): string {
  return [MediaType.OciIndex, MediaType.OciConfig, MediaType.OciManifest].join(',');
}

/**
 * Platform of one manifest in an index.
 */
export interface Platform {
  /** Operating system (darwin, linux, ...) */
  readonly os: string;
  /** CPU architecture (amd64, arm64, ...) */
  readonly architecture: string;
}

/**
 * Platform helpers.
 */
export const PlatformUtils = {
  matches(a: Platform, b: Platform): boolean {
    return a.os === b.os && a.architecture === b.architecture;
  },

  toString(p: Platform | undefined): string {
    return p ? `${p.os}/${p.architecture}` : 'any';
  },
};

/**
 * Reference to a content-addressed blob.
 */
export interface BlobRef {
  /** SHA-256 hex, without the `sha256:` prefix */
  readonly sha256: string;
  readonly mediaType: string;
  readonly size: number;
}

/**
 * Single-platform release object.
 */
export interface PackageManifest {
  readonly name: string;
  /** Version string as annotated; tags are derived from it */
  readonly version: string;
  /** Full source URL annotation */
  readonly sourceUrl: string;
  readonly description?: string;
  /** Defaults to the first layer */
  readonly config?: BlobRef;
  readonly layers: readonly BlobRef[];
}

/**
 * Entry of an index pointing at one manifest.
 *
 * Entries read from a registry keep any fields this module does not model,
 * so that re-serializing preserves them.
 */
export interface ManifestDescriptor {
  readonly mediaType: string;
  readonly digest: string;
  readonly size: number;
  readonly platform?: Platform;
  readonly annotations?: Readonly<Record<string, string>>;
}

/**
 * Multi-platform release object stored at a version tag.
 */
export interface ManifestIndex {
  readonly name: string;
  readonly version: string;
  readonly sourceUrl: string;
  readonly description?: string;
  readonly manifests: readonly ManifestDescriptor[];
}

// Wire schemas

const digestSchema = z.string().regex(/^sha256:[a-f0-9]{64}$/, 'expected a sha256 digest');

const platformSchema = z.object({
  os: z.string(),
  architecture: z.string(),
}).passthrough();

const blobDescriptorSchema = z.object({
  mediaType: z.string(),
  digest: digestSchema,
  size: z.number().int().nonnegative(),
});

const manifestDescriptorSchema = z.object({
  mediaType: z.string(),
  digest: digestSchema,
  size: z.number().int().nonnegative(),
  platform: platformSchema.optional(),
  annotations: z.record(z.string()).optional(),
}).passthrough();

const annotationsSchema = z.object({
  [Annotation.Title]: z.string(),
  [Annotation.Version]: z.string(),
  [Annotation.Source]: z.string(),
  [Annotation.Description]: z.string().optional(),
}).passthrough();

const manifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.literal(MediaType.OciManifest),
  annotations: annotationsSchema,
  config: blobDescriptorSchema.extend({ mediaType: z.literal(MediaType.OciConfig) }),
  layers: z.array(blobDescriptorSchema).min(1),
});

const indexSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.literal(MediaType.OciIndex),
  annotations: annotationsSchema,
  manifests: z.array(manifestDescriptorSchema),
});

function stripDigest(digest: string): string {
  return digest.startsWith('sha256:') ? digest.slice('sha256:'.length) : digest;
}

function annotationsFor(
  name: string,
  version: string,
  sourceUrl: string,
  description?: string
): Record<string, string> {
  return {
    [Annotation.Title]: name,
    [Annotation.Version]: version,
    [Annotation.Source]: sourceUrl,
    [Annotation.Description]: description ?? `${name} ${version}`,
  };
}

function decodeJson(data: Uint8Array | string, what: string): unknown {
  const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw DistError.invalidManifest(
      `${what} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/**
 * Content digest of serialized bytes, as `sha256:<hex>`.
 */
export function contentDigest(data: Uint8Array): string {
  return `sha256:${createHash('sha256').update(data).digest('hex')}`;
}

/**
 * Config descriptor of a manifest.
 */
export function manifestConfig(manifest: PackageManifest): BlobRef {
  const config = manifest.config ?? manifest.layers[0];
  if (!config) {
    throw DistError.invalidManifest(`manifest for '${manifest.name}' has no layers`);
  }
  return config;
}

/**
 * Serializes a manifest. The returned bytes are what gets hashed and pushed.
 */
export function serializeManifest(manifest: PackageManifest): Buffer {
  const config = manifestConfig(manifest);
  const body = {
    schemaVersion: 2,
    mediaType: MediaType.OciManifest,
    annotations: annotationsFor(manifest.name, manifest.version, manifest.sourceUrl, manifest.description),
    config: {
      digest: `sha256:${config.sha256}`,
      mediaType: MediaType.OciConfig,
      size: config.size,
    },
    layers: manifest.layers.map(layer => ({
      digest: `sha256:${layer.sha256}`,
      mediaType: layer.mediaType,
      size: layer.size,
    })),
  };
  return Buffer.from(JSON.stringify(body), 'utf8');
}

/**
 * Parses a manifest fetched from a registry.
 * @throws DistError with kind `InvalidManifest`
 */
export function parseManifest(data: Uint8Array | string): PackageManifest {
  const result = manifestSchema.safeParse(decodeJson(data, 'manifest'));
  if (!result.success) {
    throw DistError.invalidManifest(`malformed manifest: ${describeIssues(result.error)}`);
  }

  const json = result.data;
  return {
    name: json.annotations[Annotation.Title],
    version: json.annotations[Annotation.Version],
    sourceUrl: json.annotations[Annotation.Source],
    description: json.annotations[Annotation.Description],
    config: {
      sha256: stripDigest(json.config.digest),
      mediaType: json.config.mediaType,
      size: json.config.size,
    },
    layers: json.layers.map(layer => ({
      sha256: stripDigest(layer.digest),
      mediaType: layer.mediaType,
      size: layer.size,
    })),
  };
}

/**
 * Serializes an index.
 */
export function serializeIndex(index: ManifestIndex): Buffer {
  const body = {
    schemaVersion: 2,
    mediaType: MediaType.OciIndex,
    manifests: index.manifests,
    annotations: annotationsFor(index.name, index.version, index.sourceUrl, index.description),
  };
  return Buffer.from(JSON.stringify(body), 'utf8');
}

/**
 * Parses an index fetched from a registry. Entries repeating an earlier
 * digest are dropped.
 * @throws DistError with kind `InvalidManifest`
 */
export function parseIndex(data: Uint8Array | string): ManifestIndex {
  const result = indexSchema.safeParse(decodeJson(data, 'index'));
  if (!result.success) {
    throw DistError.invalidManifest(`malformed index: ${describeIssues(result.error)}`);
  }

  const json = result.data;
  const seen = new Set<string>();
  const manifests: ManifestDescriptor[] = [];
  for (const descriptor of json.manifests) {
    if (seen.has(descriptor.digest)) {
      continue;
    }
    seen.add(descriptor.digest);
    manifests.push(descriptor);
  }

  return {
    name: json.annotations[Annotation.Title],
    version: json.annotations[Annotation.Version],
    sourceUrl: json.annotations[Annotation.Source],
    description: json.annotations[Annotation.Description],
    manifests,
  };
}
