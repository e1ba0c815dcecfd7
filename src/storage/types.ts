// Storage domain types: backend kinds, content categories and the adapter contract.

/**
 * Which concrete provider a request is routed to.
 */
export type BackendKind = 'local' | 'object-store' | 'cloud-drive';

export const BACKEND_KINDS: readonly BackendKind[] = ['local', 'object-store', 'cloud-drive'];

export const CONTENT_CATEGORIES = ['image', 'video', 'preview', 'marker'] as const;

/**
 * Logical bucket of an asset. Each category is routed independently.
 */
export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

// Spellings written by older deployments of the configuration file.
const BACKEND_ALIASES: Record<string, BackendKind> = {
  local: 'local',
  local_disk: 'local',
  'local-disk': 'local',
  'object-store': 'object-store',
  object_store: 'object-store',
  minio: 'object-store',
  s3: 'object-store',
  'cloud-drive': 'cloud-drive',
  cloud_drive: 'cloud-drive',
  yandex_disk: 'cloud-drive',
};

/**
 * Parse a raw backend string from configuration or a tenant record.
 * Returns null for anything unrecognized.
 */
export function parseBackendKind(raw: string | null | undefined): BackendKind | null {
  if (!raw) return null;
  return BACKEND_ALIASES[raw.trim().toLowerCase()] ?? null;
}

export function isContentCategory(value: string): value is ContentCategory {
  return CONTENT_CATEGORIES.some((category) => category === value);
}

/**
 * Uniform operation set every storage backend implements.
 *
 * Paths are logical, slash-separated and relative to the adapter's own root
 * (a directory, a bucket or a remote base folder).
 */
export interface StorageAdapter {
  readonly kind: BackendKind;

  /** Write content, creating intermediate directories. Returns the public URL. */
  save(data: Buffer, logicalPath: string): Promise<string>;

  /** Read content. Rejects with NotFoundError when absent. */
  get(logicalPath: string): Promise<Buffer>;

  /** Remove content. Resolves false when nothing existed. */
  delete(logicalPath: string): Promise<boolean>;

  exists(logicalPath: string): Promise<boolean>;

  /** URL callers can later fetch the content from. Never touches the network. */
  publicUrl(logicalPath: string): string;

  /** Create a directory (and its parents). Idempotent. */
  createDirectory(path: string): Promise<boolean>;

  directoryExists(path: string): Promise<boolean>;

  /** Names of the immediate child directories of basePath; [] when it is missing. */
  listDirectories(basePath: string): Promise<string[]>;

  /** Health check -- returns true if the backend is operational */
  healthy(): Promise<boolean>;

  /** Release pooled connections. The adapter must not be used afterwards. */
  close(): Promise<void>;
}
