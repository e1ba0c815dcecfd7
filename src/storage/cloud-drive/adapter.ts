import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';

import {
  AuthenticationError,
  ConfigurationError,
  isStorageError,
  NotFoundError,
  QuotaExceededError,
  TransferError,
} from '../errors.js';
import { ancestorsOf, joinLogicalPath, normalizeLogicalPath, parentOf, requireFilePath } from '../paths.js';
import type { BackendKind, StorageAdapter } from '../types.js';

import { ChunkTransfer, runChunkedTransfer } from './chunk-transfer.js';
import { DirectoryCache } from './directory-cache.js';
import type { DirectoryCacheStats } from './directory-cache.js';
import { describeFailure, DriveHttpError, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import { DriveSession } from './session.js';
import type { HttpRequest, HttpResponse, HttpSession } from './session.js';

// ---- Constants ----

export const DEFAULT_API_BASE_URL = 'https://cloud-api.yandex.net/v1/disk';

/** Page size when listing a folder */
const LIST_PAGE_LIMIT = 1000;

// ---- Response schemas ----

const hrefSchema = z.object({ href: z.string().url() });

const resourceSchema = z.object({
  name: z.string(),
  type: z.string().optional(),
});

const folderSchema = resourceSchema.extend({
  _embedded: z
    .object({
      items: z.array(resourceSchema),
    })
    .optional(),
});

const diskInfoSchema = z.object({
  total_space: z.number().default(0),
  used_space: z.number().default(0),
  trash_size: z.number().default(0),
});

// ---- Types ----

export interface CloudDriveTuning {
  requestTimeoutMs: number;
  chunkSizeBytes: number;
  uploadConcurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  cacheTtlSeconds: number;
  cacheMaxSize: number;
  poolConnections: number;
  poolMaxSize: number;
}

export interface CloudDriveAdapterOptions {
  oauthToken: string;
  /** Remote folder every logical path lives under */
  basePath: string;
  tuning: CloudDriveTuning;
  logger: FastifyBaseLogger;
  /** Builds the URL callers fetch content from */
  linkBuilder: (logicalPath: string) => string;
  apiBaseUrl?: string;
  /** Defaults to a pooled DriveSession */
  session?: HttpSession;
  /** Clock for the directory cache */
  now?: () => number;
}

export interface DiskInfo {
  totalSpace: number;
  usedSpace: number;
  availableSpace: number;
  trashSize: number;
}

interface CallOptions {
  /** Non-2xx statuses handed back to the caller instead of raised */
  accept?: readonly number[];
  /** Send the OAuth header (API calls only, never transfer hrefs) */
  auth?: boolean;
  /** Logical path reported in NotFoundError */
  path?: string;
}

// Whitespace or control characters would corrupt the Authorization header
const INVALID_TOKEN_CHARS = /[\s\u0000-\u001f\u007f]/;

function parseJson<T>(
  response: HttpResponse,
  schema: z.ZodType<T>,
  label: string
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(response.body.toString('utf8'));
  } catch {
    throw new TransferError(`${label} (malformed response body)`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new TransferError(`${label} (unexpected response shape)`);
  }
  return parsed.data;
}

// ---- CloudDriveAdapter ----

/**
 * Storage adapter over an OAuth-token HTTP drive API.
 *
 * Large payloads move in fixed-size chunks through a bounded worker pool,
 * every request is retried with exponential backoff, and directory existence
 * is memoized in a TTL/LRU cache.
 *
 * SECURITY: the OAuth token is only ever placed in the Authorization header
 * of API calls. It is never logged and never sent to transfer hosts.
 */
export class CloudDriveAdapter implements StorageAdapter {
  readonly kind: BackendKind = 'cloud-drive';

  private readonly authHeader: string;
  private readonly basePath: string;
  private readonly apiBaseUrl: string;
  private readonly tuning: CloudDriveTuning;
  private readonly retryPolicy: RetryPolicy;
  private readonly log: FastifyBaseLogger;
  private readonly linkBuilder: (logicalPath: string) => string;
  private readonly session: HttpSession;
  private readonly cache: DirectoryCache;

  constructor(options: CloudDriveAdapterOptions) {
    const token = options.oauthToken;
    if (token.length === 0) {
      throw new ConfigurationError('cloud drive OAuth token is empty');
    }
    if (INVALID_TOKEN_CHARS.test(token)) {
      throw new ConfigurationError('cloud drive OAuth token contains whitespace or control characters');
    }

    this.authHeader = `OAuth ${token}`;
    this.basePath = normalizeLogicalPath(options.basePath);
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.tuning = options.tuning;
    this.retryPolicy = {
      maxRetries: options.tuning.maxRetries,
      baseDelayMs: options.tuning.retryBaseDelayMs,
    };
    this.log = options.logger;
    this.linkBuilder = options.linkBuilder;
    this.session =
      options.session ??
      new DriveSession({
        apiOrigin: this.apiBaseUrl,
        requestTimeoutMs: options.tuning.requestTimeoutMs,
        poolConnections: options.tuning.poolConnections,
        poolMaxSize: options.tuning.poolMaxSize,
      });
    this.cache = new DirectoryCache({
      ttlSeconds: options.tuning.cacheTtlSeconds,
      maxSize: options.tuning.cacheMaxSize,
      logger: options.logger,
      now: options.now,
    });
  }

  // ---- StorageAdapter ----

  async save(data: Buffer, logicalPath: string): Promise<string> {
    const relative = requireFilePath(logicalPath);
    const remote = this.remotePath(relative);

    const parent = parentOf(remote);
    if (parent.length > 0) {
      await this.ensureDirectoryTree(parent);
    }

    const href = await this.fetchHref(
      '/resources/upload',
      { path: `/${remote}`, overwrite: 'true' },
      'upload',
      relative
    );
    await this.upload(href, data, relative);

    this.log.info({ path: relative, sizeBytes: data.length }, 'File saved to cloud drive');
    return this.publicUrl(relative);
  }

  async get(logicalPath: string): Promise<Buffer> {
    const relative = requireFilePath(logicalPath);
    const href = await this.fetchHref(
      '/resources/download',
      { path: `/${this.remotePath(relative)}` },
      'download',
      relative
    );
    return this.download(href, relative);
  }

  async delete(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    const remote = this.remotePath(relative);

    const response = await this.call(
      'delete',
      { method: 'DELETE', url: this.apiUrl('/resources', { path: `/${remote}`, permanently: 'true' }) },
      { accept: [404], path: relative }
    );

    this.cache.deleteTree(remote);
    if (response.status === 404) return false;

    this.log.info({ path: relative }, 'File deleted from cloud drive');
    return true;
  }

  async exists(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    const resource = await this.statResource(this.remotePath(relative), relative);
    return resource !== null && resource.type !== 'dir';
  }

  publicUrl(logicalPath: string): string {
    return this.linkBuilder(normalizeLogicalPath(logicalPath));
  }

  async createDirectory(path: string): Promise<boolean> {
    const remote = this.remotePath(normalizeLogicalPath(path));
    if (remote.length === 0) return true;
    await this.ensureDirectoryTree(remote);
    return true;
  }

  async directoryExists(path: string): Promise<boolean> {
    const relative = normalizeLogicalPath(path);
    const remote = this.remotePath(relative);

    const cached = this.cache.get(remote);
    if (cached !== undefined) {
      this.log.debug({ directory: remote, exists: cached }, 'Directory cache hit');
      return cached;
    }

    const resource = await this.statResource(remote, relative);
    const exists = resource !== null && (resource.type === undefined || resource.type === 'dir');
    this.cache.set(remote, exists);
    return exists;
  }

  async listDirectories(basePath: string): Promise<string[]> {
    const relative = normalizeLogicalPath(basePath);
    const remote = this.remotePath(relative);
    const names: string[] = [];

    for (let offset = 0; ; offset += LIST_PAGE_LIMIT) {
      const response = await this.call(
        'list',
        {
          method: 'GET',
          url: this.apiUrl('/resources', {
            path: `/${remote}`,
            limit: String(LIST_PAGE_LIMIT),
            offset: String(offset),
          }),
        },
        { accept: [404], path: relative }
      );
      if (response.status === 404) {
        this.cache.set(remote, false);
        return [];
      }

      const folder = parseJson(response, folderSchema, 'list');
      const items = folder._embedded?.items ?? [];
      for (const item of items) {
        if (item.type !== 'dir') continue;
        names.push(item.name);
        this.cache.set(joinLogicalPath(remote, item.name), true);
      }
      if (items.length < LIST_PAGE_LIMIT) break;
    }

    this.cache.set(remote, true);
    return names.sort();
  }

  async healthy(): Promise<boolean> {
    try {
      await this.getDiskInfo();
      return true;
    } catch (error) {
      this.log.warn({ reason: describeFailure(error) }, 'Cloud drive health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.cache.clear();
    await this.session.close();
  }

  // ---- Drive-specific operations ----

  async getDiskInfo(): Promise<DiskInfo> {
    const response = await this.call('disk-info', { method: 'GET', url: this.apiUrl('/', {}) });
    const info = parseJson(response, diskInfoSchema, 'disk-info');
    return {
      totalSpace: info.total_space,
      usedSpace: info.used_space,
      availableSpace: info.total_space - info.used_space,
      trashSize: info.trash_size,
    };
  }

  clearDirectoryCache(): void {
    this.cache.clear();
    this.log.info('Cloud drive directory cache cleared');
  }

  cacheStats(): DirectoryCacheStats {
    return this.cache.stats();
  }

  // ---- Internals ----

  private remotePath(relative: string): string {
    return joinLogicalPath(this.basePath, relative);
  }

  private apiUrl(endpoint: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params).toString();
    return query.length > 0 ? `${this.apiBaseUrl}${endpoint}?${query}` : `${this.apiBaseUrl}${endpoint}`;
  }

  /**
   * Create every level of a remote directory path that the cache does not
   * already know to exist. 409 means the level is already present.
   */
  private async ensureDirectoryTree(remote: string): Promise<void> {
    for (const level of ancestorsOf(remote)) {
      if (this.cache.get(level) === true) continue;

      const response = await this.call(
        'mkdir',
        { method: 'PUT', url: this.apiUrl('/resources', { path: `/${level}` }) },
        { accept: [409] }
      );
      if (response.status === 409) {
        this.log.debug({ directory: level }, 'Directory already exists on cloud drive');
      } else {
        this.log.info({ directory: level }, 'Created directory on cloud drive');
      }
      this.cache.set(level, true);
    }
  }

  /** Metadata of a remote resource, or null when it does not exist. */
  private async statResource(remote: string, relative: string): Promise<z.infer<typeof resourceSchema> | null> {
    const response = await this.call(
      'stat',
      { method: 'GET', url: this.apiUrl('/resources', { path: `/${remote}`, limit: '0' }) },
      { accept: [404], path: relative }
    );
    if (response.status === 404) return null;
    return parseJson(response, resourceSchema, 'stat');
  }

  private async fetchHref(
    endpoint: string,
    params: Record<string, string>,
    label: string,
    relative: string
  ): Promise<string> {
    const response = await this.call(label, { method: 'GET', url: this.apiUrl(endpoint, params) }, { path: relative });
    return parseJson(response, hrefSchema, label).href;
  }

  private async upload(href: string, data: Buffer, relative: string): Promise<void> {
    const total = data.length;

    if (total <= this.tuning.chunkSizeBytes) {
      this.log.debug({ path: relative, sizeBytes: total }, 'Using direct upload for small file');
      await this.call('upload', { method: 'PUT', url: href, body: data }, { auth: false });
      return;
    }

    const transfer = new ChunkTransfer(total, this.tuning.chunkSizeBytes);
    this.log.info(
      { path: relative, sizeBytes: total, chunkSize: transfer.chunkSize, chunks: transfer.chunkCount },
      'Starting chunked upload'
    );

    await runChunkedTransfer(transfer, this.tuning.uploadConcurrency, async (chunk) => {
      await this.call(
        'upload-chunk',
        {
          method: 'PUT',
          url: href,
          headers: { 'Content-Range': `bytes ${chunk.start}-${chunk.end - 1}/${total}` },
          body: data.subarray(chunk.start, chunk.end),
        },
        { auth: false }
      );
      this.log.debug({ path: relative, start: chunk.start, end: chunk.end }, 'Chunk uploaded');
    });

    this.log.info({ path: relative, chunks: transfer.chunkCount, sizeBytes: total }, 'Chunked upload completed');
  }

  private async download(href: string, relative: string): Promise<Buffer> {
    const head = await this.call('download-head', { method: 'HEAD', url: href }, { auth: false, path: relative });
    const size = Number(head.headers['content-length']);

    if (!Number.isFinite(size) || size <= this.tuning.chunkSizeBytes) {
      const response = await this.call('download', { method: 'GET', url: href }, { auth: false, path: relative });
      return response.body;
    }

    const target = Buffer.alloc(size);
    const transfer = new ChunkTransfer(size, this.tuning.chunkSizeBytes);
    this.log.info({ path: relative, sizeBytes: size, chunks: transfer.chunkCount }, 'Starting chunked download');

    await runChunkedTransfer(transfer, this.tuning.uploadConcurrency, async (chunk) => {
      const expected = chunk.end - chunk.start;
      const response = await this.call(
        'download-chunk',
        { method: 'GET', url: href, headers: { Range: `bytes=${chunk.start}-${chunk.end - 1}` } },
        { auth: false, path: relative }
      );
      if (response.body.length !== expected) {
        throw new TransferError(
          `download-chunk (range ${chunk.start}-${chunk.end - 1} returned ${response.body.length} bytes)`
        );
      }
      response.body.copy(target, chunk.start);
    });

    this.log.info({ path: relative, chunks: transfer.chunkCount, sizeBytes: size }, 'Chunked download completed');
    return target;
  }

  /**
   * Issue one request through the retry loop and translate any failure into
   * the storage error taxonomy.
   */
  private async call(label: string, req: HttpRequest, options: CallOptions = {}): Promise<HttpResponse> {
    const accept = options.accept ?? [];
    const headers: Record<string, string> = { ...req.headers };
    if (options.auth ?? true) {
      headers['Authorization'] = this.authHeader;
      headers['Accept'] = 'application/json';
    }

    try {
      return await withRetry(
        async () => {
          const response = await this.session.request({ ...req, headers });
          if ((response.status >= 200 && response.status < 300) || accept.includes(response.status)) {
            return response;
          }
          throw new DriveHttpError(response.status, label);
        },
        label,
        this.log,
        this.retryPolicy
      );
    } catch (error) {
      throw this.translate(error, label, options.path);
    }
  }

  private translate(error: unknown, label: string, path: string | undefined): Error {
    if (error instanceof DriveHttpError) {
      switch (error.status) {
        case 401:
        case 403:
          return new AuthenticationError(`${label} (HTTP ${error.status})`);
        case 404:
          return new NotFoundError(path ?? label);
        case 413:
        case 507:
          return new QuotaExceededError(`${label} (HTTP ${error.status})`);
        default:
          return new TransferError(`${label} (HTTP ${error.status})`);
      }
    }
    if (isStorageError(error)) return error;
    return new TransferError(`${label} (${describeFailure(error)})`);
  }
}
