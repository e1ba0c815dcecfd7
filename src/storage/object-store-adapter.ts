// S3-compatible object store adapter (MinIO, AWS S3, ...).
//
// Directories do not exist natively: createDirectory writes a zero-byte
// "<dir>/" marker object. The bucket is checked and created on first write.

import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type { ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';
import type { FastifyBaseLogger } from 'fastify';

import {
  AuthenticationError,
  ConfigurationError,
  NotFoundError,
  QuotaExceededError,
  TransferError,
} from './errors.js';
import { encodePathSegments, joinLogicalPath, normalizeLogicalPath, requireFilePath } from './paths.js';
import type { BackendKind, StorageAdapter } from './types.js';

// ---- Types ----

/** The slice of S3Client the adapter uses. Tests substitute an in-process fake. */
export type ObjectStoreClient = Pick<S3Client, 'send' | 'destroy'>;

export interface ObjectStoreAdapterOptions {
  /** host[:port], optionally with an http(s):// scheme */
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  secure?: boolean;
  region?: string;
  /** Public/CDN base that maps onto the bucket root */
  publicBaseUrl?: string;
  /** Prefix prepended to every key (tenant isolation) */
  keyPrefix?: string;
  /** Total attempts per request made by the SDK */
  maxAttempts?: number;
  logger: FastifyBaseLogger;
  client?: ObjectStoreClient;
}

type FailureKind = 'not-found' | 'auth' | 'quota' | 'other';

// ---- Error classification ----

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);
const AUTH_NAMES = new Set(['AccessDenied', 'InvalidAccessKeyId', 'SignatureDoesNotMatch', 'Forbidden']);
const QUOTA_NAMES = new Set(['EntityTooLarge', 'QuotaExceeded']);

function classify(error: unknown): FailureKind {
  if (!(error instanceof Error)) return 'other';

  if (NOT_FOUND_NAMES.has(error.name)) return 'not-found';
  if (AUTH_NAMES.has(error.name)) return 'auth';
  if (QUOTA_NAMES.has(error.name)) return 'quota';

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (status === 404) return 'not-found';
    if (status === 401 || status === 403) return 'auth';
    if (status === 413 || status === 507) return 'quota';
  }
  return 'other';
}

/**
 * Resolve scheme and host from an endpoint that may or may not carry a scheme.
 */
export function parseEndpoint(endpoint: string, secure: boolean | undefined): { scheme: string; host: string } {
  const match = /^(https?):\/\/(.+)$/i.exec(endpoint.trim());
  if (match) {
    return { scheme: match[1].toLowerCase(), host: match[2].replace(/\/+$/, '') };
  }

  const host = endpoint.trim().replace(/\/+$/, '');
  const scheme = secure === true || host.endsWith(':443') ? 'https' : 'http';
  return { scheme, host };
}

// ---- ObjectStoreAdapter ----

export class ObjectStoreAdapter implements StorageAdapter {
  readonly kind: BackendKind = 'object-store';

  private readonly client: ObjectStoreClient;
  private readonly bucket: string;
  private readonly keyPrefix: string;
  private readonly urlBase: string;
  private readonly log: FastifyBaseLogger;
  private bucketReady: Promise<void> | null = null;

  constructor(options: ObjectStoreAdapterOptions) {
    const missing = (['endpoint', 'accessKey', 'secretKey', 'bucket'] as const).filter(
      (field) => options[field].trim().length === 0
    );
    if (missing.length > 0) {
      throw new ConfigurationError(`object store requires ${missing.join(', ')}`);
    }

    const { scheme, host } = parseEndpoint(options.endpoint, options.secure);

    this.bucket = options.bucket;
    this.keyPrefix = normalizeLogicalPath(options.keyPrefix ?? '');
    this.urlBase = options.publicBaseUrl
      ? options.publicBaseUrl.replace(/\/+$/, '')
      : `${scheme}://${host}/${encodeURIComponent(this.bucket)}`;
    this.log = options.logger;
    this.client =
      options.client ??
      new S3Client({
        endpoint: `${scheme}://${host}`,
        region: options.region ?? 'us-east-1',
        forcePathStyle: true,
        maxAttempts: options.maxAttempts,
        credentials: {
          accessKeyId: options.accessKey,
          secretAccessKey: options.secretKey,
        },
      });
  }

  async save(data: Buffer, logicalPath: string): Promise<string> {
    const relative = requireFilePath(logicalPath);
    const key = this.keyOf(relative);

    await this.ensureBucket();
    await this.run('save', relative, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: data,
          ContentLength: data.length,
        })
      )
    );

    this.log.info({ bucket: this.bucket, key, sizeBytes: data.length }, 'Object stored');
    return this.publicUrl(relative);
  }

  async get(logicalPath: string): Promise<Buffer> {
    const relative = requireFilePath(logicalPath);
    const response = await this.run('get', relative, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.keyOf(relative) }))
    );
    if (!response.Body) return Buffer.alloc(0);
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async delete(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    // DeleteObject succeeds for absent keys, so existence is checked first
    if (!(await this.exists(relative))) return false;

    await this.run('delete', relative, () =>
      this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.keyOf(relative) }))
    );
    this.log.info({ bucket: this.bucket, key: this.keyOf(relative) }, 'Object deleted');
    return true;
  }

  async exists(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    return this.headObject(this.keyOf(relative), relative);
  }

  publicUrl(logicalPath: string): string {
    return `${this.urlBase}/${encodePathSegments(this.keyOf(normalizeLogicalPath(logicalPath)))}`;
  }

  async createDirectory(path: string): Promise<boolean> {
    const relative = normalizeLogicalPath(path);
    await this.ensureBucket();

    const prefix = this.keyOf(relative);
    if (prefix.length === 0) return true;

    await this.run('createDirectory', relative, () =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: `${prefix}/`,
          Body: Buffer.alloc(0),
          ContentLength: 0,
        })
      )
    );
    this.log.debug({ bucket: this.bucket, prefix }, 'Directory marker written');
    return true;
  }

  async directoryExists(path: string): Promise<boolean> {
    const relative = normalizeLogicalPath(path);
    const prefix = this.keyOf(relative);

    if (prefix.length === 0) {
      return this.bucketExists();
    }
    if (await this.headObject(`${prefix}/`, relative)) {
      return true;
    }

    // No marker: the directory may still exist implicitly through its objects
    const listing = await this.run('directoryExists', relative, () =>
      this.client.send(new ListObjectsV2Command({ Bucket: this.bucket, Prefix: `${prefix}/`, MaxKeys: 1 }))
    ).catch((error: unknown) => {
      if (isNotFoundError(error)) return null;
      throw error;
    });
    return listing !== null && (listing.KeyCount ?? listing.Contents?.length ?? 0) > 0;
  }

  async listDirectories(basePath: string): Promise<string[]> {
    const relative = normalizeLogicalPath(basePath);
    const base = this.keyOf(relative);
    const prefix = base.length > 0 ? `${base}/` : '';
    const names: string[] = [];

    let continuationToken: string | undefined;
    do {
      const token = continuationToken;
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.run('listDirectories', relative, () =>
          this.client.send(
            new ListObjectsV2Command({
              Bucket: this.bucket,
              Prefix: prefix,
              Delimiter: '/',
              ContinuationToken: token,
            })
          )
        );
      } catch (error) {
        if (isNotFoundError(error)) return [];
        throw error;
      }

      for (const common of page.CommonPrefixes ?? []) {
        if (!common.Prefix) continue;
        const name = common.Prefix.slice(prefix.length).replace(/\/+$/, '');
        if (name.length > 0) names.push(name);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return names.sort();
  }

  async healthy(): Promise<boolean> {
    try {
      return await this.bucketExists();
    } catch (error) {
      this.log.warn(
        { bucket: this.bucket, reason: error instanceof Error ? error.name : 'unknown' },
        'Object store health check failed'
      );
      return false;
    }
  }

  async close(): Promise<void> {
    this.client.destroy();
  }

  // ---- Internals ----

  private keyOf(relative: string): string {
    return joinLogicalPath(this.keyPrefix, relative);
  }

  private async headObject(key: string, relative: string): Promise<boolean> {
    try {
      await this.run('head', relative, () =>
        this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }))
      );
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  private async bucketExists(): Promise<boolean> {
    try {
      await this.run('headBucket', this.bucket, () =>
        this.client.send(new HeadBucketCommand({ Bucket: this.bucket }))
      );
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  /**
   * Verify the bucket once per adapter, creating it when absent. A failed
   * attempt is forgotten so the next write tries again.
   */
  private ensureBucket(): Promise<void> {
    if (!this.bucketReady) {
      this.bucketReady = (async () => {
        if (await this.bucketExists()) return;
        await this.run('createBucket', this.bucket, () =>
          this.client.send(new CreateBucketCommand({ Bucket: this.bucket }))
        );
        this.log.info({ bucket: this.bucket }, 'Bucket created');
      })();
      this.bucketReady.catch(() => {
        this.bucketReady = null;
      });
    }
    return this.bucketReady;
  }

  /**
   * Run one SDK call, translating provider failures into storage errors.
   */
  private async run<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      switch (classify(error)) {
        case 'not-found':
          throw new NotFoundError(path);
        case 'auth':
          throw new AuthenticationError(`${operation} ${this.bucket}`);
        case 'quota':
          throw new QuotaExceededError(`${operation} ${path}`);
        default: {
          const reason = error instanceof Error ? error.name : 'unknown error';
          this.log.error({ operation, bucket: this.bucket, path, reason }, 'Object store request failed');
          throw new TransferError(`${operation} ${path} (${reason})`);
        }
      }
    }
  }
}

function isNotFoundError(error: unknown): boolean {
  return error instanceof NotFoundError;
}
