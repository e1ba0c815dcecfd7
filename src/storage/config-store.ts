// Persisted storage configuration record.
//
// The record on disk is always loadable: a missing file is replaced by
// defaults, a corrupt one is moved aside and replaced by defaults. Every
// setter writes through before returning. Environment overrides are layered
// on top when the record is read and never written back.

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';

import { CONTENT_CATEGORIES } from './types.js';
import type { BackendKind, ContentCategory } from './types.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const CloudDriveCategorySchema = z.object({
  enabled: z.boolean().default(false),
  basePath: z.string().default(''),
});

const CategorySettingsSchema = z.object({
  /** Raw backend string; parsed by the manager so unknown values can fall back */
  backend: z.string().default('local'),
  cloudDrive: CloudDriveCategorySchema.prefault({}),
});

function categoryDefault(category: ContentCategory) {
  return CategorySettingsSchema.prefault({ cloudDrive: { basePath: `assets/${category}` } });
}

// Field shapes without defaults, shared by the record and the admin patches.
// A patch must leave absent fields untouched, so it cannot carry defaults.

const transferFields = {
  requestTimeoutMs: z.number().int().positive(),
  chunkSizeMb: z.number().positive(),
  uploadConcurrency: z.number().int().positive(),
  maxRetries: z.number().int().min(0),
  retryBaseDelayMs: z.number().int().min(0),
  cacheTtlSeconds: z.number().positive(),
  cacheMaxSize: z.number().int().positive(),
  poolConnections: z.number().int().positive(),
  poolMaxSize: z.number().int().positive(),
};

const objectStoreFields = {
  enabled: z.boolean(),
  endpoint: z.string(),
  accessKey: z.string(),
  secretKey: z.string(),
  bucket: z.string(),
  secure: z.boolean(),
  region: z.string(),
  publicBaseUrl: z.string(),
};

const backupFields = {
  autoSplit: z.boolean(),
  maxSizeMb: z.number().int().positive(),
  chunkSizeMb: z.number().int().positive(),
  compression: z.enum(['gz', 'bz2', 'xz', 'none']),
};

const TransferSettingsSchema = z.object({
  requestTimeoutMs: transferFields.requestTimeoutMs.default(30_000),
  chunkSizeMb: transferFields.chunkSizeMb.default(10),
  uploadConcurrency: transferFields.uploadConcurrency.default(3),
  maxRetries: transferFields.maxRetries.default(3),
  retryBaseDelayMs: transferFields.retryBaseDelayMs.default(500),
  cacheTtlSeconds: transferFields.cacheTtlSeconds.default(300),
  cacheMaxSize: transferFields.cacheMaxSize.default(1000),
  poolConnections: transferFields.poolConnections.default(10),
  poolMaxSize: transferFields.poolMaxSize.default(20),
});

const ObjectStoreSettingsSchema = z.object({
  enabled: objectStoreFields.enabled.default(false),
  endpoint: objectStoreFields.endpoint.default(''),
  accessKey: objectStoreFields.accessKey.default(''),
  secretKey: objectStoreFields.secretKey.default(''),
  bucket: objectStoreFields.bucket.default(''),
  secure: objectStoreFields.secure.default(false),
  region: objectStoreFields.region.default('us-east-1'),
  publicBaseUrl: objectStoreFields.publicBaseUrl.default(''),
});

const BackupSettingsSchema = z.object({
  autoSplit: backupFields.autoSplit.default(true),
  maxSizeMb: backupFields.maxSizeMb.default(500),
  chunkSizeMb: backupFields.chunkSizeMb.default(100),
  compression: backupFields.compression.default('gz'),
});

export const TransferPatchSchema = z.object(transferFields).partial().strict();
export const ObjectStorePatchSchema = z.object(objectStoreFields).partial().strict();
export const BackupPatchSchema = z.object(backupFields).partial().strict();

export const StorageConfigSchema = z.object({
  version: z.literal(1).default(1),
  categories: z
    .object({
      image: categoryDefault('image'),
      video: categoryDefault('video'),
      preview: categoryDefault('preview'),
      marker: categoryDefault('marker'),
    })
    .prefault({}),
  cloudDrive: z
    .object({
      oauthToken: z.string().default(''),
      enabled: z.boolean().default(false),
    })
    .prefault({}),
  objectStore: ObjectStoreSettingsSchema.prefault({}),
  transfer: TransferSettingsSchema.prefault({}),
  backupSettings: BackupSettingsSchema.prefault({}),
});

export type StorageConfigRecord = z.infer<typeof StorageConfigSchema>;
export type CategorySettings = z.infer<typeof CategorySettingsSchema>;
export type CloudDriveCategorySettings = z.infer<typeof CloudDriveCategorySchema>;
export type TransferSettings = z.infer<typeof TransferSettingsSchema>;
export type ObjectStoreSettings = z.infer<typeof ObjectStoreSettingsSchema>;
export type BackupSettings = z.infer<typeof BackupSettingsSchema>;

/**
 * A fresh default record.
 */
export function defaultStorageConfig(): StorageConfigRecord {
  return StorageConfigSchema.parse({});
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

interface EnvOverrides {
  backend?: string;
  objectStore: Partial<ObjectStoreSettings>;
  transfer: Partial<TransferSettings>;
}

interface NumericOverride {
  variable: string;
  key: keyof TransferSettings;
  integer: boolean;
  /** Multiplier from the variable's unit to the record's unit */
  scale: number;
}

const NUMERIC_OVERRIDES: readonly NumericOverride[] = [
  { variable: 'CLOUD_DRIVE_REQUEST_TIMEOUT', key: 'requestTimeoutMs', integer: false, scale: 1000 },
  { variable: 'CLOUD_DRIVE_CHUNK_SIZE_MB', key: 'chunkSizeMb', integer: false, scale: 1 },
  { variable: 'CLOUD_DRIVE_UPLOAD_CONCURRENCY', key: 'uploadConcurrency', integer: true, scale: 1 },
  { variable: 'CLOUD_DRIVE_DIRECTORY_CACHE_TTL', key: 'cacheTtlSeconds', integer: false, scale: 1 },
  { variable: 'CLOUD_DRIVE_DIRECTORY_CACHE_SIZE', key: 'cacheMaxSize', integer: true, scale: 1 },
  { variable: 'CLOUD_DRIVE_SESSION_POOL_CONNECTIONS', key: 'poolConnections', integer: true, scale: 1 },
  { variable: 'CLOUD_DRIVE_SESSION_POOL_MAXSIZE', key: 'poolMaxSize', integer: true, scale: 1 },
];

const STRING_OVERRIDES = [
  { variable: 'OBJECT_STORE_ENDPOINT', key: 'endpoint' },
  { variable: 'OBJECT_STORE_ACCESS_KEY', key: 'accessKey' },
  { variable: 'OBJECT_STORE_SECRET_KEY', key: 'secretKey' },
  { variable: 'OBJECT_STORE_BUCKET', key: 'bucket' },
] as const;

/**
 * Collect overrides from the environment. Unparsable numbers are skipped.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv, log: FastifyBaseLogger): EnvOverrides {
  const overrides: EnvOverrides = { objectStore: {}, transfer: {} };

  const backend = env['STORAGE_BACKEND']?.trim();
  if (backend) overrides.backend = backend;

  for (const { variable, key } of STRING_OVERRIDES) {
    const value = env[variable];
    if (value !== undefined && value.length > 0) overrides.objectStore[key] = value;
  }

  const secure = env['OBJECT_STORE_SECURE'];
  if (secure !== undefined && secure.length > 0) {
    overrides.objectStore.secure = ['1', 'true', 'yes'].includes(secure.trim().toLowerCase());
  }

  for (const { variable, key, integer, scale } of NUMERIC_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw.trim().length === 0) continue;

    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
      log.warn({ variable, value: raw }, 'Ignoring invalid storage environment override');
      continue;
    }
    overrides.transfer[key] = value * scale;
  }

  return overrides;
}

function applyOverrides(record: StorageConfigRecord, overrides: EnvOverrides): StorageConfigRecord {
  const effective = structuredClone(record);
  if (overrides.backend !== undefined) {
    for (const category of CONTENT_CATEGORIES) {
      effective.categories[category].backend = overrides.backend;
    }
  }
  effective.objectStore = { ...effective.objectStore, ...overrides.objectStore };
  effective.transfer = { ...effective.transfer, ...overrides.transfer };
  return effective;
}

// ---------------------------------------------------------------------------
// StorageConfigStore
// ---------------------------------------------------------------------------

export interface StorageConfigStoreOptions {
  path: string;
  logger: FastifyBaseLogger;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/** Partial update accepted by update() */
export interface StorageConfigPatch {
  categories?: Partial<
    Record<ContentCategory, { backend?: string; cloudDrive?: Partial<CloudDriveCategorySettings> }>
  >;
  cloudDrive?: { oauthToken?: string };
  objectStore?: Partial<ObjectStoreSettings>;
  transfer?: Partial<TransferSettings>;
  backupSettings?: Partial<BackupSettings>;
}

const SECRET_MASK = '********';

export class StorageConfigStore {
  readonly path: string;
  private readonly log: FastifyBaseLogger;
  private readonly env: NodeJS.ProcessEnv;
  private record: StorageConfigRecord;
  private overrides: EnvOverrides;

  constructor(options: StorageConfigStoreOptions) {
    this.path = options.path;
    this.log = options.logger;
    this.env = options.env ?? process.env;
    this.record = this.load();
    this.overrides = readEnvOverrides(this.env, this.log);
  }

  /**
   * Re-read the file and the environment.
   */
  reload(): void {
    this.record = this.load();
    this.overrides = readEnvOverrides(this.env, this.log);
  }

  /** Effective record: persisted values with environment overrides applied. */
  snapshot(): StorageConfigRecord {
    return applyOverrides(this.record, this.overrides);
  }

  /** The record exactly as persisted, without overrides. */
  persisted(): StorageConfigRecord {
    return structuredClone(this.record);
  }

  /** Effective record with credentials masked, for display. */
  redacted(): StorageConfigRecord {
    const view = this.snapshot();
    if (view.cloudDrive.oauthToken) view.cloudDrive.oauthToken = SECRET_MASK;
    if (view.objectStore.accessKey) view.objectStore.accessKey = SECRET_MASK;
    if (view.objectStore.secretKey) view.objectStore.secretKey = SECRET_MASK;
    return view;
  }

  // ---- Categories ----

  getBackend(category: ContentCategory): string {
    return this.snapshot().categories[category].backend;
  }

  setBackend(category: ContentCategory, backend: BackendKind): void {
    this.mutate((record) => {
      record.categories[category].backend = backend;
    });
  }

  getCloudDriveCategory(category: ContentCategory): CloudDriveCategorySettings {
    return this.snapshot().categories[category].cloudDrive;
  }

  setCloudDriveCategory(category: ContentCategory, enabled: boolean, basePath?: string): void {
    this.mutate((record) => {
      const settings = record.categories[category].cloudDrive;
      settings.enabled = enabled;
      if (basePath !== undefined) settings.basePath = basePath;
    });
  }

  // ---- Cloud drive ----

  getCloudDriveToken(): string {
    return this.record.cloudDrive.oauthToken;
  }

  setCloudDriveToken(token: string): void {
    this.mutate((record) => {
      record.cloudDrive.oauthToken = token;
      record.cloudDrive.enabled = token !== '';
    });
  }

  isCloudDriveEnabled(): boolean {
    return this.record.cloudDrive.enabled && this.record.cloudDrive.oauthToken !== '';
  }

  // ---- Object store ----

  getObjectStore(): ObjectStoreSettings {
    return this.snapshot().objectStore;
  }

  setObjectStore(patch: Partial<ObjectStoreSettings>): void {
    this.mutate((record) => {
      record.objectStore = { ...record.objectStore, ...patch };
    });
  }

  // ---- Transfer tuning ----

  getTransfer(): TransferSettings {
    return this.snapshot().transfer;
  }

  setTransfer(patch: Partial<TransferSettings>): void {
    this.mutate((record) => {
      record.transfer = { ...record.transfer, ...patch };
    });
  }

  // ---- Backup settings ----

  getBackupSettings(): BackupSettings {
    return structuredClone(this.record.backupSettings);
  }

  setBackupSettings(patch: Partial<BackupSettings>): void {
    this.mutate((record) => {
      record.backupSettings = { ...record.backupSettings, ...patch };
    });
  }

  /**
   * Apply a partial record in one validated write.
   */
  update(patch: StorageConfigPatch): void {
    this.mutate((record) => {
      for (const category of CONTENT_CATEGORIES) {
        const entry = patch.categories?.[category];
        if (!entry) continue;
        const target = record.categories[category];
        if (entry.backend !== undefined) target.backend = entry.backend;
        if (entry.cloudDrive) target.cloudDrive = { ...target.cloudDrive, ...entry.cloudDrive };
      }
      if (patch.cloudDrive?.oauthToken !== undefined) {
        record.cloudDrive.oauthToken = patch.cloudDrive.oauthToken;
        record.cloudDrive.enabled = patch.cloudDrive.oauthToken !== '';
      }
      if (patch.objectStore) record.objectStore = { ...record.objectStore, ...patch.objectStore };
      if (patch.transfer) record.transfer = { ...record.transfer, ...patch.transfer };
      if (patch.backupSettings) {
        record.backupSettings = { ...record.backupSettings, ...patch.backupSettings };
      }
    });
  }

  // ---- Persistence ----

  /**
   * Change a copy of the record, validate it and persist it. The in-memory
   * record is only replaced once the write succeeded.
   */
  private mutate(change: (draft: StorageConfigRecord) => void): void {
    const draft = structuredClone(this.record);
    change(draft);
    const next = StorageConfigSchema.parse(draft);
    this.persist(next);
    this.record = next;
  }

  private load(): StorageConfigRecord {
    if (!existsSync(this.path)) {
      this.log.info({ path: this.path }, 'Storage config not found, creating default');
      const defaults = defaultStorageConfig();
      this.persist(defaults);
      return defaults;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown parse error';
      return this.recoverCorrupt(message);
    }

    const result = StorageConfigSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      return this.recoverCorrupt(errors);
    }

    this.log.info({ path: this.path }, 'Storage config loaded');
    return result.data;
  }

  private recoverCorrupt(reason: string): StorageConfigRecord {
    const backupPath = `${this.path}.corrupt`;
    this.log.error(
      { path: this.path, backupPath, reason },
      'Storage config unreadable, replacing with defaults'
    );
    renameSync(this.path, backupPath);
    const defaults = defaultStorageConfig();
    this.persist(defaults);
    return defaults;
  }

  private persist(record: StorageConfigRecord): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    renameSync(tmpPath, this.path);
    this.log.debug({ path: this.path }, 'Storage config saved');
  }
}
