// Storage module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import { StorageConfigStore } from './config-store.js';
import { StorageManager } from './manager.js';
import type { AdapterFactories } from './manager.js';
import type { ConnectionDirectory, TenantDirectory } from './registry.js';

export * from './cloud-drive/index.js';
export {
  StorageConfigSchema,
  StorageConfigStore,
  defaultStorageConfig,
  readEnvOverrides,
} from './config-store.js';
export type {
  BackupSettings,
  CategorySettings,
  CloudDriveCategorySettings,
  ObjectStoreSettings,
  StorageConfigPatch,
  StorageConfigRecord,
  StorageConfigStoreOptions,
  TransferSettings,
} from './config-store.js';
export {
  AuthenticationError,
  ConfigurationError,
  InvalidPathError,
  NotFoundError,
  QuotaExceededError,
  TransferError,
  isStorageError,
} from './errors.js';
export { LocalDiskAdapter } from './local-adapter.js';
export type { LocalDiskAdapterOptions } from './local-adapter.js';
export { StorageManager, defaultAdapterFactories } from './manager.js';
export type {
  AdapterFactories,
  FallbackReason,
  ResolutionDecision,
  StorageManagerOptions,
} from './manager.js';
export { ObjectStoreAdapter, parseEndpoint } from './object-store-adapter.js';
export type { ObjectStoreAdapterOptions, ObjectStoreClient } from './object-store-adapter.js';
export { normalizeLogicalPath, slugify } from './paths.js';
export { DEFAULT_SUBFOLDERS } from './provisioning.js';
export type {
  CategoryProvisionResult,
  CategoryVerifyResult,
  ProvisionReport,
  VerifyReport,
} from './provisioning.js';
export {
  CloudDriveCredentialsSchema,
  ObjectStoreCredentialsSchema,
  RegistrySchema,
  StaticRegistry,
} from './registry.js';
export type {
  ConnectionDirectory,
  RegistryConfig,
  StorageConnection,
  TenantDirectory,
  TenantStorageOverride,
} from './registry.js';
export { BACKEND_KINDS, CONTENT_CATEGORIES, isContentCategory, parseBackendKind } from './types.js';
export type { BackendKind, ContentCategory, StorageAdapter } from './types.js';

export interface CreateStorageManagerOptions {
  /** Local-disk root */
  root: string;
  /** Path of the persisted storage configuration record */
  configPath: string;
  /** Externally reachable base URL of the service */
  publicBaseUrl: string;
  tenants: TenantDirectory;
  connections: ConnectionDirectory;
  logger: FastifyBaseLogger;
  env?: NodeJS.ProcessEnv;
  factories?: Partial<AdapterFactories>;
}

/**
 * Load the storage configuration record and build a manager over it.
 */
export function createStorageManager(options: CreateStorageManagerOptions): {
  manager: StorageManager;
  config: StorageConfigStore;
} {
  const config = new StorageConfigStore({
    path: options.configPath,
    logger: options.logger,
    env: options.env,
  });

  const manager = new StorageManager({
    config,
    localRoot: options.root,
    publicBaseUrl: options.publicBaseUrl,
    tenants: options.tenants,
    connections: options.connections,
    logger: options.logger,
    factories: options.factories,
  });

  return { manager, config };
}
