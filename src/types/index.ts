// Fastify instance augmentation for the storage service

import type { Config } from '../config/index.js';
import type { StorageConfigStore } from '../storage/config-store.js';
import type { StorageManager } from '../storage/manager.js';
import type { StaticRegistry } from '../storage/registry.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storageManager: StorageManager;
    storageConfig: StorageConfigStore;
    registry: StaticRegistry;
  }
}
