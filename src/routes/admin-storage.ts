// /admin/storage/* routes -- storage configuration and adapter cache control.
//
// Every mutation is persisted by the config store first and then drops the
// cached adapters it affects, so the next request resolves against the new
// settings.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { RequestInvalidError } from '../errors/index.js';
import {
  BackupPatchSchema,
  ObjectStorePatchSchema,
  TransferPatchSchema,
} from '../storage/config-store.js';
import type { ResolutionDecision } from '../storage/manager.js';
import { CONTENT_CATEGORIES, parseBackendKind } from '../storage/types.js';
import type { ContentCategory } from '../storage/types.js';

import { parseOrThrow, requireCategory } from './validation.js';

const CategoryUpdateSchema = z
  .object({
    backend: z.string().min(1),
    cloudDrive: z
      .object({
        enabled: z.boolean(),
        basePath: z.string().optional(),
      })
      .optional(),
  })
  .strict();

const CloudDriveTokenSchema = z.object({ oauthToken: z.string() }).strict();

const ScopeSchema = z
  .object({
    tenantId: z.string().min(1).optional(),
    category: z.enum(CONTENT_CATEGORIES).optional(),
  })
  .strict();

interface CategoryParams {
  category: string;
}

const adminStorageRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const manager = fastify.storageManager;
  const store = fastify.storageConfig;

  const sensitive = {
    rateLimit: {
      max: fastify.config.rateLimit.sensitive,
      timeWindow: fastify.config.rateLimit.windowMs,
    },
  };

  fastify.get(
    '/admin/storage/config',
    { schema: { description: 'Effective storage configuration, credentials masked', tags: ['Admin'] } },
    async () => store.redacted()
  );

  fastify.put<{ Params: CategoryParams }>(
    '/admin/storage/categories/:category',
    {
      schema: { description: 'Select the backend of one content category', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const category = requireCategory(request.params.category);
      const body = parseOrThrow(CategoryUpdateSchema, request.body);

      const backend = parseBackendKind(body.backend);
      if (backend === null) {
        throw new RequestInvalidError(`unknown backend "${body.backend}"`);
      }

      store.setBackend(category, backend);
      if (body.cloudDrive) {
        store.setCloudDriveCategory(category, body.cloudDrive.enabled, body.cloudDrive.basePath);
      }
      const invalidated = await manager.invalidate(undefined, category);

      request.log.info({ category, backend }, 'Category backend updated');
      return { category, settings: store.snapshot().categories[category], invalidated };
    }
  );

  fastify.put(
    '/admin/storage/cloud-drive',
    {
      schema: { description: 'Set or clear the cloud drive OAuth token', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const { oauthToken } = parseOrThrow(CloudDriveTokenSchema, request.body);
      store.setCloudDriveToken(oauthToken);
      const invalidated = await manager.invalidate();

      request.log.info({ enabled: store.isCloudDriveEnabled() }, 'Cloud drive token updated');
      return { enabled: store.isCloudDriveEnabled(), invalidated };
    }
  );

  fastify.put(
    '/admin/storage/object-store',
    {
      schema: { description: 'Update object store connection settings', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const patch = parseOrThrow(ObjectStorePatchSchema, request.body);
      store.setObjectStore(patch);
      const invalidated = await manager.invalidate();

      request.log.info({ fields: Object.keys(patch) }, 'Object store settings updated');
      return { objectStore: store.redacted().objectStore, invalidated };
    }
  );

  fastify.put(
    '/admin/storage/transfer',
    {
      schema: { description: 'Update cloud drive transfer tuning', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const patch = parseOrThrow(TransferPatchSchema, request.body);
      store.setTransfer(patch);
      const invalidated = await manager.invalidate();

      request.log.info({ patch }, 'Transfer settings updated');
      return { transfer: store.getTransfer(), invalidated };
    }
  );

  fastify.get(
    '/admin/storage/backup-settings',
    { schema: { description: 'Backup archive settings', tags: ['Admin'] } },
    async () => store.getBackupSettings()
  );

  fastify.put(
    '/admin/storage/backup-settings',
    {
      schema: { description: 'Update backup archive settings', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const patch = parseOrThrow(BackupPatchSchema, request.body);
      if (
        patch.chunkSizeMb !== undefined &&
        patch.chunkSizeMb > (patch.maxSizeMb ?? store.getBackupSettings().maxSizeMb)
      ) {
        throw new RequestInvalidError('chunkSizeMb must not exceed maxSizeMb');
      }
      store.setBackupSettings(patch);
      return store.getBackupSettings();
    }
  );

  fastify.post(
    '/admin/storage/invalidate',
    {
      schema: { description: 'Drop cached adapters for a tenant and/or category', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const { tenantId, category } = parseOrThrow(ScopeSchema, request.body);
      const invalidated = await manager.invalidate(tenantId, category);
      return { invalidated };
    }
  );

  fastify.post(
    '/admin/storage/reload',
    {
      schema: { description: 'Re-read the storage configuration file', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const invalidated = await manager.reload();
      request.log.info({ invalidated }, 'Storage configuration reloaded');
      return { invalidated };
    }
  );

  fastify.get(
    '/admin/storage/resolution',
    { schema: { description: 'Backend serving each category, and why', tags: ['Admin'] } },
    async (request) => {
      const { tenantId } = parseOrThrow(ScopeSchema.pick({ tenantId: true }), request.query);

      const decisions: Partial<Record<ContentCategory, ResolutionDecision>> = {};
      for (const category of CONTENT_CATEGORIES) {
        decisions[category] = await manager.describe(category, tenantId);
      }
      return { tenantId: tenantId ?? null, categories: decisions };
    }
  );

  fastify.get(
    '/admin/storage/cache',
    { schema: { description: 'Directory cache statistics per cached adapter', tags: ['Admin'] } },
    async () => ({ caches: await manager.directoryCacheStats() })
  );

  fastify.delete(
    '/admin/storage/cache',
    {
      schema: { description: 'Clear directory caches', tags: ['Admin'] },
      config: sensitive,
    },
    async (request) => {
      const { tenantId, category } = parseOrThrow(ScopeSchema, request.query);
      const cleared = await manager.clearDirectoryCaches(tenantId, category);
      return { cleared };
    }
  );

  done();
};

export const adminStorageRoutesPlugin = fp(adminStorageRoutes, {
  name: 'admin-storage-routes',
  fastify: '5.x',
});
