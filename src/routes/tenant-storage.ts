import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import { CONTENT_CATEGORIES } from '../storage/types.js';

import { parseOrThrow } from './validation.js';

const CategoriesSchema = z.array(z.enum(CONTENT_CATEGORIES)).min(1);

const ProvisionRequestSchema = z
  .object({
    categories: CategoriesSchema,
    subfolders: z
      .array(
        z
          .string()
          .min(1)
          .regex(/^[^/\\]+$/, 'subfolder must be a single path segment')
      )
      .optional(),
  })
  .strict();

const VerifyRequestSchema = z.object({ categories: CategoriesSchema }).strict();

interface TenantParams {
  tenantId: string;
}

const tenantStorageRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const sensitive = {
    rateLimit: {
      max: fastify.config.rateLimit.sensitive,
      timeWindow: fastify.config.rateLimit.windowMs,
    },
  };

  fastify.post<{ Params: TenantParams }>(
    '/admin/tenants/:tenantId/storage/provision',
    {
      schema: {
        description: 'Create the folder hierarchy of a tenant on its resolved backends',
        tags: ['Admin'],
      },
      config: sensitive,
    },
    async (request, reply) => {
      const { categories, subfolders } = parseOrThrow(ProvisionRequestSchema, request.body);
      const report = await fastify.storageManager.provision(request.params.tenantId, categories, subfolders);

      // Partial failures are reported in the body, not as an error status
      return reply.status(report.success ? 200 : 207).send(report);
    }
  );

  fastify.post<{ Params: TenantParams }>(
    '/admin/tenants/:tenantId/storage/verify',
    {
      schema: { description: 'Check that a tenant folder hierarchy exists', tags: ['Admin'] },
    },
    async (request) => {
      const { categories } = parseOrThrow(VerifyRequestSchema, request.body);
      return fastify.storageManager.verify(request.params.tenantId, categories);
    }
  );

  done();
};

export const tenantStorageRoutesPlugin = fp(tenantStorageRoutes, {
  name: 'tenant-storage-routes',
  fastify: '5.x',
});
