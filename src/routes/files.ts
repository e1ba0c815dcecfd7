// /files/:category/* -- content routed through the storage manager.
//
// The path after the category is the logical path handed to the adapter;
// an optional ?tenantId selects the tenant's backend. Cloud drive public
// links point back here.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { RequestInvalidError } from '../errors/index.js';

import { parseOrThrow, requireCategory } from './validation.js';

const BYTES_PER_MB = 1024 * 1024;

const FileQuerySchema = z.object({ tenantId: z.string().min(1).optional() });

interface FileParams {
  category: string;
  '*': string;
}

const fileRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const manager = fastify.storageManager;
  const uploadLimit = Math.round(fastify.config.storage.uploadLimitMb * BYTES_PER_MB);

  fastify.put<{ Params: FileParams }>(
    '/files/:category/*',
    {
      schema: {
        description: 'Store a file (multipart field "file") at a logical path',
        tags: ['Files'],
      },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
      bodyLimit: uploadLimit,
    },
    async (request, reply) => {
      const category = requireCategory(request.params.category);
      const { tenantId } = parseOrThrow(FileQuerySchema, request.query);
      const path = request.params['*'];

      const file = await request.file({ limits: { fileSize: uploadLimit } });
      if (!file) {
        throw new RequestInvalidError('no file provided, send multipart/form-data with a "file" field');
      }
      // Rejects with FST_REQ_FILE_TOO_LARGE (413) past the limit
      const data = await file.toBuffer();

      const url = await manager.save(data, path, category, tenantId);
      request.log.info({ category, tenantId: tenantId ?? null, path, size: data.length }, 'File stored');

      return reply.status(201).send({ url, size: data.length });
    }
  );

  fastify.get<{ Params: FileParams }>(
    '/files/:category/*',
    { schema: { description: 'Read a file', tags: ['Files'] } },
    async (request, reply) => {
      const category = requireCategory(request.params.category);
      const { tenantId } = parseOrThrow(FileQuerySchema, request.query);

      const data = await manager.get(request.params['*'], category, tenantId);

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', data.length.toString())
        .send(data);
    }
  );

  fastify.delete<{ Params: FileParams }>(
    '/files/:category/*',
    {
      schema: { description: 'Delete a file; deleting a missing file is not an error', tags: ['Files'] },
      config: {
        rateLimit: {
          max: fastify.config.rateLimit.sensitive,
          timeWindow: fastify.config.rateLimit.windowMs,
        },
      },
    },
    async (request) => {
      const category = requireCategory(request.params.category);
      const { tenantId } = parseOrThrow(FileQuerySchema, request.query);

      const deleted = await manager.delete(request.params['*'], category, tenantId);
      return { deleted };
    }
  );

  done();
};

export const fileRoutesPlugin = fp(fileRoutes, {
  name: 'file-routes',
  fastify: '5.x',
});
