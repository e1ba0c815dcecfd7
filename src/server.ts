import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { adminStorageRoutesPlugin } from './routes/admin-storage.js';
import { fileRoutesPlugin } from './routes/files.js';
import { healthRoutesPlugin } from './routes/health.js';
import { localFileRoutesPlugin } from './routes/local-files.js';
import { tenantStorageRoutesPlugin } from './routes/tenant-storage.js';
import { StaticRegistry, createStorageManager } from './storage/index.js';
import type { AdapterFactories } from './storage/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Adapter constructors; tests pass ones backed by in-process fakes */
  storageFactories?: Partial<AdapterFactories>;
  /** Environment used for storage overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
      redact: ['req.headers.authorization'],
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Custom request logging plugin instead
    disableRequestLogging: true,
    // JSON bodies are small admin payloads; uploads set their own limit
    bodyLimit: 51200,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  await server.register(multipart, {
    limits: {
      fileSize: Math.round(config.storage.uploadLimitMb * 1024 * 1024),
      files: 1,
    },
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Storage Orchestrator',
        description:
          'Routes content to local disk, an S3-compatible object store or a cloud drive per tenant and category.',
        version: '1.0.0',
      },
      servers: [{ url: config.storage.publicBaseUrl, description: 'Configured public URL' }],
      tags: [
        { name: 'Health', description: 'Service liveness' },
        { name: 'Admin', description: 'Storage configuration, tenant provisioning and caches' },
        { name: 'Files', description: 'Content upload, download and deletion' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Storage layer initialization ----
  const registry = new StaticRegistry(config.registry);
  const { manager, config: storageConfig } = createStorageManager({
    root: resolve(process.cwd(), config.storage.root),
    configPath: resolve(process.cwd(), config.storage.configPath),
    publicBaseUrl: config.storage.publicBaseUrl,
    tenants: registry,
    connections: registry,
    logger: server.log,
    env: options.env,
    factories: options.storageFactories,
  });

  server.decorate('registry', registry);
  server.decorate('storageConfig', storageConfig);
  server.decorate('storageManager', manager);

  server.addHook('onClose', async () => {
    await manager.close();
    server.log.info('Storage layer shutdown complete');
  });

  server.log.info(
    {
      root: config.storage.root,
      configPath: config.storage.configPath,
      tenants: config.registry.tenants.length,
    },
    'Storage layer initialized'
  );

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(adminStorageRoutesPlugin);
  await server.register(tenantStorageRoutesPlugin);
  await server.register(fileRoutesPlugin);
  await server.register(localFileRoutesPlugin);

  return server;
}
