import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

// Read version once at startup (not on every request)
const packageJson = JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')) as {
  version: string;
};
const APP_VERSION = packageJson.version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  dependencies: Record<string, DependencyStatus>;
}

async function timed(check: () => Promise<boolean> | boolean): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const up = await check();
    return { status: up ? 'up' : 'down', latency: Date.now() - start };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { description: 'Service and local storage liveness', tags: ['Health'] } },
    async (_request, reply) => {
      // Remote backends are not checked here: a down cloud drive degrades to
      // local disk, it does not make the service unhealthy.
      const [localDisk, storageConfig] = await Promise.all([
        timed(() => fastify.storageManager.localHealthy()),
        timed(() => existsSync(fastify.storageConfig.path)),
      ]);

      const dependencies: Record<string, DependencyStatus> = { localDisk, storageConfig };

      const allUp = Object.values(dependencies).every((d) => d.status === 'up');
      const allDown = Object.values(dependencies).every((d) => d.status === 'down');

      let status: HealthResponse['status'];
      if (allUp) {
        status = 'healthy';
      } else if (allDown || localDisk.status === 'down') {
        status = 'unhealthy';
      } else {
        status = 'degraded';
      }

      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        dependencies,
      };

      return reply.status(status === 'unhealthy' ? 503 : 200).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
