// GET /storage/* -- public links of the local-disk backend resolve here.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface LocalFileParams {
  '*': string;
}

const localFileRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: LocalFileParams }>(
    '/storage/*',
    { schema: { description: 'Serve a file stored on local disk', tags: ['Files'] } },
    async (request, reply) => {
      const data = await fastify.storageManager.getLocal(request.params['*']);

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', data.length.toString())
        .send(data);
    }
  );

  done();
};

export const localFileRoutesPlugin = fp(localFileRoutes, {
  name: 'local-file-routes',
  fastify: '5.x',
});
