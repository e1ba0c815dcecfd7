import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

// Query parameters that may carry credentials
const REDACTED_QUERY = /([?&](?:token|oauth_token|access_token)=)[^&]*/gi;

export function redactUrl(url: string): string {
  return url.replace(REDACTED_QUERY, '$1[redacted]');
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: redactUrl(request.url),
      requestId: request.id,
      userAgent: request.headers['user-agent'],
    };

    if (isDev) {
      logData.contentType = request.headers['content-type'];
      logData.contentLength = request.headers['content-length'];
    }

    request.log.info(logData, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: redactUrl(request.url),
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
