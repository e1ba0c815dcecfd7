import type { FastifyPluginCallback, FastifyError } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'An internal error occurred';

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const code = error.code ?? 'INTERNAL_ERROR';

    // Client mistakes are expected traffic; keep them out of the error level
    if (statusCode >= 500) {
      request.log.error({ err: error, code, statusCode }, 'Request error');
    } else {
      request.log.warn({ code, statusCode, message: error.message }, 'Request rejected');
    }

    // Backend outages (502/507) are reported as well as crashes
    if (statusCode >= 500) {
      Sentry.captureException(error, {
        tags: { code },
        extra: {
          requestId: request.id,
          url: request.url,
          method: request.method,
        },
      });
    }

    const response: ErrorResponse = {
      error: {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        ...(isDev && error.stack && { stack: error.stack }),
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    reply.status(statusCode).send(response);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const response: ErrorResponse = {
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      },
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };

    request.log.warn({ method: request.method, url: request.url }, 'Route not found');

    reply.status(404).send(response);
  });

  done();
};

/**
 * Production message for an error. Storage backend messages carry the
 * failing operation and path, which callers need; internal and
 * misconfiguration messages may carry hosts or file locations and are hidden.
 */
export function sanitizeMessage(message: string, code: string, statusCode: number): string {
  if (statusCode === 429) {
    return message;
  }
  if (code === 'INTERNAL_ERROR' || code.startsWith('SERVER_')) {
    return GENERIC_MESSAGE;
  }
  if (code === 'STORAGE_CONFIGURATION') {
    return 'Storage backend is misconfigured';
  }
  if (code.startsWith('CONFIG_') || code.startsWith('STORAGE_') || code.startsWith('REQUEST_')) {
    return message;
  }
  // Unknown 5xx (uncoded throws, library failures)
  if (statusCode >= 500) {
    return GENERIC_MESSAGE;
  }
  return message;
}

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
