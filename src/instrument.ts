import * as Sentry from '@sentry/node';

import { redactUrl } from './plugins/request-logger.js';

/**
 * Strip storage credentials from an event before it leaves the process:
 * the Authorization header and token query parameters.
 */
export function scrubEvent<T extends Sentry.Event>(event: T): T {
  const request = event.request;
  if (!request) return event;

  if (request.url) {
    request.url = redactUrl(request.url);
  }
  if (typeof request.query_string === 'string') {
    request.query_string = redactUrl(`?${request.query_string}`).slice(1);
  }
  if (request.headers) {
    for (const name of Object.keys(request.headers)) {
      if (name.toLowerCase() === 'authorization') delete request.headers[name];
    }
  }
  return event;
}

// Only initialize if DSN is provided
// This allows running without Sentry in development
export function initSentry(
  dsn: string | undefined,
  environment: string,
  tracesSampleRate = 0.1
): void {
  if (!dsn) {
    console.log('Sentry DSN not configured, storage error reporting disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
    beforeSend: (event) => scrubEvent(event),
  });

  console.log(`Sentry initialized for environment: ${environment}`);
}

// Re-export Sentry for use in error handler
export { Sentry };
