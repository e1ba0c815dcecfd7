// Pooled HTTP session for the cloud drive.
//
// One undici Agent per adapter. The API origin and the transfer hosts the API
// hands out (upload/download hrefs) get separate pool sizes. Download hrefs
// answer with a redirect to a storage node, so redirects are followed.

import { Agent, Pool, interceptors, request } from 'undici';
import type { Dispatcher } from 'undici';

export type HttpMethod = 'GET' | 'PUT' | 'HEAD' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: Buffer;
}

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Transport seam of the cloud-drive adapter. Implementations follow redirects.
 * Tests substitute an in-process fake.
 */
export interface HttpSession {
  request(req: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface DriveSessionOptions {
  /** Origin of the drive API, e.g. https://drive.example.com */
  apiOrigin: string;
  requestTimeoutMs: number;
  /** Keep-alive connections to the API origin */
  poolConnections: number;
  /** Keep-alive connections per transfer host */
  poolMaxSize: number;
  keepAliveTimeoutMs?: number;
  maxRedirections?: number;
}

const DEFAULT_MAX_REDIRECTIONS = 5;

function flattenHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

export class DriveSession implements HttpSession {
  private readonly agent: Agent;
  private readonly dispatcher: Dispatcher;
  private readonly requestTimeoutMs: number;

  constructor(options: DriveSessionOptions) {
    const apiOrigin = new URL(options.apiOrigin).origin;
    const keepAliveTimeout = options.keepAliveTimeoutMs ?? 30_000;
    this.requestTimeoutMs = options.requestTimeoutMs;

    this.agent = new Agent({
      factory: (origin: string | URL): Dispatcher =>
        new Pool(origin, {
          connections:
            new URL(String(origin)).origin === apiOrigin
              ? options.poolConnections
              : options.poolMaxSize,
          keepAliveTimeout,
        }),
    });
    this.dispatcher = this.agent.compose(
      interceptors.redirect({ maxRedirections: options.maxRedirections ?? DEFAULT_MAX_REDIRECTIONS })
    );
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const response = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      dispatcher: this.dispatcher,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });

    const body = Buffer.from(await response.body.arrayBuffer());
    return {
      status: response.statusCode,
      headers: flattenHeaders(response.headers),
      body,
    };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
