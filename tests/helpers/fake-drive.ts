// In-process stand-in for the cloud drive REST API, plugged into the
// adapter through its HttpSession seam. Download hrefs redirect to a storage
// node; like DriveSession, the fake follows redirects itself.

import type { HttpRequest, HttpResponse, HttpSession } from '@/storage/cloud-drive/session.js';

export const FAKE_API_BASE = 'https://drive.test/v1/disk';
const UPLOAD_HOST = 'https://upload.drive.test';
const DOWNLOAD_HOST = 'https://download.drive.test';
const MAX_REDIRECTS = 5;

/** Returns a response to short-circuit a request, or undefined to let it through. */
export type RequestInterceptor = (req: HttpRequest) => HttpResponse | undefined;

interface PendingUpload {
  path: string;
  total: number | null;
  buffer: Buffer | null;
  received: number;
}

function json(status: number, body: unknown): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: Buffer.from(JSON.stringify(body)),
  };
}

function empty(status: number, headers: Record<string, string> = {}): HttpResponse {
  return { status, headers, body: Buffer.alloc(0) };
}

function stripSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}

function nameOf(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/** Raised by a closed connection, shaped like undici's ClientClosedError. */
class ConnectionClosedError extends Error {
  readonly code = 'UND_ERR_CLOSED';

  constructor() {
    super('The client is closed');
    this.name = 'ClientClosedError';
  }
}

/**
 * One adapter's own session on a shared FakeDrive. Unlike the drive itself,
 * it refuses requests once closed.
 */
export class FakeConnection implements HttpSession {
  closed = false;

  constructor(private readonly drive: FakeDrive) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    if (this.closed) throw new ConnectionClosedError();
    return this.drive.request(req);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeDrive implements HttpSession {
  readonly files = new Map<string, Buffer>();
  readonly directories = new Set<string>(['']);
  readonly requests: HttpRequest[] = [];

  /** Concurrency of PUT/GET requests against transfer hosts */
  inFlightTransfers = 0;
  maxInFlightTransfers = 0;
  closed = false;
  redirectsFollowed = 0;

  private readonly interceptors: RequestInterceptor[] = [];
  private readonly uploads = new Map<string, PendingUpload>();
  private readonly downloads = new Map<string, string>();
  private nextHref = 0;

  constructor(private readonly token: string) {}

  /** Run before routing, in registration order. */
  intercept(interceptor: RequestInterceptor): void {
    this.interceptors.push(interceptor);
  }

  /** Answer the next `times` requests matching `predicate` with `status`. */
  failNext(predicate: (req: HttpRequest) => boolean, status: number, times = 1): void {
    let remaining = times;
    this.intercept((req) => {
      if (remaining === 0 || !predicate(req)) return undefined;
      remaining--;
      return json(status, { error: 'InjectedFailure' });
    });
  }

  /** API requests to one endpoint, e.g. "/resources" or "/resources/upload". */
  apiRequests(endpoint: string, method?: HttpRequest['method']): HttpRequest[] {
    const pathname = `${new URL(FAKE_API_BASE).pathname}${endpoint}`;
    return this.requests.filter(
      (req) => req.url.startsWith(FAKE_API_BASE) && new URL(req.url).pathname === pathname && (method === undefined || req.method === method)
    );
  }

  transferRequests(method?: HttpRequest['method']): HttpRequest[] {
    return this.requests.filter(
      (req) =>
        (req.url.startsWith(UPLOAD_HOST) || req.url.startsWith(DOWNLOAD_HOST)) &&
        (method === undefined || req.method === method)
    );
  }

  seedFile(path: string, data: Buffer): void {
    const normalized = stripSlashes(path);
    let parent = parentOf(normalized);
    while (parent.length > 0) {
      this.directories.add(parent);
      parent = parentOf(parent);
    }
    this.files.set(normalized, data);
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);

    for (const interceptor of this.interceptors) {
      const response = interceptor(req);
      if (response) return response;
    }

    let response = await this.route(req);
    for (let hop = 0; hop < MAX_REDIRECTS && response.status >= 300 && response.status < 400; hop++) {
      const location = response.headers['location'];
      if (location === undefined) break;
      this.redirectsFollowed++;
      response = await this.route({ ...req, url: new URL(location, req.url).toString() });
    }
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  connect(): FakeConnection {
    return new FakeConnection(this);
  }

  private async route(req: HttpRequest): Promise<HttpResponse> {
    if (req.url.startsWith(UPLOAD_HOST) || req.url.startsWith(DOWNLOAD_HOST)) {
      return this.transfer(req);
    }
    return this.api(req);
  }

  // ---- API host ----

  private api(req: HttpRequest): HttpResponse {
    if (req.headers?.['Authorization'] !== `OAuth ${this.token}`) {
      return json(401, { error: 'UnauthorizedError' });
    }

    const url = new URL(req.url);
    const endpoint = url.pathname.slice(new URL(FAKE_API_BASE).pathname.length);
    const path = stripSlashes(url.searchParams.get('path') ?? '');

    if (endpoint === '/' && req.method === 'GET') {
      return json(200, { total_space: 1000, used_space: 250, trash_size: 10 });
    }
    if (endpoint === '/resources/upload' && req.method === 'GET') {
      if (!this.directories.has(parentOf(path))) return json(409, { error: 'DiskPathDoesntExistsError' });
      const id = `u${this.nextHref++}`;
      this.uploads.set(id, { path, total: null, buffer: null, received: 0 });
      return json(200, { href: `${UPLOAD_HOST}/${id}` });
    }
    if (endpoint === '/resources/download' && req.method === 'GET') {
      if (!this.files.has(path)) return json(404, { error: 'DiskNotFoundError' });
      const id = `d${this.nextHref++}`;
      this.downloads.set(id, path);
      return json(200, { href: `${DOWNLOAD_HOST}/${id}` });
    }
    if (endpoint === '/resources') {
      switch (req.method) {
        case 'PUT':
          return this.mkdir(path);
        case 'DELETE':
          return this.remove(path);
        case 'GET':
          return this.describe(path, url.searchParams);
        default:
          return json(405, { error: 'MethodNotAllowed' });
      }
    }
    return json(404, { error: 'NoSuchEndpoint' });
  }

  private mkdir(path: string): HttpResponse {
    if (this.directories.has(path) || this.files.has(path)) return json(409, { error: 'DiskPathPointsToExistentDirectoryError' });
    if (!this.directories.has(parentOf(path))) return json(409, { error: 'DiskPathDoesntExistsError' });
    this.directories.add(path);
    return json(201, { href: `${FAKE_API_BASE}/resources?path=${encodeURIComponent(`/${path}`)}` });
  }

  private remove(path: string): HttpResponse {
    if (this.files.delete(path)) return empty(204);
    if (!this.directories.has(path)) return json(404, { error: 'DiskNotFoundError' });
    for (const dir of [...this.directories]) {
      if (dir === path || dir.startsWith(`${path}/`)) this.directories.delete(dir);
    }
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${path}/`)) this.files.delete(file);
    }
    return empty(204);
  }

  private describe(path: string, params: URLSearchParams): HttpResponse {
    if (this.files.has(path)) {
      return json(200, { name: nameOf(path), type: 'file', size: this.files.get(path)?.length ?? 0 });
    }
    if (!this.directories.has(path)) return json(404, { error: 'DiskNotFoundError' });

    const limit = Number(params.get('limit') ?? '20');
    const offset = Number(params.get('offset') ?? '0');
    const children = [
      ...[...this.directories]
        .filter((dir) => dir.length > 0 && parentOf(dir) === path)
        .map((dir) => ({ name: nameOf(dir), type: 'dir' })),
      ...[...this.files.keys()]
        .filter((file) => parentOf(file) === path)
        .map((file) => ({ name: nameOf(file), type: 'file' })),
    ].sort((a, b) => a.name.localeCompare(b.name));

    return json(200, {
      name: path.length === 0 ? 'disk' : nameOf(path),
      type: 'dir',
      _embedded: { items: children.slice(offset, offset + limit), limit, offset, total: children.length },
    });
  }

  // ---- Transfer hosts ----

  private async transfer(req: HttpRequest): Promise<HttpResponse> {
    this.inFlightTransfers++;
    this.maxInFlightTransfers = Math.max(this.maxInFlightTransfers, this.inFlightTransfers);
    try {
      // Yield so concurrent chunk requests overlap
      await new Promise((resolve) => setTimeout(resolve, 1));
      return req.url.startsWith(UPLOAD_HOST) ? this.receive(req) : this.serve(req);
    } finally {
      this.inFlightTransfers--;
    }
  }

  private receive(req: HttpRequest): HttpResponse {
    if (req.method !== 'PUT') return empty(405);
    const id = nameOf(new URL(req.url).pathname);
    const upload = this.uploads.get(id);
    if (!upload) return empty(404);
    const body = req.body ?? Buffer.alloc(0);

    const range = req.headers?.['Content-Range'];
    if (range === undefined) {
      this.files.set(upload.path, Buffer.from(body));
      this.uploads.delete(id);
      return empty(201);
    }

    const match = /^bytes (\d+)-(\d+)\/(\d+)$/.exec(range);
    if (!match) return empty(400);
    const start = Number(match[1]);
    const end = Number(match[2]);
    const total = Number(match[3]);
    if (end - start + 1 !== body.length) return empty(400);

    upload.total ??= total;
    upload.buffer ??= Buffer.alloc(total);
    body.copy(upload.buffer, start);
    upload.received += body.length;

    if (upload.received === upload.total) {
      this.files.set(upload.path, upload.buffer);
      this.uploads.delete(id);
      return empty(201);
    }
    return empty(202);
  }

  private serve(req: HttpRequest): HttpResponse {
    const pathname = new URL(req.url).pathname;
    const id = nameOf(pathname);
    const path = this.downloads.get(id);
    const data = path === undefined ? undefined : this.files.get(path);
    if (!data) return empty(404);
    if (!pathname.startsWith('/node/')) {
      return empty(302, { location: `${DOWNLOAD_HOST}/node/${id}` });
    }

    if (req.method === 'HEAD') {
      return empty(200, { 'content-length': String(data.length) });
    }
    if (req.method !== 'GET') return empty(405);

    const range = req.headers?.['Range'];
    if (range === undefined) {
      return { status: 200, headers: { 'content-length': String(data.length) }, body: Buffer.from(data) };
    }
    const match = /^bytes=(\d+)-(\d+)$/.exec(range);
    if (!match) return empty(416);
    const slice = data.subarray(Number(match[1]), Number(match[2]) + 1);
    return { status: 206, headers: { 'content-length': String(slice.length) }, body: Buffer.from(slice) };
  }
}
