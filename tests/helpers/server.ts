// Full server over temporary directories, with remote backends replaced by
// in-process fakes.

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import type { z } from 'zod';

import { ConfigSchema } from '@/config/schema.js';
import { createServer } from '@/server.js';
import { CloudDriveAdapter } from '@/storage/cloud-drive/adapter.js';
import { ObjectStoreAdapter } from '@/storage/object-store-adapter.js';

import { FAKE_API_BASE, FakeDrive } from './fake-drive.js';
import { FakeObjectStore } from './fake-object-store.js';

export const TEST_BASE_URL = 'http://localhost:3000';

export interface TestServer {
  server: FastifyInstance;
  /** Temporary directory holding the local-disk root and the storage config */
  dir: string;
  localRoot: string;
  /** Fake drive answering for one OAuth token, created on first use */
  driveFor(token: string): FakeDrive;
  objectStore: FakeObjectStore;
  close(): Promise<void>;
}

export async function createTestServer(raw: z.input<typeof ConfigSchema> = {}): Promise<TestServer> {
  const dir = mkdtempSync(join(tmpdir(), 'storage-server-'));
  const localRoot = join(dir, 'files');
  const drives = new Map<string, FakeDrive>();
  const objectStore = new FakeObjectStore();

  const driveFor = (token: string): FakeDrive => {
    let drive = drives.get(token);
    if (!drive) {
      drive = new FakeDrive(token);
      drives.set(token, drive);
    }
    return drive;
  };

  const config = ConfigSchema.parse({
    env: 'test',
    logging: { level: 'fatal' },
    ...raw,
    storage: {
      publicBaseUrl: TEST_BASE_URL,
      ...raw.storage,
      root: localRoot,
      configPath: join(dir, 'storage-config.json'),
    },
  });

  const server = await createServer({
    config,
    env: {},
    storageFactories: {
      cloudDrive: (options) =>
        new CloudDriveAdapter({ ...options, apiBaseUrl: FAKE_API_BASE, session: driveFor(options.oauthToken) }),
      objectStore: (options) => new ObjectStoreAdapter({ ...options, client: objectStore.client }),
    },
  });
  await server.ready();

  return {
    server,
    dir,
    localRoot,
    driveFor,
    objectStore,
    async close() {
      await server.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** A multipart/form-data body carrying one file part, plus optional text fields. */
export function multipartBody(
  file: { filename: string; content: Buffer } | null,
  fields: Record<string, string> = {}
): { payload: Buffer; headers: Record<string, string> } {
  const boundary = '----storage-test-boundary';
  const parts: Buffer[] = [];

  for (const [name, value] of Object.entries(fields)) {
    parts.push(Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`));
  }
  if (file) {
    parts.push(
      Buffer.from(
        `--${boundary}\r\nContent-Disposition: form-data; name="file"; filename="${file.filename}"\r\n` +
          'Content-Type: application/octet-stream\r\n\r\n'
      ),
      file.content,
      Buffer.from('\r\n')
    );
  }
  parts.push(Buffer.from(`--${boundary}--\r\n`));

  return {
    payload: Buffer.concat(parts),
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
  };
}
