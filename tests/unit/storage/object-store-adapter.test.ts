import { describe, it, expect, beforeEach } from 'vitest';

import { ObjectStoreAdapter, parseEndpoint } from '@/storage/object-store-adapter.js';
import type { ObjectStoreAdapterOptions } from '@/storage/object-store-adapter.js';

import { FakeObjectStore, s3Error } from '../../helpers/fake-object-store.js';
import { createMockLogger } from '../../helpers/logger.js';
import type { MockLogger } from '../../helpers/logger.js';

describe('parseEndpoint', () => {
  it('keeps an explicit scheme', () => {
    expect(parseEndpoint('https://s3.example.test/', false)).toEqual({ scheme: 'https', host: 's3.example.test' });
  });

  it('uses https when secure or on port 443', () => {
    expect(parseEndpoint('minio.test:9000', true)).toEqual({ scheme: 'https', host: 'minio.test:9000' });
    expect(parseEndpoint('minio.test:443', false)).toEqual({ scheme: 'https', host: 'minio.test:443' });
  });

  it('defaults to http', () => {
    expect(parseEndpoint('minio.test:9000', undefined)).toEqual({ scheme: 'http', host: 'minio.test:9000' });
  });
});

describe('ObjectStoreAdapter', () => {
  let store: FakeObjectStore;
  let log: MockLogger;

  function createAdapter(overrides: Partial<ObjectStoreAdapterOptions> = {}): ObjectStoreAdapter {
    return new ObjectStoreAdapter({
      endpoint: 'minio.test:9000',
      accessKey: 'test-access',
      secretKey: 'test-secret',
      bucket: 'assets',
      logger: log.logger,
      client: store.client,
      ...overrides,
    });
  }

  beforeEach(() => {
    store = new FakeObjectStore();
    log = createMockLogger();
  });

  it('requires endpoint, credentials and bucket', () => {
    expect(() => createAdapter({ accessKey: '', bucket: ' ' })).toThrow(
      'Storage misconfigured: object store requires accessKey, bucket'
    );
  });

  it('creates the bucket on first write, once', async () => {
    const adapter = createAdapter();

    await adapter.save(Buffer.from('a'), 'one.png');
    await adapter.save(Buffer.from('b'), 'two.png');

    expect(store.buckets.has('assets')).toBe(true);
    expect(store.sent.filter((name) => name === 'CreateBucket')).toHaveLength(1);
    expect(store.sent.filter((name) => name === 'HeadBucket')).toHaveLength(1);
  });

  it('retries bucket setup after a failed attempt', async () => {
    store.failOn('HeadBucket', s3Error('InternalError'));
    const adapter = createAdapter();

    await expect(adapter.save(Buffer.from('a'), 'one.png')).rejects.toMatchObject({ code: 'STORAGE_TRANSFER' });
    await expect(adapter.save(Buffer.from('a'), 'one.png')).resolves.toBe('http://minio.test:9000/assets/one.png');
  });

  it('round-trips content and builds path-style URLs', async () => {
    const adapter = createAdapter();

    const url = await adapter.save(Buffer.from('payload'), '/images/a b.png');

    expect(url).toBe('http://minio.test:9000/assets/images/a%20b.png');
    await expect(adapter.get('images/a b.png')).resolves.toEqual(Buffer.from('payload'));
  });

  it('prefixes keys and URLs with the tenant prefix', async () => {
    const adapter = createAdapter({ keyPrefix: 'tenants/acme', publicBaseUrl: 'https://cdn.test/' });

    const url = await adapter.save(Buffer.from('x'), 'a.png');

    expect(url).toBe('https://cdn.test/tenants/acme/a.png');
    expect(store.keys('assets')).toEqual(['tenants/acme/a.png']);
  });

  it('maps a missing key to NotFoundError', async () => {
    store.buckets.set('assets', new Map());
    const adapter = createAdapter();

    await expect(adapter.get('nope.png')).rejects.toMatchObject({
      code: 'STORAGE_NOT_FOUND',
      message: 'Not found in storage: nope.png',
    });
  });

  it('maps access errors to AuthenticationError', async () => {
    store.buckets.set('assets', new Map());
    store.failOn('GetObject', s3Error('AccessDenied'));
    const adapter = createAdapter();

    await expect(adapter.get('a.png')).rejects.toMatchObject({ code: 'STORAGE_AUTHENTICATION' });
  });

  it('maps size limits to QuotaExceededError', async () => {
    store.buckets.set('assets', new Map());
    store.failOn('PutObject', s3Error('EntityTooLarge'));
    const adapter = createAdapter();

    await expect(adapter.save(Buffer.from('x'), 'a.png')).rejects.toMatchObject({ code: 'STORAGE_QUOTA_EXCEEDED' });
  });

  it('maps anything else to TransferError and logs it', async () => {
    store.buckets.set('assets', new Map());
    store.failOn('GetObject', s3Error('SlowDown'));
    const adapter = createAdapter();

    await expect(adapter.get('a.png')).rejects.toThrow('Storage transfer failed: get a.png (SlowDown)');
    expect(log.error).toHaveBeenCalledWith(
      { operation: 'get', bucket: 'assets', path: 'a.png', reason: 'SlowDown' },
      'Object store request failed'
    );
  });

  it('deletes idempotently', async () => {
    const adapter = createAdapter();
    await adapter.save(Buffer.from('x'), 'a.png');

    await expect(adapter.delete('a.png')).resolves.toBe(true);
    await expect(adapter.delete('a.png')).resolves.toBe(false);
    await expect(adapter.exists('a.png')).resolves.toBe(false);
  });

  it('writes directory markers and recognises implicit directories', async () => {
    const adapter = createAdapter();

    await expect(adapter.createDirectory('acme/image')).resolves.toBe(true);
    await adapter.save(Buffer.from('x'), 'acme/video/clip.mp4');

    expect(store.keys('assets')).toEqual(['acme/image/', 'acme/video/clip.mp4']);
    await expect(adapter.directoryExists('acme/image')).resolves.toBe(true);
    await expect(adapter.directoryExists('acme/video')).resolves.toBe(true);
    await expect(adapter.directoryExists('acme/preview')).resolves.toBe(false);
    await expect(adapter.directoryExists('')).resolves.toBe(true);
  });

  it('reports the bucket root as missing before the bucket exists', async () => {
    const adapter = createAdapter();
    await expect(adapter.directoryExists('/')).resolves.toBe(false);
    await expect(adapter.directoryExists('x')).resolves.toBe(false);
  });

  it('lists child directories across pages', async () => {
    store.pageSize = 2;
    const adapter = createAdapter();
    for (const name of ['delta', 'alpha', 'charlie', 'bravo']) {
      await adapter.createDirectory(`base/${name}`);
    }
    await adapter.save(Buffer.from('x'), 'base/file.txt');

    await expect(adapter.listDirectories('base')).resolves.toEqual(['alpha', 'bravo', 'charlie', 'delta']);
    await expect(adapter.listDirectories('')).resolves.toEqual(['base']);
  });

  it('lists nothing when the bucket is missing', async () => {
    const adapter = createAdapter();
    await expect(adapter.listDirectories('base')).resolves.toEqual([]);
  });

  it('is healthy while the bucket exists', async () => {
    const adapter = createAdapter();
    await expect(adapter.healthy()).resolves.toBe(false);

    store.buckets.set('assets', new Map());
    await expect(adapter.healthy()).resolves.toBe(true);

    store.failOn('HeadBucket', s3Error('InvalidAccessKeyId'));
    await expect(adapter.healthy()).resolves.toBe(false);
  });

  it('destroys the client on close', async () => {
    const adapter = createAdapter();
    await adapter.close();
    expect(store.destroyed).toBe(true);
  });
});
