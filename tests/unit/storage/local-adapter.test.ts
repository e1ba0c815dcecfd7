import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { LocalDiskAdapter } from '@/storage/local-adapter.js';

// Runs once before the next writeFile, to interleave a concurrent change
const writeHook = vi.hoisted(() => {
  const hook: { beforeWrite?: (path: string) => void } = {};
  return hook;
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    writeFile: async (...args: Parameters<typeof actual.writeFile>) => {
      const beforeWrite = writeHook.beforeWrite;
      writeHook.beforeWrite = undefined;
      beforeWrite?.(String(args[0]));
      return actual.writeFile(...args);
    },
  };
});

describe('LocalDiskAdapter', () => {
  let root: string;
  let adapter: LocalDiskAdapter;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'local-adapter-'));
    adapter = new LocalDiskAdapter({ root, publicBaseUrl: 'http://localhost:3000/storage/' });
  });

  afterEach(() => {
    writeHook.beforeWrite = undefined;
    rmSync(root, { recursive: true, force: true });
  });

  it('saves into nested directories and returns the public URL', async () => {
    const url = await adapter.save(Buffer.from('hello'), 'tenant/images/a b.png');

    expect(url).toBe('http://localhost:3000/storage/tenant/images/a%20b.png');
    expect(existsSync(join(root, 'tenant', 'images', 'a b.png'))).toBe(true);
  });

  it('saves even when a concurrent delete prunes the parent before the write', async () => {
    writeHook.beforeWrite = (path) => rmSync(dirname(path), { recursive: true, force: true });

    const url = await adapter.save(Buffer.from('kept'), 'race/a.png');

    expect(url).toBe('http://localhost:3000/storage/race/a.png');
    expect(readFileSync(join(root, 'race', 'a.png'), 'utf-8')).toBe('kept');
  });

  it('reads back what was saved', async () => {
    await adapter.save(Buffer.from('content'), 'x/y.txt');
    await expect(adapter.get('/x//y.txt')).resolves.toEqual(Buffer.from('content'));
  });

  it('overwrites an existing file', async () => {
    await adapter.save(Buffer.from('first'), 'a.txt');
    await adapter.save(Buffer.from('second'), 'a.txt');
    await expect(adapter.get('a.txt')).resolves.toEqual(Buffer.from('second'));
  });

  it('raises NotFoundError for a missing file or a directory', async () => {
    mkdirSync(join(root, 'dir'));

    await expect(adapter.get('missing.txt')).rejects.toMatchObject({ code: 'STORAGE_NOT_FOUND', statusCode: 404 });
    await expect(adapter.get('dir')).rejects.toMatchObject({ code: 'STORAGE_NOT_FOUND' });
  });

  it('rejects traversal outside the root', async () => {
    await expect(adapter.save(Buffer.from('x'), '../escape.txt')).rejects.toMatchObject({
      code: 'STORAGE_INVALID_PATH',
    });
    await expect(adapter.get('a/../../etc/passwd')).rejects.toMatchObject({ code: 'STORAGE_INVALID_PATH' });
  });

  it('deletes idempotently and prunes emptied parents', async () => {
    await adapter.save(Buffer.from('x'), 'a/b/c.txt');
    await adapter.save(Buffer.from('y'), 'a/keep.txt');

    await expect(adapter.delete('a/b/c.txt')).resolves.toBe(true);
    await expect(adapter.delete('a/b/c.txt')).resolves.toBe(false);

    expect(existsSync(join(root, 'a', 'b'))).toBe(false);
    expect(existsSync(join(root, 'a', 'keep.txt'))).toBe(true);
    expect(existsSync(root)).toBe(true);
  });

  it('does not delete directories', async () => {
    mkdirSync(join(root, 'dir'));
    await expect(adapter.delete('dir')).resolves.toBe(false);
    expect(existsSync(join(root, 'dir'))).toBe(true);
  });

  it('reports existence for files only', async () => {
    await adapter.save(Buffer.from('x'), 'd/f.txt');

    await expect(adapter.exists('d/f.txt')).resolves.toBe(true);
    await expect(adapter.exists('d')).resolves.toBe(false);
    await expect(adapter.exists('nope')).resolves.toBe(false);
  });

  it('creates directories idempotently', async () => {
    await expect(adapter.createDirectory('t/c/images')).resolves.toBe(true);
    await expect(adapter.createDirectory('t/c/images')).resolves.toBe(true);
    await expect(adapter.directoryExists('t/c/images')).resolves.toBe(true);
    await expect(adapter.directoryExists('t/c/videos')).resolves.toBe(false);
  });

  it('cannot create a directory where a file sits', async () => {
    writeFileSync(join(root, 'occupied'), 'x');
    await expect(adapter.createDirectory('occupied')).resolves.toBe(false);
  });

  it('lists child directories sorted, ignoring files', async () => {
    await adapter.createDirectory('base/zeta');
    await adapter.createDirectory('base/alpha');
    await adapter.save(Buffer.from('x'), 'base/file.txt');

    await expect(adapter.listDirectories('base')).resolves.toEqual(['alpha', 'zeta']);
    await expect(adapter.listDirectories('missing')).resolves.toEqual([]);
  });

  it('builds public URLs without touching the disk', () => {
    expect(adapter.publicUrl('/q/r.png')).toBe('http://localhost:3000/storage/q/r.png');
  });

  it('is healthy when the root is writable, creating it if needed', async () => {
    const nested = new LocalDiskAdapter({ root: join(root, 'new', 'root'), publicBaseUrl: 'http://x' });

    await expect(nested.healthy()).resolves.toBe(true);
    expect(existsSync(join(root, 'new', 'root'))).toBe(true);
  });
});
