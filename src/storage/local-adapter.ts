// Local filesystem storage adapter.
//
// Resolves logical paths under a root directory. This is the fallback of last
// resort, so construction performs no I/O and cannot fail on configuration;
// only genuine filesystem errors (disk full, permissions) reach the caller.

import { constants } from 'node:fs';
import { access, mkdir, readdir, readFile, rmdir, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';

import { InvalidPathError, NotFoundError } from './errors.js';
import { encodePathSegments, normalizeLogicalPath, requireFilePath } from './paths.js';
import type { BackendKind, StorageAdapter } from './types.js';

export interface LocalDiskAdapterOptions {
  /** Directory all logical paths resolve under */
  root: string;
  /** Base URL the service serves the root from (e.g. "http://localhost:3000/storage") */
  publicBaseUrl: string;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

export class LocalDiskAdapter implements StorageAdapter {
  readonly kind: BackendKind = 'local';
  private readonly root: string;
  private readonly publicBaseUrl: string;

  constructor(options: LocalDiskAdapterOptions) {
    this.root = resolve(options.root);
    // Strip trailing slash
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
  }

  async save(data: Buffer, logicalPath: string): Promise<string> {
    const relative = requireFilePath(logicalPath);
    const fullPath = this.resolvePath(relative);
    try {
      await this.writeWithParents(fullPath, data);
    } catch (error) {
      // A concurrent delete can prune the parent between mkdir and write
      if (errnoCode(error) !== 'ENOENT') throw error;
      await this.writeWithParents(fullPath, data);
    }
    return this.publicUrl(relative);
  }

  async get(logicalPath: string): Promise<Buffer> {
    const relative = requireFilePath(logicalPath);
    try {
      return await readFile(this.resolvePath(relative));
    } catch (error) {
      const code = errnoCode(error);
      if (code !== undefined && (MISSING_CODES.has(code) || code === 'EISDIR')) {
        throw new NotFoundError(relative);
      }
      throw error;
    }
  }

  async delete(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    const fullPath = this.resolvePath(relative);

    try {
      await unlink(fullPath);
    } catch (error) {
      const code = errnoCode(error);
      // EISDIR on Linux, EPERM on macOS when the path is a directory
      if (code !== undefined && (MISSING_CODES.has(code) || code === 'EISDIR' || code === 'EPERM')) {
        return false;
      }
      throw error;
    }

    await this.pruneEmptyParents(dirname(fullPath));
    return true;
  }

  async exists(logicalPath: string): Promise<boolean> {
    const relative = requireFilePath(logicalPath);
    try {
      const info = await stat(this.resolvePath(relative));
      return info.isFile();
    } catch (error) {
      const code = errnoCode(error);
      if (code !== undefined && MISSING_CODES.has(code)) return false;
      throw error;
    }
  }

  publicUrl(logicalPath: string): string {
    const relative = normalizeLogicalPath(logicalPath);
    return `${this.publicBaseUrl}/${encodePathSegments(relative)}`;
  }

  async createDirectory(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(normalizeLogicalPath(path));
    try {
      await mkdir(fullPath, { recursive: true });
      return true;
    } catch (error) {
      const code = errnoCode(error);
      // A file already occupies the path or one of its parents
      if (code === 'EEXIST' || code === 'ENOTDIR') return false;
      throw error;
    }
  }

  async directoryExists(path: string): Promise<boolean> {
    try {
      const info = await stat(this.resolvePath(normalizeLogicalPath(path)));
      return info.isDirectory();
    } catch (error) {
      const code = errnoCode(error);
      if (code !== undefined && MISSING_CODES.has(code)) return false;
      throw error;
    }
  }

  async listDirectories(basePath: string): Promise<string[]> {
    const fullPath = this.resolvePath(normalizeLogicalPath(basePath));
    try {
      const entries = await readdir(fullPath, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      const code = errnoCode(error);
      if (code !== undefined && MISSING_CODES.has(code)) return [];
      throw error;
    }
  }

  async healthy(): Promise<boolean> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    // Nothing pooled
  }

  /**
   * Absolute location of a normalized logical path. The root itself is '' .
   */
  private resolvePath(relative: string): string {
    const fullPath = relative.length === 0 ? this.root : join(this.root, relative);
    if (fullPath !== this.root && !fullPath.startsWith(this.root + sep)) {
      throw new InvalidPathError(relative);
    }
    return fullPath;
  }

  private async writeWithParents(fullPath: string, data: Buffer): Promise<void> {
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  /**
   * Remove directories left empty by a delete, walking up to (not including) the root.
   */
  private async pruneEmptyParents(startDir: string): Promise<void> {
    let current = startDir;
    while (current !== this.root && current.startsWith(this.root + sep)) {
      try {
        const entries = await readdir(current);
        if (entries.length > 0) break;
        await rmdir(current);
      } catch {
        // Raced with a concurrent write or already gone
        break;
      }
      current = dirname(current);
    }
  }
}
