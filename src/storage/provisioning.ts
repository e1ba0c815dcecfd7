// Tenant folder hierarchy creation and verification on a single adapter.

import type { FastifyBaseLogger } from 'fastify';

import { joinLogicalPath } from './paths.js';
import type { BackendKind, ContentCategory, StorageAdapter } from './types.js';

/** Folders created under every <tenant>/<category> directory unless told otherwise */
export const DEFAULT_SUBFOLDERS: readonly string[] = ['images', 'qr', 'markers', 'marker-cache'];

export interface CategoryProvisionResult {
  backend: BackendKind;
  basePath: string;
  ok: boolean;
  created: string[];
  failed: string[];
  error?: string;
}

export interface ProvisionReport {
  tenantId: string;
  tenantSlug: string;
  success: boolean;
  categories: Partial<Record<ContentCategory, CategoryProvisionResult>>;
}

export interface CategoryVerifyResult {
  backend: BackendKind;
  basePath: string;
  exists: boolean;
  error?: string;
}

export interface VerifyReport {
  tenantId: string;
  tenantSlug: string;
  allExist: boolean;
  categories: Partial<Record<ContentCategory, CategoryVerifyResult>>;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create `basePath` and each subfolder beneath it. Failures are collected
 * rather than thrown.
 */
export async function provisionHierarchy(
  adapter: StorageAdapter,
  basePath: string,
  subfolders: readonly string[],
  log: FastifyBaseLogger
): Promise<CategoryProvisionResult> {
  const result: CategoryProvisionResult = {
    backend: adapter.kind,
    basePath,
    ok: true,
    created: [],
    failed: [],
  };

  const targets = [basePath, ...subfolders.map((name) => `${basePath}/${name}`)];
  for (const target of targets) {
    try {
      const path = joinLogicalPath(target);
      if (await adapter.createDirectory(path)) {
        result.created.push(path);
      } else {
        result.failed.push(path);
      }
    } catch (error) {
      result.failed.push(target);
      result.error ??= messageOf(error);
      log.error({ backend: adapter.kind, path: target, err: messageOf(error) }, 'Folder provisioning failed');
    }
  }

  result.ok = result.failed.length === 0;
  return result;
}

export async function verifyHierarchy(
  adapter: StorageAdapter,
  basePath: string
): Promise<CategoryVerifyResult> {
  try {
    return { backend: adapter.kind, basePath, exists: await adapter.directoryExists(basePath) };
  } catch (error) {
    return { backend: adapter.kind, basePath, exists: false, error: messageOf(error) };
  }
}
