// Tenant and connection lookups consumed by the storage manager, plus a
// static implementation backed by the service configuration file.

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

/**
 * Per-tenant routing override. `backend` is kept as the raw registry string;
 * the manager parses it so unrecognized values fall back instead of failing.
 */
export interface TenantStorageOverride {
  backend: string;
  connectionId: string | null;
  /** Remote root folder (cloud drive) or key prefix (object store) */
  rootFolderId: string | null;
}

export interface StorageConnection {
  id: string;
  isActive: boolean;
  /** Provider-specific; validated when an adapter is built from it */
  credentials: Record<string, unknown>;
}

export interface TenantDirectory {
  /** Resolves null for an unknown tenant. */
  getTenant(tenantId: string): Promise<TenantStorageOverride | null>;
}

export interface ConnectionDirectory {
  /** Resolves null for an unknown connection. */
  getConnection(connectionId: string): Promise<StorageConnection | null>;
}

// ---------------------------------------------------------------------------
// Credential schemas
// ---------------------------------------------------------------------------

export const CloudDriveCredentialsSchema = z.object({
  oauthToken: z.string().min(1),
  basePath: z.string().optional(),
});

export const ObjectStoreCredentialsSchema = z.object({
  endpoint: z.string().min(1),
  accessKey: z.string().min(1),
  secretKey: z.string().min(1),
  bucket: z.string().min(1),
  secure: z.boolean().optional(),
  region: z.string().optional(),
  publicBaseUrl: z.string().optional(),
});

export type CloudDriveCredentials = z.infer<typeof CloudDriveCredentialsSchema>;
export type ObjectStoreCredentials = z.infer<typeof ObjectStoreCredentialsSchema>;

// ---------------------------------------------------------------------------
// Static registry
// ---------------------------------------------------------------------------

export const RegistrySchema = z.object({
  tenants: z
    .array(
      z.object({
        id: z.string().min(1),
        backend: z.string().default('local'),
        connectionId: z.string().nullable().default(null),
        rootFolderId: z.string().nullable().default(null),
      })
    )
    .default([]),
  connections: z
    .array(
      z.object({
        id: z.string().min(1),
        isActive: z.boolean().default(true),
        credentials: z.record(z.string(), z.unknown()).default({}),
      })
    )
    .default([]),
});

export type RegistryConfig = z.infer<typeof RegistrySchema>;

/**
 * In-memory tenant and connection directory.
 */
export class StaticRegistry implements TenantDirectory, ConnectionDirectory {
  private readonly tenants = new Map<string, TenantStorageOverride>();
  private readonly connections = new Map<string, StorageConnection>();

  constructor(config: RegistryConfig = { tenants: [], connections: [] }) {
    for (const tenant of config.tenants) {
      this.tenants.set(tenant.id, {
        backend: tenant.backend,
        connectionId: tenant.connectionId,
        rootFolderId: tenant.rootFolderId,
      });
    }
    for (const connection of config.connections) {
      this.connections.set(connection.id, { ...connection });
    }
  }

  async getTenant(tenantId: string): Promise<TenantStorageOverride | null> {
    const tenant = this.tenants.get(tenantId);
    return tenant ? { ...tenant } : null;
  }

  async getConnection(connectionId: string): Promise<StorageConnection | null> {
    const connection = this.connections.get(connectionId);
    return connection ? { ...connection, credentials: { ...connection.credentials } } : null;
  }

  upsertTenant(tenantId: string, override: TenantStorageOverride): void {
    this.tenants.set(tenantId, { ...override });
  }

  upsertConnection(connection: StorageConnection): void {
    this.connections.set(connection.id, { ...connection });
  }
}
