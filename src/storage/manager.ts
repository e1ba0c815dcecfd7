import type { FastifyBaseLogger } from 'fastify';

import { CloudDriveAdapter } from './cloud-drive/adapter.js';
import type { CloudDriveAdapterOptions, CloudDriveTuning } from './cloud-drive/adapter.js';
import type { DirectoryCacheStats } from './cloud-drive/directory-cache.js';
import type { StorageConfigStore } from './config-store.js';
import { InvalidPathError } from './errors.js';
import { LocalDiskAdapter } from './local-adapter.js';
import type { LocalDiskAdapterOptions } from './local-adapter.js';
import { ObjectStoreAdapter } from './object-store-adapter.js';
import type { ObjectStoreAdapterOptions } from './object-store-adapter.js';
import { encodePathSegments, slugify } from './paths.js';
import { DEFAULT_SUBFOLDERS, provisionHierarchy, verifyHierarchy } from './provisioning.js';
import type { ProvisionReport, VerifyReport } from './provisioning.js';
import { CloudDriveCredentialsSchema, ObjectStoreCredentialsSchema } from './registry.js';
import type {
  ConnectionDirectory,
  StorageConnection,
  TenantDirectory,
  TenantStorageOverride,
} from './registry.js';
import { parseBackendKind } from './types.js';
import type { BackendKind, ContentCategory, StorageAdapter } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FallbackReason =
  | 'tenant-lookup-failed'
  | 'connection-unavailable'
  | 'connection-inactive'
  | 'missing-credentials'
  | 'unknown-backend'
  | 'adapter-construction-failed';

/**
 * Outcome of routing one (tenant, category) pair.
 */
export interface ResolutionDecision {
  tenantId: string | null;
  category: ContentCategory;
  /** Where the requested backend came from */
  source: 'tenant' | 'global';
  /** Backend string as configured, before parsing */
  requested: string;
  /** Backend actually serving requests */
  backend: BackendKind;
  connectionId: string | null;
  fallbackReason: FallbackReason | null;
}

interface ResolvedAdapter {
  adapter: StorageAdapter;
  decision: ResolutionDecision;
}

interface CacheEntry {
  tenantId: string | null;
  category: ContentCategory;
  resolved: Promise<ResolvedAdapter>;
  /** Delegated operations still running on this adapter */
  inFlight: number;
  /** Evicted from the cache; closed once inFlight drops to 0 */
  retired: boolean;
  closing?: Promise<void>;
}

/** Adapter constructors; tests substitute ones wired to in-process fakes. */
export interface AdapterFactories {
  local(options: LocalDiskAdapterOptions): StorageAdapter;
  objectStore(options: ObjectStoreAdapterOptions): StorageAdapter;
  cloudDrive(options: CloudDriveAdapterOptions): StorageAdapter;
}

export const defaultAdapterFactories: AdapterFactories = {
  local: (options) => new LocalDiskAdapter(options),
  objectStore: (options) => new ObjectStoreAdapter(options),
  cloudDrive: (options) => new CloudDriveAdapter(options),
};

export interface StorageManagerOptions {
  config: StorageConfigStore;
  /** Root directory of the local-disk backend */
  localRoot: string;
  /** Externally reachable base URL of this service */
  publicBaseUrl: string;
  tenants: TenantDirectory;
  connections: ConnectionDirectory;
  logger: FastifyBaseLogger;
  factories?: Partial<AdapterFactories>;
}

type ResolutionContext = Pick<ResolutionDecision, 'tenantId' | 'category' | 'source' | 'requested' | 'connectionId'>;

const GLOBAL_SCOPE = '*';

function cacheKey(tenantId: string | null, category: ContentCategory): string {
  return `${tenantId ?? GLOBAL_SCOPE}::${category}`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled backend kind: ${String(value)}`);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// StorageManager
// ---------------------------------------------------------------------------

/**
 * Routes storage operations to an adapter per (tenant, category).
 *
 * Resolution never fails: any misconfiguration degrades to the local-disk
 * adapter and is logged at warn. Resolved adapters are cached until
 * invalidate() or reload().
 */
export class StorageManager {
  private readonly config: StorageConfigStore;
  private readonly tenants: TenantDirectory;
  private readonly connections: ConnectionDirectory;
  private readonly log: FastifyBaseLogger;
  private readonly factories: AdapterFactories;
  private readonly publicBaseUrl: string;
  private readonly local: StorageAdapter;
  private readonly adapters = new Map<string, CacheEntry>();

  constructor(options: StorageManagerOptions) {
    this.config = options.config;
    this.tenants = options.tenants;
    this.connections = options.connections;
    this.log = options.logger;
    this.factories = { ...defaultAdapterFactories, ...options.factories };
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
    this.local = this.factories.local({
      root: options.localRoot,
      publicBaseUrl: `${this.publicBaseUrl}/storage`,
    });
  }

  // ---- Content operations ----

  async save(data: Buffer, path: string, category: ContentCategory, tenantId?: string): Promise<string> {
    return this.withAdapter(category, tenantId, (adapter) => adapter.save(data, path));
  }

  async get(path: string, category: ContentCategory, tenantId?: string): Promise<Buffer> {
    return this.withAdapter(category, tenantId, (adapter) => adapter.get(path));
  }

  async delete(path: string, category: ContentCategory, tenantId?: string): Promise<boolean> {
    return this.withAdapter(category, tenantId, (adapter) => adapter.delete(path));
  }

  async exists(path: string, category: ContentCategory, tenantId?: string): Promise<boolean> {
    return this.withAdapter(category, tenantId, (adapter) => adapter.exists(path));
  }

  async publicUrl(path: string, category: ContentCategory, tenantId?: string): Promise<string> {
    const { adapter } = await this.adapterFor(category, tenantId);
    return adapter.publicUrl(path);
  }

  /**
   * The routing decision for a (tenant, category) pair.
   */
  async describe(category: ContentCategory, tenantId?: string): Promise<ResolutionDecision> {
    const { decision } = await this.adapterFor(category, tenantId);
    return { ...decision };
  }

  // ---- Provisioning ----

  async provision(
    tenantId: string,
    categories: readonly ContentCategory[],
    subfolders: readonly string[] = DEFAULT_SUBFOLDERS
  ): Promise<ProvisionReport> {
    const tenantSlug = this.tenantSlug(tenantId);
    const report: ProvisionReport = { tenantId, tenantSlug, success: true, categories: {} };

    this.log.info({ tenantId, tenantSlug, categories }, 'Provisioning tenant storage hierarchy');

    for (const category of categories) {
      const result = await this.withAdapter(category, tenantId, (adapter) =>
        provisionHierarchy(adapter, `${tenantSlug}/${category}`, subfolders, this.log)
      );
      report.categories[category] = result;
      if (!result.ok) report.success = false;
    }

    this.log.info({ tenantId, success: report.success }, 'Tenant storage provisioning finished');
    return report;
  }

  async verify(tenantId: string, categories: readonly ContentCategory[]): Promise<VerifyReport> {
    const tenantSlug = this.tenantSlug(tenantId);
    const report: VerifyReport = { tenantId, tenantSlug, allExist: true, categories: {} };

    for (const category of categories) {
      const result = await this.withAdapter(category, tenantId, (adapter) =>
        verifyHierarchy(adapter, `${tenantSlug}/${category}`)
      );
      report.categories[category] = result;
      if (!result.exists) report.allExist = false;
    }

    return report;
  }

  // ---- Cache management ----

  /**
   * Drop cached adapters for a scope. New lookups resolve afresh at once;
   * an evicted adapter is closed when its running operations have finished.
   *
   * tenant + category: that pair. tenant: all its categories. category: that
   * category for every tenant and the global scope. Neither: everything.
   */
  async invalidate(tenantId?: string, category?: ContentCategory): Promise<number> {
    const evicted: CacheEntry[] = [];

    for (const [key, entry] of this.adapters) {
      if (!this.inScope(entry, tenantId, category)) continue;
      this.adapters.delete(key);
      entry.retired = true;
      evicted.push(entry);
    }

    await Promise.all(evicted.filter((entry) => entry.inFlight === 0).map((entry) => this.closeEvicted(entry)));

    if (evicted.length > 0) {
      this.log.info(
        { tenantId: tenantId ?? null, category: category ?? null, removed: evicted.length },
        'Storage adapters invalidated'
      );
    }
    return evicted.length;
  }

  /**
   * Re-read the configuration file and drop every cached adapter.
   */
  async reload(): Promise<number> {
    this.config.reload();
    return this.invalidate();
  }

  /** Directory cache statistics of every cached cloud-drive adapter. */
  async directoryCacheStats(): Promise<Record<string, DirectoryCacheStats>> {
    const stats: Record<string, DirectoryCacheStats> = {};
    for (const [key, entry] of this.adapters) {
      const { adapter } = await entry.resolved;
      if (adapter instanceof CloudDriveAdapter) {
        stats[key] = adapter.cacheStats();
      }
    }
    return stats;
  }

  async clearDirectoryCaches(tenantId?: string, category?: ContentCategory): Promise<number> {
    let cleared = 0;
    for (const entry of this.adapters.values()) {
      if (!this.inScope(entry, tenantId, category)) continue;
      const { adapter } = await entry.resolved;
      if (adapter instanceof CloudDriveAdapter) {
        adapter.clearDirectoryCache();
        cleared++;
      }
    }
    return cleared;
  }

  /** Read straight from the local-disk backend (serves its public URLs). */
  async getLocal(path: string): Promise<Buffer> {
    return this.local.get(path);
  }

  /** Local-disk liveness, used by the health route. */
  async localHealthy(): Promise<boolean> {
    return this.local.healthy();
  }

  async close(): Promise<void> {
    await this.invalidate();
    await this.local.close();
  }

  // ---- Resolution ----

  private adapterFor(category: ContentCategory, tenantId?: string): Promise<ResolvedAdapter> {
    return this.entryFor(category, tenantId).resolved;
  }

  private entryFor(category: ContentCategory, tenantId?: string): CacheEntry {
    const tenant = tenantId ?? null;
    const key = cacheKey(tenant, category);

    const cached = this.adapters.get(key);
    if (cached) return cached;

    const entry: CacheEntry = {
      tenantId: tenant,
      category,
      resolved: this.resolve(category, tenant),
      inFlight: 0,
      retired: false,
    };
    this.adapters.set(key, entry);
    return entry;
  }

  /** Run one operation on the resolved adapter, holding it open until done. */
  private async withAdapter<T>(
    category: ContentCategory,
    tenantId: string | undefined,
    operation: (adapter: StorageAdapter) => Promise<T>
  ): Promise<T> {
    const entry = this.entryFor(category, tenantId);
    entry.inFlight++;
    try {
      const { adapter } = await entry.resolved;
      return await operation(adapter);
    } finally {
      entry.inFlight--;
      if (entry.retired && entry.inFlight === 0) {
        // Stored on the entry; closeEvicted never rejects
        entry.closing = this.closeEvicted(entry);
      }
    }
  }

  private async resolve(category: ContentCategory, tenantId: string | null): Promise<ResolvedAdapter> {
    if (tenantId !== null) {
      let override: TenantStorageOverride | null;
      try {
        override = await this.tenants.getTenant(tenantId);
      } catch (error) {
        return this.fallback(
          { tenantId, category, source: 'tenant', requested: 'unknown', connectionId: null },
          'tenant-lookup-failed',
          error
        );
      }
      if (override) {
        return this.resolveTenant(category, tenantId, override);
      }
    }
    return this.resolveGlobal(category, tenantId);
  }

  private async resolveTenant(
    category: ContentCategory,
    tenantId: string,
    override: TenantStorageOverride
  ): Promise<ResolvedAdapter> {
    const context: ResolutionContext = {
      tenantId,
      category,
      source: 'tenant',
      requested: override.backend,
      connectionId: override.connectionId,
    };

    const kind = parseBackendKind(override.backend);
    if (kind === null) return this.fallback(context, 'unknown-backend');
    if (kind === 'local') return this.useLocal(context);

    if (override.connectionId === null) {
      return this.fallback(context, 'connection-unavailable');
    }

    let connection: StorageConnection | null;
    try {
      connection = await this.connections.getConnection(override.connectionId);
    } catch (error) {
      return this.fallback(context, 'connection-unavailable', error);
    }
    if (!connection) return this.fallback(context, 'connection-unavailable');
    if (!connection.isActive) return this.fallback(context, 'connection-inactive');

    try {
      return this.resolved(this.buildFromConnection(kind, connection, override, category, tenantId), context);
    } catch (error) {
      return this.fallback(context, 'adapter-construction-failed', error);
    }
  }

  private resolveGlobal(category: ContentCategory, tenantId: string | null): ResolvedAdapter {
    const requested = this.config.getBackend(category);
    const context: ResolutionContext = { tenantId, category, source: 'global', requested, connectionId: null };

    const kind = parseBackendKind(requested);
    if (kind === null) return this.fallback(context, 'unknown-backend');

    switch (kind) {
      case 'local':
        return this.useLocal(context);

      case 'cloud-drive': {
        const token = this.config.getCloudDriveToken();
        if (token.length === 0) return this.fallback(context, 'missing-credentials');
        try {
          const adapter = this.factories.cloudDrive({
            oauthToken: token,
            basePath: this.config.getCloudDriveCategory(category).basePath,
            tuning: this.tuning(),
            logger: this.log,
            linkBuilder: this.linkBuilder(category, tenantId),
          });
          return this.resolved(adapter, context);
        } catch (error) {
          return this.fallback(context, 'adapter-construction-failed', error);
        }
      }

      case 'object-store': {
        const settings = this.config.getObjectStore();
        try {
          const adapter = this.factories.objectStore({
            endpoint: settings.endpoint,
            accessKey: settings.accessKey,
            secretKey: settings.secretKey,
            bucket: settings.bucket,
            secure: settings.secure,
            region: settings.region,
            publicBaseUrl: settings.publicBaseUrl || undefined,
            maxAttempts: this.config.getTransfer().maxRetries + 1,
            logger: this.log,
          });
          return this.resolved(adapter, context);
        } catch (error) {
          return this.fallback(context, 'adapter-construction-failed', error);
        }
      }

      default:
        return assertNever(kind);
    }
  }

  /**
   * Build a remote adapter from a tenant's connection. Throws on invalid
   * credentials; the caller turns that into a fallback.
   */
  private buildFromConnection(
    kind: Exclude<BackendKind, 'local'>,
    connection: StorageConnection,
    override: TenantStorageOverride,
    category: ContentCategory,
    tenantId: string
  ): StorageAdapter {
    switch (kind) {
      case 'cloud-drive': {
        const credentials = CloudDriveCredentialsSchema.parse(connection.credentials);
        return this.factories.cloudDrive({
          oauthToken: credentials.oauthToken,
          basePath:
            override.rootFolderId ??
            credentials.basePath ??
            this.config.getCloudDriveCategory(category).basePath,
          tuning: this.tuning(),
          logger: this.log,
          linkBuilder: this.linkBuilder(category, tenantId),
        });
      }

      case 'object-store': {
        const credentials = ObjectStoreCredentialsSchema.parse(connection.credentials);
        return this.factories.objectStore({
          ...credentials,
          keyPrefix: override.rootFolderId ?? undefined,
          maxAttempts: this.config.getTransfer().maxRetries + 1,
          logger: this.log,
        });
      }

      default:
        return assertNever(kind);
    }
  }

  private useLocal(context: ResolutionContext): ResolvedAdapter {
    return this.resolved(this.local, context);
  }

  private resolved(adapter: StorageAdapter, context: ResolutionContext): ResolvedAdapter {
    this.log.info(
      { tenantId: context.tenantId, category: context.category, backend: adapter.kind, source: context.source },
      'Storage adapter resolved'
    );
    return { adapter, decision: { ...context, backend: adapter.kind, fallbackReason: null } };
  }

  private fallback(context: ResolutionContext, reason: FallbackReason, error?: unknown): ResolvedAdapter {
    this.log.warn(
      {
        tenantId: context.tenantId,
        category: context.category,
        requestedBackend: context.requested,
        connectionId: context.connectionId,
        reason,
        ...(error === undefined ? {} : { err: messageOf(error) }),
      },
      'Storage backend unavailable, falling back to local disk'
    );
    return { adapter: this.local, decision: { ...context, backend: 'local', fallbackReason: reason } };
  }

  // ---- Helpers ----

  private tuning(): CloudDriveTuning {
    const transfer = this.config.getTransfer();
    return {
      requestTimeoutMs: transfer.requestTimeoutMs,
      chunkSizeBytes: Math.max(1, Math.round(transfer.chunkSizeMb * 1024 * 1024)),
      uploadConcurrency: transfer.uploadConcurrency,
      maxRetries: transfer.maxRetries,
      retryBaseDelayMs: transfer.retryBaseDelayMs,
      cacheTtlSeconds: transfer.cacheTtlSeconds,
      cacheMaxSize: transfer.cacheMaxSize,
      poolConnections: transfer.poolConnections,
      poolMaxSize: transfer.poolMaxSize,
    };
  }

  /** Cloud-drive content is served back through this service's /files route. */
  private linkBuilder(category: ContentCategory, tenantId: string | null): (path: string) => string {
    const query = tenantId === null ? '' : `?tenantId=${encodeURIComponent(tenantId)}`;
    return (path) => `${this.publicBaseUrl}/files/${category}/${encodePathSegments(path)}${query}`;
  }

  private tenantSlug(tenantId: string): string {
    const slug = slugify(tenantId);
    if (slug.length === 0) throw new InvalidPathError(tenantId);
    return slug;
  }

  private inScope(entry: CacheEntry, tenantId: string | undefined, category: ContentCategory | undefined): boolean {
    if (tenantId !== undefined && entry.tenantId !== tenantId) return false;
    if (category !== undefined && entry.category !== category) return false;
    return true;
  }

  /** Never rejects: a failed close is logged. */
  private closeEvicted(entry: CacheEntry): Promise<void> {
    entry.closing ??= (async () => {
      try {
        const { adapter } = await entry.resolved;
        if (adapter === this.local) return;
        await adapter.close();
      } catch (error) {
        this.log.warn(
          { tenantId: entry.tenantId, category: entry.category, err: messageOf(error) },
          'Failed to close evicted storage adapter'
        );
      }
    })();
    return entry.closing;
  }
}
