export { CloudDriveAdapter, DEFAULT_API_BASE_URL } from './adapter.js';
export type { CloudDriveAdapterOptions, CloudDriveTuning, DiskInfo } from './adapter.js';
export { ChunkTransfer, runChunkedTransfer } from './chunk-transfer.js';
export type { ChunkRange } from './chunk-transfer.js';
export { DirectoryCache, normalizeCacheKey } from './directory-cache.js';
export type { DirectoryCacheOptions, DirectoryCacheStats } from './directory-cache.js';
export { DriveHttpError, isRetryableError, withRetry } from './retry.js';
export type { RetryPolicy } from './retry.js';
export { DriveSession } from './session.js';
export type { HttpMethod, HttpRequest, HttpResponse, HttpSession } from './session.js';
