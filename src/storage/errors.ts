import createError from '@fastify/error';

// Storage errors (STORAGE_*)

/** Missing/invalid credentials or an unusable backend. Absorbed by the manager. */
export const ConfigurationError = createError<[string]>(
  'STORAGE_CONFIGURATION',
  'Storage misconfigured: %s',
  500
);

/** Object or directory absent on the provider (404) */
export const NotFoundError = createError<[string]>(
  'STORAGE_NOT_FOUND',
  'Not found in storage: %s',
  404
);

/** Provider rejected the credentials. Never retried (502) */
export const AuthenticationError = createError<[string]>(
  'STORAGE_AUTHENTICATION',
  'Storage provider rejected credentials: %s',
  502
);

/** Network or 5xx failure that survived the retry budget (502) */
export const TransferError = createError<[string]>(
  'STORAGE_TRANSFER',
  'Storage transfer failed: %s',
  502
);

/** Provider-reported capacity or size limit (507) */
export const QuotaExceededError = createError<[string]>(
  'STORAGE_QUOTA_EXCEEDED',
  'Storage quota exceeded: %s',
  507
);

/** Logical path escapes the storage root or is empty (400) */
export const InvalidPathError = createError<[string]>(
  'STORAGE_INVALID_PATH',
  'Invalid storage path: %s',
  400
);

const STORAGE_ERROR_CODES = new Set([
  'STORAGE_CONFIGURATION',
  'STORAGE_NOT_FOUND',
  'STORAGE_AUTHENTICATION',
  'STORAGE_TRANSFER',
  'STORAGE_QUOTA_EXCEEDED',
  'STORAGE_INVALID_PATH',
]);

/**
 * True for any error created by the constructors above.
 */
export function isStorageError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    STORAGE_ERROR_CODES.has(error.code)
  );
}
