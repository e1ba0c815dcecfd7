import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Request errors (REQUEST_*)
export const RequestInvalidError = createError<[string]>(
  'REQUEST_INVALID',
  'Invalid request: %s',
  400
);

// Storage errors (STORAGE_*) - re-exported from storage domain
export {
  ConfigurationError,
  NotFoundError,
  AuthenticationError,
  TransferError,
  QuotaExceededError,
  InvalidPathError,
} from '../storage/errors.js';

// Type for all application errors
export type AppError =
  | typeof ConfigInvalidError
  | typeof ConfigMissingError
  | typeof ConfigParseError
  | typeof ServerStartError
  | typeof RequestInvalidError;
