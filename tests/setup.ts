// Storage environment overrides on the developer's machine must not leak
// into tests; every test that wants one passes its own env object.
const STORAGE_ENV_VARS = [
  'CONFIG_PATH',
  'STORAGE_BACKEND',
  'OBJECT_STORE_ENDPOINT',
  'OBJECT_STORE_ACCESS_KEY',
  'OBJECT_STORE_SECRET_KEY',
  'OBJECT_STORE_BUCKET',
  'OBJECT_STORE_SECURE',
  'CLOUD_DRIVE_REQUEST_TIMEOUT',
  'CLOUD_DRIVE_CHUNK_SIZE_MB',
  'CLOUD_DRIVE_UPLOAD_CONCURRENCY',
  'CLOUD_DRIVE_DIRECTORY_CACHE_TTL',
  'CLOUD_DRIVE_DIRECTORY_CACHE_SIZE',
  'CLOUD_DRIVE_SESSION_POOL_CONNECTIONS',
  'CLOUD_DRIVE_SESSION_POOL_MAXSIZE',
];

for (const name of STORAGE_ENV_VARS) {
  delete process.env[name];
}
