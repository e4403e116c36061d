/**
 * Gateway Default Configuration
 *
 * Named constants for tunable infrastructure values.
 * Import these instead of using inline magic numbers.
 *
 * Override via environment variables where noted.
 */

// ============================================================================
// Database
// ============================================================================

/** Maximum number of connections in the Postgres pool (POSTGRES_POOL_SIZE) */
export const DB_POOL_MAX = 10;

/** Idle connection timeout before closing (ms) */
export const DB_IDLE_TIMEOUT_MS = 30_000;

/** Connection acquisition timeout (ms) */
export const DB_CONNECT_TIMEOUT_MS = 5_000;

export const DB_DEFAULT_HOST = 'localhost';
export const DB_DEFAULT_PORT = 5432;
export const DB_DEFAULT_USER = 'content_intel';
export const DB_DEFAULT_NAME = 'content_intel';

// ============================================================================
// HTTP
// ============================================================================

/** PORT */
export const HTTP_DEFAULT_PORT = 8080;

/** HOST */
export const HTTP_DEFAULT_HOST = '127.0.0.1';

/** Maximum request body size (bytes) */
export const HTTP_BODY_LIMIT_BYTES = 1024 * 1024; // 1 MB

/** CORS preflight cache (seconds) */
export const CORS_MAX_AGE_SECONDS = 86_400;

// ============================================================================
// Intel
// ============================================================================

/** Per-plugin collect() budget (INTEL_PLUGIN_TIMEOUT_MS); 0 disables it */
export const INTEL_PLUGIN_TIMEOUT_MS = 5_000;

/** Upper bound for list and batch sizes accepted over HTTP */
export const MAX_PAGE_SIZE = 500;

/** Upper bound for ids in one batch request */
export const MAX_BATCH_IDS = 100;

/** Base URL used to turn `public://` file URIs into links (FILES_BASE_URL) */
export const FILES_DEFAULT_BASE_URL = '/sites/default/files';

// ============================================================================
// Shutdown
// ============================================================================

/** Force exit if graceful shutdown hangs (ms) */
export const SHUTDOWN_TIMEOUT_MS = 5_000;
