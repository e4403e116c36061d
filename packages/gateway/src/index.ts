/**
 * @content-intel/gateway
 *
 * HTTP API and PostgreSQL storage for Content Intel
 *
 * @packageDocumentation
 */

// App
export { createApp } from './app.js';
export { startServer } from './server.js';

// Types
export type {
  ApiResponse,
  ApiError,
  ResponseMeta,
  GatewayConfig,
  HealthCheck,
  HealthStatus,
} from './types/index.js';

// Middleware
export {
  requestId,
  timing,
  errorHandler,
  notFoundHandler,
  validateBody,
  batchRequestSchema,
  enabledPluginsSchema,
  searchLogSchema,
} from './middleware/index.js';

// Routes
export {
  healthRoutes,
  entityTypeRoutes,
  pluginsRoutes,
  settingsRoutes,
  entityRoutes,
  searchRoutes,
  ERROR_CODES,
  type ErrorCode,
} from './routes/index.js';

// Configuration
export { getServerConfig, getIntelRuntimeConfig, type IntelRuntimeConfig } from './config/env.js';

// Database
export {
  PostgresAdapter,
  getDatabaseConfig,
  initializeAdapter,
  closeAdapter,
  getAdapterSync,
  type DatabaseAdapter,
  type DatabaseConfig,
} from './db/adapters/index.js';
export { initializeSchema } from './db/schema.js';
export {
  EntitiesRepository,
  EntitySchemaRepository,
  SettingsRepository,
  StatisticsRepository,
  TranslationsRepository,
  SearchLogRepository,
} from './db/repositories/index.js';

// Services
export { LogService, createLogService, createLogServiceFromEnv } from './services/log-service-impl.js';
export {
  createIntelRuntime,
  startIntelRuntime,
  stopIntelRuntime,
  type IntelRuntime,
  type IntelRuntimeOptions,
} from './services/intel-runtime.js';
