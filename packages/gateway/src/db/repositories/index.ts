/**
 * Repository exports
 */

export { BaseRepository } from './base.js';
export { EntitiesRepository, fileUrl } from './entities.js';
export { EntitySchemaRepository } from './entity-schema.js';
export { SettingsRepository } from './settings.js';
export { StatisticsRepository } from './statistics.js';
export { TranslationsRepository } from './translations.js';
export { SearchLogRepository, SEARCH_LOG_TABLE, SEARCH_API_LOG_TABLE } from './search-log.js';
