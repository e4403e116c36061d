export { listTypes, listBundles, listFields, type FormatOptions } from './schema.js';
export { listPlugins } from './plugins.js';
export {
  listEntities,
  showEntityIntel,
  showEntitySummary,
  batchIntel,
  type ListOptions,
  type IntelOptions,
  type BatchCommandOptions,
} from './entities.js';
export { topQueries, contentGaps, type SearchOptions, type GapOptions } from './search.js';
export { settingsShow, settingsPlugins, settingsReset } from './settings.js';
export { serverStart, type ServerOptions } from './server.js';
