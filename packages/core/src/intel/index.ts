export type {
  PluginDefinition,
  PluginDescriptor,
  DescriptorDraft,
  DescriptorAlter,
  IntelPlugin,
  PluginFactory,
  PluginRegistration,
  FieldSnapshot,
  IntelEntry,
  IntelReport,
  ReportAlter,
  ExecutionMode,
  CollectOptions,
  PluginInfo,
} from './types.js';
export { BaseIntelPlugin, IntelPluginBuilder, createIntelPlugin } from './plugin-base.js';
export { IntelPluginRegistry, toDescriptor, DEFAULT_PLUGIN_PROVIDER } from './registry.js';
export type { RegisteredPlugin } from './registry.js';
export { IntelCollector, DEFAULT_PLUGIN_TIMEOUT_MS } from './collector.js';
export type { IntelCollectorOptions } from './collector.js';
export {
  mainPropertyOf,
  isItemEmpty,
  isFieldEmpty,
  extractItemValue,
  extractFieldValue,
  extractFieldData,
} from './field-values.js';
export {
  toIso8601,
  formatMediumDate,
  formatInterval,
  describeTimestamp,
  describeDuration,
  SECONDS_PER_DAY,
} from './format.js';
export { parseFilterList } from './filters.js';
export {
  normalizeKeywords,
  DEFAULT_SEARCH_QUERY_LIMIT,
  MAX_KEYWORDS_LENGTH,
} from './search-queries.js';
export type {
  ISearchQueryCollector,
  SearchQueryRow,
  SearchQuerySource,
  SearchTimestamp,
} from './search-queries.js';
export { ContentIntelService, DEFAULT_LIST_LIMIT, DEFAULT_BATCH_LIMIT } from './service.js';
export type { ContentIntelServiceDeps, BatchOptions } from './service.js';
