/**
 * Service Tokens - Typed keys for ServiceRegistry
 *
 * Usage:
 *   import { Services } from '@content-intel/core';
 *   const log = registry.get(Services.Log);      // typed as ILogService
 *   const intel = registry.get(Services.Intel);  // typed as ContentIntelService
 */

import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';
import type { IConfigStore } from './config-store.js';
import type { IEntityStore, ISchemaIntrospection } from '../entities/types.js';
import type { ContentIntelService } from '../intel/service.js';
import type { ISearchQueryCollector } from '../intel/search-queries.js';

export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),

  /** Persisted settings (enabled-plugin allow-list) */
  Config: new ServiceToken<IConfigStore>('config'),

  /** Entity loading and listing */
  Entities: new ServiceToken<IEntityStore>('entities'),

  /** Entity type, bundle and field definitions */
  Schema: new ServiceToken<ISchemaIntrospection>('schema'),

  /** Search log analysis */
  SearchQueries: new ServiceToken<ISearchQueryCollector>('search-queries'),

  /** Intel facade used by routes and CLI commands */
  Intel: new ServiceToken<ContentIntelService>('intel'),
} as const;
