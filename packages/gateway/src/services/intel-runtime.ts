/**
 * Intel runtime bootstrap
 *
 * Builds the PostgreSQL-backed collaborators, registers the built-in
 * plugins against whatever optional sources the database has, and fills
 * the global ServiceRegistry. Shared by the HTTP server and the CLI.
 */

import {
  ContentIntelService,
  IntelCollector,
  IntelPluginRegistry,
  Services,
  initServiceRegistry,
  registerBuiltinPlugins,
  resetServiceRegistry,
  type Clock,
  type ServiceRegistry,
} from '@content-intel/core';
import { getDatabaseConfig, type DatabaseAdapter } from '../db/adapters/types.js';
import { closeAdapter, initializeAdapter } from '../db/adapters/index.js';
import {
  EntitiesRepository,
  EntitySchemaRepository,
  SearchLogRepository,
  SettingsRepository,
  StatisticsRepository,
  TranslationsRepository,
} from '../db/repositories/index.js';
import { getIntelRuntimeConfig } from '../config/env.js';
import { createLogServiceFromEnv } from './log-service-impl.js';
import { getLog } from './log.js';

const log = getLog('IntelRuntime');

export interface IntelRuntimeOptions {
  adapter: DatabaseAdapter;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
  /** Defaults to a fresh global registry */
  services?: ServiceRegistry;
}

export interface IntelRuntime {
  services: ServiceRegistry;
  plugins: IntelPluginRegistry;
  collector: IntelCollector;
  intel: ContentIntelService;
  /** Optional sources found in the database */
  sources: { statistics: boolean; translations: boolean };
}

export async function createIntelRuntime(options: IntelRuntimeOptions): Promise<IntelRuntime> {
  const env = options.env ?? process.env;
  const { adapter } = options;
  const services = options.services ?? initServiceRegistry();

  services.register(Services.Log, createLogServiceFromEnv(env));

  const runtimeConfig = getIntelRuntimeConfig(env);
  const config = new SettingsRepository(adapter);
  const entities = new EntitiesRepository(adapter, runtimeConfig.filesBaseUrl);
  const schema = new EntitySchemaRepository(adapter);
  const searchQueries = new SearchLogRepository(adapter, options.clock);

  const statistics = new StatisticsRepository(adapter);
  const hasStatistics = await statistics.isInstalled();

  const translations = new TranslationsRepository(adapter);
  const hasTranslations = await translations.isInstalled();
  if (hasTranslations) {
    await translations.refresh();
  }

  const plugins = new IntelPluginRegistry();
  registerBuiltinPlugins(plugins, {
    statistics: hasStatistics ? statistics : null,
    translations: hasTranslations ? translations : null,
    clock: options.clock,
  });

  const collector = new IntelCollector({
    registry: plugins,
    config,
    timeoutMs: runtimeConfig.timeoutMs,
    mode: runtimeConfig.mode,
  });
  const intel = new ContentIntelService({ registry: plugins, collector, entities, schema, config, searchQueries });

  services.register(Services.Config, config);
  services.register(Services.Entities, entities);
  services.register(Services.Schema, schema);
  services.register(Services.SearchQueries, searchQueries);
  services.register(Services.Intel, intel);

  log.info('Intel runtime ready', {
    plugins: plugins.listDescriptors().size,
    statistics: hasStatistics,
    translations: hasTranslations,
    mode: runtimeConfig.mode,
    timeoutMs: runtimeConfig.timeoutMs,
  });

  return {
    services,
    plugins,
    collector,
    intel,
    sources: { statistics: hasStatistics, translations: hasTranslations },
  };
}

/**
 * Connect the global adapter, then bootstrap on top of it.
 */
export async function startIntelRuntime(env: NodeJS.ProcessEnv = process.env): Promise<IntelRuntime> {
  const adapter = await initializeAdapter(getDatabaseConfig(env));
  return createIntelRuntime({ adapter, env });
}

/**
 * Drop registered services, then close the global adapter.
 */
export async function stopIntelRuntime(): Promise<void> {
  resetServiceRegistry();
  await closeAdapter();
}
