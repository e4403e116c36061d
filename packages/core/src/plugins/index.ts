/**
 * Built-in intel plugins
 *
 * Dependencies are bound here, at registration, so each plugin only sees
 * the handles it was given. A missing optional source leaves its plugin
 * registered but unavailable.
 */

import { systemClock, type Clock } from '../services/clock.js';
import type { IntelPluginRegistry } from '../intel/registry.js';
import type { PluginRegistration } from '../intel/types.js';
import { StatisticsPlugin, statisticsDefinition, type IViewStatisticsSource } from './statistics.js';
import {
  ContentTranslationPlugin,
  contentTranslationDefinition,
  type ITranslationManager,
} from './content-translation.js';
import { WordCountPlugin, wordCountDefinition } from './word-count.js';
import { EntityAgePlugin, entityAgeDefinition } from './entity-age.js';

export interface BuiltinPluginDeps {
  statistics?: IViewStatisticsSource | null;
  translations?: ITranslationManager | null;
  clock?: Clock;
}

export function builtinPlugins(deps: BuiltinPluginDeps = {}): PluginRegistration[] {
  const clock = deps.clock ?? systemClock;
  return [
    {
      definition: statisticsDefinition,
      factory: (descriptor) => new StatisticsPlugin(descriptor, deps.statistics ?? null),
    },
    {
      definition: contentTranslationDefinition,
      factory: (descriptor) => new ContentTranslationPlugin(descriptor, deps.translations ?? null),
    },
    {
      definition: wordCountDefinition,
      factory: (descriptor) => new WordCountPlugin(descriptor),
    },
    {
      definition: entityAgeDefinition,
      factory: (descriptor) => new EntityAgePlugin(descriptor, clock),
    },
  ];
}

export function registerBuiltinPlugins(registry: IntelPluginRegistry, deps: BuiltinPluginDeps = {}): void {
  registry.registerAll(builtinPlugins(deps));
}

export { StatisticsPlugin, statisticsDefinition } from './statistics.js';
export type { IViewStatisticsSource, ViewStatistics } from './statistics.js';
export { ContentTranslationPlugin, contentTranslationDefinition } from './content-translation.js';
export type { ITranslationManager, LanguageInfo, TranslationMetadata } from './content-translation.js';
export { WordCountPlugin, wordCountDefinition, countWords, stripTags } from './word-count.js';
export { EntityAgePlugin, entityAgeDefinition, freshnessFor } from './entity-age.js';
export type { Freshness } from './entity-age.js';
