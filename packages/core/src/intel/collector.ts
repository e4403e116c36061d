/**
 * IntelCollector
 *
 * Builds one intel report per call: entity summary, field snapshot, then
 * the output of every selected plugin. A plugin that throws, rejects or
 * runs out of time becomes an `error` entry; the rest still run.
 */

import { TimeoutError, getErrorMessage } from '../types/errors.js';
import { isIntelObject, setEntry } from '../types/json.js';
import { withTimeout } from '../types/utility.js';
import { getLog } from '../services/get-log.js';
import { ENABLED_PLUGINS_KEY, readStringList, type IConfigStore } from '../services/config-store.js';
import { getEntitySummary } from '../entities/summary.js';
import type { ContentEntity } from '../entities/types.js';
import { extractFieldData } from './field-values.js';
import type { IntelPluginRegistry, RegisteredPlugin } from './registry.js';
import type { ExecutionMode, IntelEntry, IntelReport, ReportAlter } from './types.js';

const log = getLog('IntelCollector');

export const DEFAULT_PLUGIN_TIMEOUT_MS = 5000;

export interface IntelCollectorOptions {
  registry: IntelPluginRegistry;
  config: IConfigStore;
  /** Per-plugin budget for collect(); 0 disables it */
  timeoutMs?: number;
  mode?: ExecutionMode;
}

export class IntelCollector {
  private readonly registry: IntelPluginRegistry;
  private readonly config: IConfigStore;
  private readonly timeoutMs: number;
  private readonly mode: ExecutionMode;
  private readonly alters: ReportAlter[] = [];

  constructor(options: IntelCollectorOptions) {
    this.registry = options.registry;
    this.config = options.config;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PLUGIN_TIMEOUT_MS;
    this.mode = options.mode ?? 'sequential';
  }

  /**
   * Append a transform run on every report before it is returned.
   * Returning nothing keeps the (possibly mutated) report.
   */
  addReportAlter(alter: ReportAlter): void {
    this.alters.push(alter);
  }

  async collect(
    entity: ContentEntity,
    fieldFilter: readonly string[] = [],
    pluginFilter: readonly string[] = []
  ): Promise<IntelReport> {
    const report: IntelReport = {
      entity: getEntitySummary(entity),
      fields: extractFieldData(entity, fieldFilter),
      intel: {},
    };

    const selected = await this.selectPlugins(entity, pluginFilter);
    const entries =
      this.mode === 'parallel'
        ? await Promise.all(selected.map((candidate) => this.runPlugin(candidate, entity)))
        : await this.runSequentially(selected, entity);

    // Assembled in weight order whatever the completion order was
    selected.forEach(({ id }, index) => {
      const entry = entries[index];
      if (entry) {
        setEntry(report.intel, id, entry);
      }
    });

    let altered = report;
    for (const alter of this.alters) {
      altered = alter(altered, entity) ?? altered;
    }
    return altered;
  }

  /**
   * Applicable plugins narrowed by the explicit filter, or by the persisted
   * allow-list when no filter is given.
   */
  private async selectPlugins(
    entity: ContentEntity,
    pluginFilter: readonly string[]
  ): Promise<RegisteredPlugin[]> {
    const applicable = this.registry.applicablePlugins(entity);
    if (pluginFilter.length > 0) {
      return applicable.filter(({ id }) => pluginFilter.includes(id));
    }

    const enabled = await readStringList(this.config, ENABLED_PLUGINS_KEY);
    if (enabled.length > 0) {
      return applicable.filter(({ id }) => enabled.includes(id));
    }
    return applicable;
  }

  private async runSequentially(
    selected: readonly RegisteredPlugin[],
    entity: ContentEntity
  ): Promise<Array<IntelEntry | null>> {
    const entries: Array<IntelEntry | null> = [];
    for (const candidate of selected) {
      entries.push(await this.runPlugin(candidate, entity));
    }
    return entries;
  }

  private async runPlugin(
    { id, plugin }: RegisteredPlugin,
    entity: ContentEntity
  ): Promise<IntelEntry | null> {
    const pluginLabel = plugin.label();
    const startTime = Date.now();

    try {
      const pending = Promise.resolve().then(() => plugin.collect(entity));
      const data =
        this.timeoutMs > 0
          ? await withTimeout(pending, this.timeoutMs, new TimeoutError(`${id}.collect`, this.timeoutMs))
          : await pending;

      log.debug('Intel plugin finished', { pluginId: id, durationMs: Date.now() - startTime });
      if (!isIntelObject(data) || Object.keys(data).length === 0) {
        return null;
      }
      return { pluginLabel, data };
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn('Intel plugin failed', { pluginId: id, entity: `${entity.entityType}/${entity.id}`, error: message });
      return { pluginLabel, error: message };
    }
  }
}
