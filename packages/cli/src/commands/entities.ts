/**
 * Entity commands - listing, summaries and intel collection
 */

import { DEFAULT_BATCH_LIMIT, DEFAULT_LIST_LIMIT } from '@content-intel/core';
import { parseFormat, print, type TableColumn } from '../output.js';
import { filterList } from '../options.js';
import { withIntel } from '../runtime.js';
import type { FormatOptions } from './schema.js';

const LIST_COLUMNS: TableColumn[] = [
  { key: 'id', label: 'ID' },
  { key: 'label', label: 'Label' },
  { key: 'bundle', label: 'Bundle' },
];

export interface ListOptions extends FormatOptions {
  limit?: number;
  offset?: number;
}

export interface IntelOptions extends FormatOptions {
  fields?: string;
  plugins?: string;
}

export interface BatchCommandOptions extends IntelOptions {
  bundle?: string;
  ids?: string;
  limit?: number;
}

export async function listEntities(
  entityType: string,
  bundle: string | undefined,
  options: ListOptions = {}
): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    const summaries = await intel.listEntities(entityType, {
      bundle: bundle ?? null,
      limit: options.limit ?? DEFAULT_LIST_LIMIT,
      offset: options.offset ?? 0,
    });
    print(summaries, format, LIST_COLUMNS);
  });
}

export async function showEntityIntel(entityType: string, id: string, options: IntelOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'yaml');
    const fields = filterList(options.fields, 'fields');
    const plugins = filterList(options.plugins, 'plugins');
    print(await intel.collectIntelFor(entityType, id, fields, plugins), format);
  });
}

export async function showEntitySummary(entityType: string, id: string, options: FormatOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'yaml');
    const entity = await intel.requireEntity(entityType, id);
    print(intel.getEntitySummary(entity), format);
  });
}

/**
 * Explicit `--ids` win over `--bundle` and `--limit`.
 */
export async function batchIntel(entityType: string, options: BatchCommandOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'json');
    const ids = filterList(options.ids, 'ids');
    const fields = filterList(options.fields, 'fields');
    const plugins = filterList(options.plugins, 'plugins');

    const reports = await intel.collectBatch(entityType, {
      ids,
      bundle: options.bundle ?? null,
      limit: options.limit ?? DEFAULT_BATCH_LIMIT,
      fields,
      plugins,
    });
    print(reports, format);
  });
}
