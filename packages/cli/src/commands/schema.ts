/**
 * Schema commands - entity types, bundles and fields
 */

import { parseFormat, print, type TableColumn } from '../output.js';
import { withIntel } from '../runtime.js';

export interface FormatOptions {
  format?: string;
}

const TYPE_COLUMNS: TableColumn[] = [
  { key: 'id', label: 'ID' },
  { key: 'label', label: 'Label' },
];

const FIELD_COLUMNS: TableColumn[] = [
  { key: 'name', label: 'Name' },
  { key: 'label', label: 'Label' },
  { key: 'type', label: 'Type' },
];

export async function listTypes(options: FormatOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    print(await intel.getEntityTypes(), format, TYPE_COLUMNS);
  });
}

export async function listBundles(entityType: string, options: FormatOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    print(await intel.getBundles(entityType), format, TYPE_COLUMNS);
  });
}

export async function listFields(
  entityType: string,
  bundle: string | undefined,
  options: FormatOptions = {}
): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    print(await intel.getFields(entityType, bundle ?? null), format, FIELD_COLUMNS);
  });
}
