/**
 * Plugins command - the plugin catalogue, available or not
 */

import { parseFormat, print, type TableColumn } from '../output.js';
import { withIntel } from '../runtime.js';
import type { FormatOptions } from './schema.js';

const PLUGIN_COLUMNS: TableColumn[] = [
  { key: 'id', label: 'ID' },
  { key: 'label', label: 'Label' },
  { key: 'provider', label: 'Provider' },
  { key: 'available', label: 'Available' },
];

export async function listPlugins(options: FormatOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    print(intel.getPlugins(), format, PLUGIN_COLUMNS);
  });
}
