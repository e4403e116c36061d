/**
 * Settings commands - the enabled-plugin allow-list
 *
 * An empty allow-list means every available plugin runs.
 */

import { checkbox } from '@inquirer/prompts';
import type { ContentIntelService } from '@content-intel/core';
import { parseFormat, print, type TableColumn } from '../output.js';
import { filterList } from '../options.js';
import { withIntel } from '../runtime.js';
import type { FormatOptions } from './schema.js';

const SETTINGS_COLUMNS: TableColumn[] = [
  { key: 'id', label: 'ID' },
  { key: 'label', label: 'Label' },
  { key: 'available', label: 'Available' },
  { key: 'enabled', label: 'Enabled' },
];

function describeAllowList(ids: readonly string[]): string {
  return ids.length === 0 ? 'All available plugins are enabled.' : `Enabled plugins: ${ids.join(', ')}`;
}

async function promptForPlugins(intel: ContentIntelService): Promise<string[]> {
  const enabled = new Set(await intel.getEnabledPlugins());
  const available = intel.getPlugins().filter((plugin) => plugin.available);
  if (available.length === 0) {
    throw new Error('No plugins are available.');
  }

  return checkbox({
    message: 'Select plugins to enable (none = all):',
    choices: available.map((plugin) => ({
      name: `${plugin.label} (${plugin.id})`,
      value: plugin.id,
      checked: enabled.has(plugin.id),
    })),
  });
}

export async function settingsShow(options: FormatOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    const allowList = await intel.getEnabledPlugins();

    if (format !== 'table') {
      print({ enabledPlugins: allowList }, format);
      return;
    }

    const rows = intel.getPlugins().map((plugin) => ({
      id: plugin.id,
      label: plugin.label,
      available: plugin.available,
      enabled: plugin.available && (allowList.length === 0 || allowList.includes(plugin.id)),
    }));
    print(rows, format, SETTINGS_COLUMNS);
    console.log(`\n${describeAllowList(allowList)}`);
  });
}

/**
 * Replace the allow-list. Without ids, pick them from a checkbox.
 */
export async function settingsPlugins(ids: string | undefined): Promise<void> {
  await withIntel(async (intel) => {
    const selected = ids === undefined ? await promptForPlugins(intel) : filterList(ids, 'plugins');
    const saved = await intel.setEnabledPlugins(selected);
    console.log(`✅ ${describeAllowList(saved)}`);
  });
}

export async function settingsReset(): Promise<void> {
  await withIntel(async (intel) => {
    await intel.setEnabledPlugins([]);
    console.log(`✅ ${describeAllowList([])}`);
  });
}
