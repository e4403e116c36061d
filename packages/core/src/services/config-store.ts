/**
 * IConfigStore - persisted key/value settings.
 *
 * Values are JSON; callers narrow what they read back.
 */

import type { IntelValue } from '../types/json.js';

export interface IConfigStore {
  get(key: string): Promise<IntelValue | undefined>;
  set(key: string, value: IntelValue): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Config key holding the enabled-plugin allow-list. */
export const ENABLED_PLUGINS_KEY = 'content_intel.enabled_plugins';

/**
 * Read a string list setting. Anything that is not an array of strings reads as empty.
 */
export async function readStringList(store: IConfigStore, key: string): Promise<string[]> {
  const value = await store.get(key);
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
