/**
 * Settings Repository (PostgreSQL)
 *
 * JSON key/value settings, e.g. the enabled-plugin allow-list.
 */

import { z } from 'zod';
import { isIntelValue, type IConfigStore, type IntelValue } from '@content-intel/core';
import { BaseRepository } from './base.js';
import { getLog } from '../../services/log.js';

const log = getLog('SettingsRepo');

const settingRow = z.object({ value: z.unknown() });

export class SettingsRepository extends BaseRepository implements IConfigStore {
  async get(key: string): Promise<IntelValue | undefined> {
    const row = await this.queryOne(settingRow, 'SELECT value FROM settings WHERE key = ?', [key]);
    if (!row) return undefined;
    if (!isIntelValue(row.value)) {
      log.warn('Ignoring non-JSON setting value', { key });
      return undefined;
    }
    return row.value;
  }

  async set(key: string, value: IntelValue): Promise<void> {
    await this.execute(
      `INSERT INTO settings (key, value, updated_at)
       VALUES (?, ?::jsonb, NOW())
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
      [key, JSON.stringify(value)]
    );
  }

  async delete(key: string): Promise<void> {
    await this.execute('DELETE FROM settings WHERE key = ?', [key]);
  }
}
