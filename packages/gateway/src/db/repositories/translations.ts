/**
 * Translations Repository (PostgreSQL)
 *
 * Languages, per-bundle translation settings and translation metadata.
 * Translation settings are read into a snapshot by refresh(), since the
 * applicability check has to answer synchronously.
 */

import { z } from 'zod';
import type { ContentEntity, ITranslationManager, LanguageInfo, TranslationMetadata } from '@content-intel/core';
import { BaseRepository } from './base.js';
import { nullableIntColumn, nullableTextColumn, textColumn } from './columns.js';
import { getLog } from '../../services/log.js';

const log = getLog('TranslationsRepo');

const languageRow = z.object({ langcode: textColumn, name: textColumn, locked: z.boolean() });
const settingRow = z.object({ entity_type: textColumn, bundle: textColumn });
const metadataRow = z.object({
  author: nullableTextColumn,
  created: nullableIntColumn,
  changed: nullableIntColumn,
  published: z.boolean(),
  outdated: z.boolean(),
});

export class TranslationsRepository extends BaseRepository implements ITranslationManager {
  private enabled = new Set<string>();

  isInstalled(): Promise<boolean> {
    return this.tableExists('translation_settings');
  }

  /**
   * Reload the translation-enabled type/bundle pairs.
   */
  async refresh(): Promise<void> {
    const rows = await this.query(
      settingRow,
      'SELECT entity_type, bundle FROM translation_settings WHERE enabled = TRUE'
    );
    this.enabled = new Set(rows.map((row) => `${row.entity_type}.${row.bundle}`));
    log.debug('Translation settings loaded', { enabled: rows.length });
  }

  isEnabled(entityType: string, bundle: string | null): boolean {
    return this.enabled.has(`${entityType}.${bundle ?? entityType}`);
  }

  getLanguages(): Promise<LanguageInfo[]> {
    return this.query(languageRow, 'SELECT langcode, name, locked FROM languages ORDER BY weight, langcode');
  }

  /**
   * Metadata of one translation. The original language falls back to the
   * entity's own timestamps when it has no translation row.
   */
  async getMetadata(entity: ContentEntity, langcode: string): Promise<TranslationMetadata | null> {
    const row = await this.queryOne(
      metadataRow,
      `SELECT author, created, changed, published, outdated FROM entity_translations
       WHERE entity_type = ? AND entity_id = ? AND langcode = ?`,
      [entity.entityType, entity.id, langcode]
    );
    if (row) return row;
    if (langcode !== entity.langcode) return null;

    return {
      author: null,
      created: entity.createdAt ?? null,
      changed: entity.changedAt ?? null,
      published: true,
      outdated: false,
    };
  }
}
