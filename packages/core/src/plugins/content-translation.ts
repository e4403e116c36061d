import type { ContentEntity } from '../entities/types.js';
import { getLog } from '../services/get-log.js';
import { getErrorMessage } from '../types/errors.js';
import { BaseIntelPlugin } from '../intel/plugin-base.js';
import type { PluginDefinition, PluginDescriptor } from '../intel/types.js';
import type { IntelData } from '../types/json.js';

const log = getLog('ContentTranslationPlugin');

export interface LanguageInfo {
  langcode: string;
  name: string;
  /** System languages such as "not specified" */
  locked: boolean;
}

export interface TranslationMetadata {
  author: string | null;
  created: number | null;
  changed: number | null;
  published: boolean;
  outdated: boolean;
}

export interface ITranslationManager {
  /** Whether content translation is switched on for the type/bundle */
  isEnabled(entityType: string, bundle: string | null): boolean;
  getLanguages(): Promise<LanguageInfo[]>;
  getMetadata(entity: ContentEntity, langcode: string): Promise<TranslationMetadata | null>;
}

export const contentTranslationDefinition: PluginDefinition = {
  id: 'content_translation',
  label: 'Translation Status',
  description: 'Translation coverage and status per content language.',
  weight: 20,
  provider: 'content_intel',
};

export class ContentTranslationPlugin extends BaseIntelPlugin {
  constructor(
    descriptor: PluginDescriptor,
    private readonly translations: ITranslationManager | null
  ) {
    super(descriptor);
  }

  override isAvailable(): boolean {
    return this.translations !== null;
  }

  override applies(entity: ContentEntity): boolean {
    if (!this.translations) return false;
    return this.translations.isEnabled(entity.entityType, entity.bundle ?? entity.entityType);
  }

  async collect(entity: ContentEntity): Promise<IntelData> {
    const manager = this.translations;
    if (!manager) return {};

    const contentLanguages = (await manager.getLanguages()).filter((language) => !language.locked);
    const names = new Map(contentLanguages.map((language) => [language.langcode, language.name]));
    const translated = new Set(entity.translations ?? []);

    const translatedLanguages: Record<string, string> = {};
    const missingLanguages: Record<string, string> = {};
    for (const { langcode, name } of contentLanguages) {
      if (translated.has(langcode)) {
        translatedLanguages[langcode] = name;
      } else {
        missingLanguages[langcode] = name;
      }
    }

    const originalLangcode = entity.langcode ?? 'und';
    const total = contentLanguages.length;
    const translatedCount = Object.keys(translatedLanguages).length;
    const coveragePct = total > 0 ? Math.round((translatedCount / total) * 1000) / 10 : 0;

    const details: IntelData = {};
    for (const langcode of translated) {
      const detail: IntelData = {
        langcode,
        language: names.get(langcode) ?? langcode,
        is_original: langcode === originalLangcode,
      };

      try {
        const metadata = await manager.getMetadata(entity, langcode);
        if (metadata) {
          detail.author = metadata.author;
          detail.created = metadata.created;
          detail.changed = metadata.changed;
          detail.published = metadata.published;
          detail.outdated = metadata.outdated;
        }
      } catch (error) {
        log.debug('Translation metadata unavailable', { langcode, error: getErrorMessage(error) });
      }

      details[langcode] = detail;
    }

    return {
      translation_enabled: true,
      original_language: {
        langcode: originalLangcode,
        name: names.get(originalLangcode) ?? originalLangcode,
      },
      coverage: {
        total_languages: total,
        translated_count: translatedCount,
        missing_count: Object.keys(missingLanguages).length,
        coverage_pct: coveragePct,
      },
      translated_languages: translatedLanguages,
      missing_languages: missingLanguages,
      translations: details,
    };
  }
}
