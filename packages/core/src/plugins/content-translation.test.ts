import { describe, it, expect, vi } from 'vitest';
import {
  ContentTranslationPlugin,
  contentTranslationDefinition,
  type ITranslationManager,
} from './content-translation.js';
import { toDescriptor } from '../intel/registry.js';
import { createTestEntity } from '../test-helpers.js';
import type { ContentEntity } from '../entities/types.js';

const descriptor = toDescriptor(contentTranslationDefinition);

function manager(overrides: Partial<ITranslationManager> = {}): ITranslationManager {
  return {
    isEnabled: vi.fn((entityType: string, bundle: string | null) => entityType === 'node' && bundle === 'article'),
    getLanguages: vi.fn(async () => [
      { langcode: 'en', name: 'English', locked: false },
      { langcode: 'nl', name: 'Dutch', locked: false },
      { langcode: 'fr', name: 'French', locked: false },
      { langcode: 'und', name: 'Not specified', locked: true },
    ]),
    getMetadata: vi.fn(async () => null),
    ...overrides,
  };
}

describe('ContentTranslationPlugin', () => {
  it('is unavailable and never applies without a translation manager', () => {
    const plugin = new ContentTranslationPlugin(descriptor, null);
    expect(plugin.isAvailable()).toBe(false);
    expect(plugin.applies(createTestEntity())).toBe(false);
  });

  it('applies when translation is enabled for the bundle', () => {
    const translations = manager();
    const plugin = new ContentTranslationPlugin(descriptor, translations);
    expect(plugin.applies(createTestEntity())).toBe(true);
    expect(plugin.applies(createTestEntity({ bundle: 'page' }))).toBe(false);
  });

  it('falls back to the entity type as bundle', () => {
    const translations = manager();
    const plugin = new ContentTranslationPlugin(descriptor, translations);
    plugin.applies(createTestEntity({ entityType: 'user', bundle: undefined }));
    expect(translations.isEnabled).toHaveBeenCalledWith('user', 'user');
  });

  it('reports coverage over unlocked languages', async () => {
    const translations = manager({
      getMetadata: vi.fn(async (_entity: ContentEntity, langcode: string) =>
        langcode === 'nl'
          ? { author: 'editor', created: 1710000000, changed: 1710100000, published: true, outdated: false }
          : null
      ),
    });
    const plugin = new ContentTranslationPlugin(descriptor, translations);
    const entity = createTestEntity({ langcode: 'en', translations: ['en', 'nl'] });

    expect(await plugin.collect(entity)).toEqual({
      translation_enabled: true,
      original_language: { langcode: 'en', name: 'English' },
      coverage: { total_languages: 3, translated_count: 2, missing_count: 1, coverage_pct: 66.7 },
      translated_languages: { en: 'English', nl: 'Dutch' },
      missing_languages: { fr: 'French' },
      translations: {
        en: { langcode: 'en', language: 'English', is_original: true },
        nl: {
          langcode: 'nl',
          language: 'Dutch',
          is_original: false,
          author: 'editor',
          created: 1710000000,
          changed: 1710100000,
          published: true,
          outdated: false,
        },
      },
    });
  });

  it('keeps the detail when metadata lookup fails', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const translations = manager({
      getMetadata: vi.fn(async () => {
        throw new Error('metadata table missing');
      }),
    });
    const plugin = new ContentTranslationPlugin(descriptor, translations);
    const data = await plugin.collect(createTestEntity({ translations: ['en'] }));
    expect(data.translations).toEqual({ en: { langcode: 'en', language: 'English', is_original: true } });
  });

  it('reports zero coverage when no content language exists', async () => {
    const plugin = new ContentTranslationPlugin(descriptor, manager({ getLanguages: vi.fn(async () => []) }));
    const data = await plugin.collect(createTestEntity({ translations: [] }));
    expect(data.coverage).toEqual({ total_languages: 0, translated_count: 0, missing_count: 0, coverage_pct: 0 });
    expect(data.original_language).toEqual({ langcode: 'en', name: 'en' });
  });
});
