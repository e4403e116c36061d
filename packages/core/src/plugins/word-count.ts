import type { ContentEntity } from '../entities/types.js';
import { isFieldEmpty } from '../intel/field-values.js';
import { BaseIntelPlugin } from '../intel/plugin-base.js';
import type { PluginDefinition } from '../intel/types.js';
import type { IntelData } from '../types/json.js';

const TEXT_FIELD_TYPES = new Set(['text', 'text_long', 'text_with_summary', 'string', 'string_long']);

const TAG = /<[^>]*>/g;
// A word starts with a letter and may carry apostrophes and hyphens
const WORD = /\p{L}[\p{L}'-]*/gu;

export const wordCountDefinition: PluginDefinition = {
  id: 'word_count',
  label: 'Word Count',
  description: 'Counts words in text fields.',
  weight: 100,
  provider: 'content_intel_example',
};

export function stripTags(html: string): string {
  return html.replace(TAG, '');
}

export function countWords(text: string): number {
  return text.match(WORD)?.length ?? 0;
}

export class WordCountPlugin extends BaseIntelPlugin {
  collect(entity: ContentEntity): IntelData {
    const breakdown: Record<string, { words: number; characters: number }> = {};
    let totalWords = 0;
    let totalCharacters = 0;

    for (const field of entity.fields) {
      if (!TEXT_FIELD_TYPES.has(field.definition.type) || isFieldEmpty(field)) continue;

      const text = field.items
        .map((item) => item.properties.value)
        .filter((value): value is string => typeof value === 'string' && value !== '')
        .map(stripTags)
        .join(' ')
        .trim();
      if (text === '') continue;

      const words = countWords(text);
      const characters = Array.from(text).length;
      breakdown[field.definition.name] = { words, characters };
      totalWords += words;
      totalCharacters += characters;
    }

    return {
      total_words: totalWords,
      total_characters: totalCharacters,
      fields_analyzed: Object.keys(breakdown).length,
      field_breakdown: breakdown,
    };
  }
}
