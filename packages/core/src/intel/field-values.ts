/**
 * Field value extraction for report snapshots.
 *
 * Each field type maps its items to a JSON shape; single-cardinality fields
 * holding one value collapse to the bare value, everything else is a list.
 */

import type { EntityField, FieldDefinition, FieldItem, ContentEntity } from '../entities/types.js';
import { setEntry, type IntelData, type IntelValue } from '../types/json.js';
import { toIso8601 } from './format.js';
import type { FieldSnapshot } from './types.js';

const REFERENCE_TYPES = new Set(['entity_reference', 'entity_reference_revisions']);
const FILE_TYPES = new Set(['file', 'image']);
const TEXT_TYPES = new Set(['text', 'text_long', 'text_with_summary']);
const TEMPORAL_TYPES = new Set(['datetime', 'timestamp', 'created', 'changed']);

const NUMERIC = /^\s*-?\d+(\.\d+)?\s*$/;

export function mainPropertyOf(definition: FieldDefinition): string {
  if (definition.mainProperty) return definition.mainProperty;
  if (REFERENCE_TYPES.has(definition.type) || FILE_TYPES.has(definition.type)) return 'target_id';
  if (definition.type === 'link') return 'uri';
  return 'value';
}

function property(item: FieldItem, name: string): IntelValue {
  return item.properties[name] ?? null;
}

function isNumeric(value: IntelValue): value is number | string {
  if (typeof value === 'number') return Number.isFinite(value);
  return typeof value === 'string' && NUMERIC.test(value);
}

function isTruthy(value: IntelValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value) && value !== '0';
}

export function isItemEmpty(item: FieldItem, definition: FieldDefinition): boolean {
  const main = property(item, mainPropertyOf(definition));
  return main === null || main === '';
}

export function isFieldEmpty(field: EntityField): boolean {
  return field.items.every((item) => isItemEmpty(item, field.definition));
}

export function extractItemValue(item: FieldItem, definition: FieldDefinition): IntelValue {
  const { type } = definition;

  if (REFERENCE_TYPES.has(type)) {
    const value: IntelData = { targetId: property(item, 'target_id') };
    if (item.target?.kind === 'entity') {
      value.targetType = item.target.entityType;
      value.label = item.target.label;
    }
    return value;
  }

  if (FILE_TYPES.has(type)) {
    const value: IntelData = { targetId: property(item, 'target_id') };
    if (item.target?.kind === 'file') {
      value.filename = item.target.filename;
      value.uri = item.target.uri;
      value.url = item.target.url;
      value.mime = item.target.mime;
      value.size = item.target.size;
    }
    if (type === 'image') {
      value.alt = item.properties.alt ?? '';
      value.title = item.properties.title ?? '';
      value.width = property(item, 'width');
      value.height = property(item, 'height');
    }
    return value;
  }

  if (TEXT_TYPES.has(type)) {
    const value: IntelData = {
      value: property(item, 'value'),
      format: property(item, 'format'),
    };
    if (item.properties.processed !== undefined) {
      value.processed = item.properties.processed;
    }
    const summary = property(item, 'summary');
    if (type === 'text_with_summary' && isTruthy(summary)) {
      value.summary = summary;
    }
    return value;
  }

  if (type === 'link') {
    return {
      uri: property(item, 'uri'),
      title: item.properties.title ?? '',
      options: item.properties.options ?? {},
    };
  }

  if (TEMPORAL_TYPES.has(type)) {
    const raw = property(item, 'value');
    if (isNumeric(raw)) {
      const timestamp = Math.trunc(Number(raw));
      const iso8601 = toIso8601(timestamp);
      if (iso8601 !== null) return { timestamp, iso8601 };
    }
    return raw;
  }

  if (type === 'boolean') {
    return isTruthy(property(item, 'value'));
  }

  const main = property(item, mainPropertyOf(definition));
  return main !== null ? main : item.properties;
}

/**
 * Extract a field's value. Null item values are dropped.
 */
export function extractFieldValue(field: EntityField): IntelValue {
  const values = field.items
    .map((item) => extractItemValue(item, field.definition))
    .filter((value) => value !== null);

  if (field.definition.cardinality === 1 && values.length === 1) {
    return values[0] ?? null;
  }
  return values;
}

/**
 * Snapshot of every stored, non-empty field, limited to `fieldFilter` when given.
 */
export function extractFieldData(entity: ContentEntity, fieldFilter: readonly string[] = []): FieldSnapshot {
  const snapshot: FieldSnapshot = {};
  for (const field of entity.fields) {
    const { name, computed } = field.definition;
    if (fieldFilter.length > 0 && !fieldFilter.includes(name)) continue;
    if (computed) continue;
    if (isFieldEmpty(field)) continue;
    setEntry(snapshot, name, extractFieldValue(field));
  }
  return snapshot;
}
