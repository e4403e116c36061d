/**
 * Entities Repository (PostgreSQL)
 *
 * Loads content entities with their field values, resolving referenced
 * entities and files, and lists entity summaries.
 */

import { z } from 'zod';
import {
  getEntitySummary,
  type ContentEntity,
  type EntityField,
  type EntitySummary,
  type FieldDefinition,
  type FieldItem,
  type IEntityStore,
  type IntelData,
  type ReferencedTarget,
  type ResolvedListOptions,
} from '@content-intel/core';
import { BaseRepository } from './base.js';
import type { DatabaseAdapter } from '../adapters/types.js';
import {
  intColumn,
  intelDataColumn,
  nullableIntColumn,
  nullableTextColumn,
  textColumn,
} from './columns.js';
import { FILES_DEFAULT_BASE_URL } from '../../config/defaults.js';

const FILE_FIELD_TYPES = new Set(['file', 'image']);
const REFERENCE_FIELD_TYPES = new Set(['entity_reference', 'entity_reference_revisions']);

const entityTypeRow = z.object({
  id: textColumn,
  label: textColumn,
  bundle_entity_type: nullableTextColumn,
  translatable: z.boolean(),
  tracks_created: z.boolean(),
  tracks_changed: z.boolean(),
});
type EntityTypeRow = z.infer<typeof entityTypeRow>;

const entityRow = z.object({
  entity_type: textColumn,
  id: textColumn,
  uuid: textColumn,
  bundle: nullableTextColumn,
  langcode: nullableTextColumn,
  label: textColumn,
  created: nullableIntColumn,
  changed: nullableIntColumn,
});
type EntityRow = z.infer<typeof entityRow>;

const fieldDefinitionRow = z.object({
  bundle: textColumn,
  name: textColumn,
  label: textColumn,
  type: textColumn,
  required: z.boolean(),
  cardinality: intColumn,
  computed: z.boolean(),
  main_property: nullableTextColumn,
  target_type: nullableTextColumn,
});
type FieldDefinitionRow = z.infer<typeof fieldDefinitionRow>;

const fieldValueRow = z.object({
  field_name: textColumn,
  delta: intColumn,
  properties: intelDataColumn,
});
type FieldValueRow = z.infer<typeof fieldValueRow>;

const fileRow = z.object({
  id: textColumn,
  filename: textColumn,
  uri: textColumn,
  filemime: textColumn,
  filesize: intColumn,
});

const labelRow = z.object({ id: textColumn, label: textColumn });
const langcodeRow = z.object({ langcode: textColumn });

const ENTITY_COLUMNS = 'entity_type, id, uuid, bundle, langcode, label, created, changed';

/**
 * Public URL for a stored file URI.
 */
export function fileUrl(uri: string, filesBaseUrl: string = FILES_DEFAULT_BASE_URL): string {
  const match = /^([a-z][a-z0-9+.-]*):\/\/(.*)$/i.exec(uri);
  if (!match) return uri;
  const [, scheme = '', path = ''] = match;
  switch (scheme) {
    case 'public':
      return `${filesBaseUrl}/${path}`;
    case 'private':
      return `/system/files/${path}`;
    default:
      return uri;
  }
}

function targetIdOf(properties: IntelData): string | null {
  const value = properties.target_id;
  return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
}

/**
 * Field definitions for one bundle: base fields, overridden by bundle
 * fields of the same name.
 */
function mergeDefinitions(rows: readonly FieldDefinitionRow[]): FieldDefinitionRow[] {
  const byName = new Map<string, FieldDefinitionRow>();
  for (const row of rows) {
    const existing = byName.get(row.name);
    if (!existing || existing.bundle === '') {
      byName.set(row.name, row);
    }
  }
  return [...byName.values()];
}

function toDefinition(row: FieldDefinitionRow): FieldDefinition {
  return {
    name: row.name,
    label: row.label,
    type: row.type,
    required: row.required,
    cardinality: row.cardinality,
    ...(row.computed ? { computed: true } : {}),
    ...(row.main_property ? { mainProperty: row.main_property } : {}),
  };
}

export class EntitiesRepository extends BaseRepository implements IEntityStore {
  constructor(
    adapter: DatabaseAdapter | null = null,
    private readonly filesBaseUrl: string = FILES_DEFAULT_BASE_URL
  ) {
    super(adapter);
  }

  async load(entityType: string, id: string): Promise<ContentEntity | null> {
    const type = await this.getEntityType(entityType);
    if (!type) return null;

    const row = await this.queryOne(
      entityRow,
      `SELECT ${ENTITY_COLUMNS} FROM entities WHERE entity_type = ? AND id = ?`,
      [entityType, id]
    );
    return row ? this.hydrate(type, row) : null;
  }

  async loadMany(entityType: string, ids: readonly string[]): Promise<ContentEntity[]> {
    if (ids.length === 0) return [];
    const type = await this.getEntityType(entityType);
    if (!type) return [];

    const rows = await this.query(
      entityRow,
      `SELECT ${ENTITY_COLUMNS} FROM entities WHERE entity_type = ? AND id = ANY(?)`,
      [entityType, [...ids]]
    );
    const byId = new Map(rows.map((row) => [row.id, row]));
    const ordered = ids.flatMap((id) => {
      const row = byId.get(id);
      return row ? [row] : [];
    });
    return Promise.all(ordered.map((row) => this.hydrate(type, row)));
  }

  async list(entityType: string, options: ResolvedListOptions): Promise<EntitySummary[]> {
    const type = await this.getEntityType(entityType);
    if (!type) return [];

    const where = ['e.entity_type = ?'];
    const params: unknown[] = [entityType];

    if (options.bundle !== null) {
      where.push('e.bundle = ?');
      params.push(options.bundle);
    }

    for (const [fieldName, value] of Object.entries(options.conditions)) {
      where.push(
        `EXISTS (SELECT 1 FROM entity_field_values v
          WHERE v.entity_type = e.entity_type AND v.entity_id = e.id AND v.field_name = ?
            AND (v.properties->>'value' = ? OR v.properties->>'target_id' = ?))`
      );
      params.push(fieldName, String(value), String(value));
    }

    params.push(options.limit, options.offset);
    const rows = await this.query(
      entityRow,
      `SELECT e.entity_type, e.id, e.uuid, e.bundle, e.langcode, e.label, e.created, e.changed
       FROM entities e
       WHERE ${where.join(' AND ')}
       ORDER BY LENGTH(e.id) DESC, e.id DESC
       LIMIT ? OFFSET ?`,
      params
    );
    return rows.map((row) => getEntitySummary(this.toEntity(type, row, [])));
  }

  private getEntityType(entityType: string): Promise<EntityTypeRow | null> {
    return this.queryOne(
      entityTypeRow,
      `SELECT id, label, bundle_entity_type, translatable, tracks_created, tracks_changed
       FROM entity_types WHERE id = ?`,
      [entityType]
    );
  }

  private async hydrate(type: EntityTypeRow, row: EntityRow): Promise<ContentEntity> {
    const [definitionRows, values, translations] = await Promise.all([
      this.query(
        fieldDefinitionRow,
        `SELECT bundle, name, label, type, required, cardinality, computed, main_property, target_type
         FROM field_definitions
         WHERE entity_type = ? AND (bundle = '' OR bundle = ?)
         ORDER BY weight, name`,
        [row.entity_type, row.bundle ?? '']
      ),
      this.query(
        fieldValueRow,
        `SELECT field_name, delta, properties FROM entity_field_values
         WHERE entity_type = ? AND entity_id = ?
         ORDER BY field_name, delta`,
        [row.entity_type, row.id]
      ),
      type.translatable ? this.loadTranslations(row) : Promise.resolve(undefined),
    ]);

    const definitions = mergeDefinitions(definitionRows);
    const targets = await this.resolveTargets(definitions, values);

    const fields: EntityField[] = definitions.map((definition) => ({
      definition: toDefinition(definition),
      items: values
        .filter((value) => value.field_name === definition.name)
        .map((value): FieldItem => {
          const key = targetKey(definition, value.properties);
          return key === null
            ? { properties: value.properties }
            : { properties: value.properties, target: targets.get(key) ?? null };
        }),
    }));

    return this.toEntity(type, row, fields, translations);
  }

  private toEntity(
    type: EntityTypeRow,
    row: EntityRow,
    fields: EntityField[],
    translations?: string[]
  ): ContentEntity {
    return {
      entityType: row.entity_type,
      id: row.id,
      uuid: row.uuid,
      label: row.label,
      ...(type.bundle_entity_type !== null ? { bundle: row.bundle } : {}),
      ...(type.translatable ? { langcode: row.langcode } : {}),
      fields,
      ...(type.tracks_created && row.created !== null ? { createdAt: row.created } : {}),
      ...(type.tracks_changed && row.changed !== null ? { changedAt: row.changed } : {}),
      ...(translations ? { translations } : {}),
    };
  }

  private async loadTranslations(row: EntityRow): Promise<string[]> {
    const rows = await this.query(
      langcodeRow,
      `SELECT langcode FROM entity_translations
       WHERE entity_type = ? AND entity_id = ?
       ORDER BY langcode`,
      [row.entity_type, row.id]
    );
    const langcodes = rows.map((translation) => translation.langcode);
    return row.langcode && !langcodes.includes(row.langcode) ? [row.langcode, ...langcodes] : langcodes;
  }

  /**
   * Referenced files and entity labels, keyed by `file:<id>` or `<type>:<id>`.
   */
  private async resolveTargets(
    definitions: readonly FieldDefinitionRow[],
    values: readonly FieldValueRow[]
  ): Promise<Map<string, ReferencedTarget>> {
    const wanted = new Map<string, Set<string>>();
    for (const definition of definitions) {
      for (const value of values) {
        if (value.field_name !== definition.name) continue;
        const key = targetKey(definition, value.properties);
        if (key === null) continue;
        const [targetType = '', ...rest] = key.split(':');
        const ids = wanted.get(targetType) ?? new Set<string>();
        ids.add(rest.join(':'));
        wanted.set(targetType, ids);
      }
    }

    const targets = new Map<string, ReferencedTarget>();
    await Promise.all(
      [...wanted].map(async ([targetType, ids]) => {
        if (targetType === 'file') {
          const files = await this.query(
            fileRow,
            'SELECT id, filename, uri, filemime, filesize FROM files WHERE id = ANY(?)',
            [[...ids]]
          );
          for (const file of files) {
            targets.set(`file:${file.id}`, {
              kind: 'file',
              filename: file.filename,
              uri: file.uri,
              url: fileUrl(file.uri, this.filesBaseUrl),
              mime: file.filemime,
              size: file.filesize,
            });
          }
          return;
        }

        const labels = await this.query(
          labelRow,
          'SELECT id, label FROM entities WHERE entity_type = ? AND id = ANY(?)',
          [targetType, [...ids]]
        );
        for (const target of labels) {
          targets.set(`${targetType}:${target.id}`, { kind: 'entity', entityType: targetType, label: target.label });
        }
      })
    );
    return targets;
  }
}

function targetKey(definition: FieldDefinitionRow, properties: IntelData): string | null {
  const targetId = targetIdOf(properties);
  if (targetId === null) return null;
  if (FILE_FIELD_TYPES.has(definition.type)) return `file:${targetId}`;
  if (REFERENCE_FIELD_TYPES.has(definition.type) && definition.target_type) {
    return `${definition.target_type}:${targetId}`;
  }
  return null;
}
