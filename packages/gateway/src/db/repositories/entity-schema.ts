/**
 * Entity Schema Repository (PostgreSQL)
 *
 * Entity types, bundles and field definitions.
 */

import { z } from 'zod';
import type { BundleInfo, EntityTypeInfo, FieldInfo, ISchemaIntrospection } from '@content-intel/core';
import { BaseRepository } from './base.js';
import { intColumn, nullableTextColumn, textColumn } from './columns.js';

const entityTypeRow = z.object({
  id: textColumn,
  label: textColumn,
  bundle_entity_type: nullableTextColumn,
});

const bundleRow = z.object({ id: textColumn, label: textColumn });

const fieldRow = z.object({
  bundle: textColumn,
  name: textColumn,
  label: textColumn,
  type: textColumn,
  required: z.boolean(),
  cardinality: intColumn,
});

export class EntitySchemaRepository extends BaseRepository implements ISchemaIntrospection {
  async entityTypes(): Promise<EntityTypeInfo[]> {
    const rows = await this.query(entityTypeRow, 'SELECT id, label, bundle_entity_type FROM entity_types ORDER BY id');
    return rows.map((row) => ({ id: row.id, label: row.label, bundleEntityType: row.bundle_entity_type }));
  }

  bundles(entityType: string): Promise<BundleInfo[]> {
    return this.query(bundleRow, 'SELECT id, label FROM bundles WHERE entity_type = ? ORDER BY id', [entityType]);
  }

  /**
   * Base fields, plus the bundle's own fields when a bundle is given.
   * A bundle field replaces the base field of the same name.
   */
  async fields(entityType: string, bundle?: string | null): Promise<FieldInfo[]> {
    const rows = bundle
      ? await this.query(
          fieldRow,
          `SELECT bundle, name, label, type, required, cardinality FROM field_definitions
           WHERE entity_type = ? AND (bundle = '' OR bundle = ?)
           ORDER BY weight, name`,
          [entityType, bundle]
        )
      : await this.query(
          fieldRow,
          `SELECT bundle, name, label, type, required, cardinality FROM field_definitions
           WHERE entity_type = ? AND bundle = ''
           ORDER BY weight, name`,
          [entityType]
        );

    const byName = new Map<string, FieldInfo>();
    for (const row of rows) {
      if (row.bundle === '' && byName.has(row.name)) continue;
      byName.set(row.name, {
        name: row.name,
        label: row.label,
        type: row.type,
        required: row.required,
        cardinality: row.cardinality,
      });
    }
    return [...byName.values()];
  }
}
