/**
 * Content entity model consumed by the intel pipeline.
 *
 * Entities arrive fully loaded from an {@link IEntityStore}; the pipeline
 * only reads them.
 */

import type { IntelData } from '../types/json.js';

/** Storage-level cardinality value meaning "any number of items". */
export const CARDINALITY_UNLIMITED = -1;

export interface FieldDefinition {
  readonly name: string;
  readonly label: string;
  /** Field type id, e.g. `string`, `text_with_summary`, `entity_reference` */
  readonly type: string;
  readonly required: boolean;
  readonly cardinality: number;
  /** Computed fields have no stored value and are left out of snapshots */
  readonly computed?: boolean;
  /** Property holding the item's primary value; `value` when omitted */
  readonly mainProperty?: string;
}

export interface ReferencedEntity {
  readonly kind: 'entity';
  readonly entityType: string;
  readonly label: string;
}

export interface ReferencedFile {
  readonly kind: 'file';
  readonly filename: string;
  readonly uri: string;
  readonly url: string;
  readonly mime: string;
  readonly size: number;
}

export type ReferencedTarget = ReferencedEntity | ReferencedFile;

/**
 * One stored value of a field. `properties` holds the raw columns
 * (`value`, `format`, `target_id`, `alt`, ...); `target` is the resolved
 * referenced entity or file when the store could load it.
 */
export interface FieldItem {
  readonly properties: IntelData;
  readonly target?: ReferencedTarget | null;
}

export interface EntityField {
  readonly definition: FieldDefinition;
  readonly items: readonly FieldItem[];
}

export interface ContentEntity {
  readonly entityType: string;
  readonly id: string;
  readonly uuid: string;
  readonly label: string;
  /** Undefined for entity types without bundles */
  readonly bundle?: string | null;
  /** Undefined for entity types that are not translatable */
  readonly langcode?: string | null;
  readonly fields: readonly EntityField[];
  /** Unix seconds; undefined when the type does not track creation */
  readonly createdAt?: number;
  /** Unix seconds; undefined when the type does not track changes */
  readonly changedAt?: number;
  /** Langcodes the entity has translations for, original included */
  readonly translations?: readonly string[];
}

export interface EntitySummary {
  entityType: string;
  id: string;
  uuid: string;
  label: string;
  bundle?: string | null;
  langcode?: string | null;
}

export interface EntityTypeInfo {
  id: string;
  label: string;
  /** Config entity type that defines bundles, null when the type has none */
  bundleEntityType: string | null;
}

export interface BundleInfo {
  id: string;
  label: string;
}

export interface FieldInfo {
  name: string;
  label: string;
  type: string;
  required: boolean;
  cardinality: number;
}

export type ConditionValue = string | number | boolean;

export interface ListEntitiesOptions {
  bundle?: string | null;
  limit?: number;
  offset?: number;
  /** Field name to required value, ANDed together */
  conditions?: Readonly<Record<string, ConditionValue>>;
}

export interface ResolvedListOptions {
  bundle: string | null;
  limit: number;
  offset: number;
  conditions: Readonly<Record<string, ConditionValue>>;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Entity loading. Missing ids resolve to null (or are omitted), never throw.
 */
export interface IEntityStore {
  load(entityType: string, id: string): Promise<ContentEntity | null>;
  loadMany(entityType: string, ids: readonly string[]): Promise<ContentEntity[]>;
  /** Matching entity summaries, newest (highest id) first */
  list(entityType: string, options: ResolvedListOptions): Promise<EntitySummary[]>;
}

export interface ISchemaIntrospection {
  entityTypes(): Promise<EntityTypeInfo[]>;
  bundles(entityType: string): Promise<BundleInfo[]>;
  /** Bundle fields, or base fields only when bundle is omitted */
  fields(entityType: string, bundle?: string | null): Promise<FieldInfo[]>;
}
