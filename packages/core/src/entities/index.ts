export type {
  FieldDefinition,
  ReferencedEntity,
  ReferencedFile,
  ReferencedTarget,
  FieldItem,
  EntityField,
  ContentEntity,
  EntitySummary,
  EntityTypeInfo,
  BundleInfo,
  FieldInfo,
  ConditionValue,
  ListEntitiesOptions,
  ResolvedListOptions,
  IEntityStore,
  ISchemaIntrospection,
} from './types.js';
export { CARDINALITY_UNLIMITED } from './types.js';
export { getEntitySummary } from './summary.js';
