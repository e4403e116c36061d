import type { ContentEntity, EntitySummary } from './types.js';

/**
 * Snapshot of an entity's identity. `bundle` and `langcode` are only
 * present when the entity type has them.
 */
export function getEntitySummary(entity: ContentEntity): EntitySummary {
  const summary: EntitySummary = {
    entityType: entity.entityType,
    id: entity.id,
    uuid: entity.uuid,
    label: entity.label,
  };
  if (entity.bundle !== undefined) {
    summary.bundle = entity.bundle;
  }
  if (entity.langcode !== undefined) {
    summary.langcode = entity.langcode;
  }
  return summary;
}
