/**
 * PostgreSQL Schema Definition
 *
 * Content model, translation, view statistics, settings and search log tables.
 * Timestamps on content rows are unix seconds (BIGINT).
 */

import { getLog } from '../services/log.js';

const log = getLog('Schema');

export const SCHEMA_SQL = `
-- =====================================================
-- CONTENT MODEL
-- =====================================================

CREATE TABLE IF NOT EXISTS entity_types (
  id TEXT PRIMARY KEY,
  label TEXT NOT NULL,
  bundle_entity_type TEXT,
  translatable BOOLEAN NOT NULL DEFAULT FALSE,
  tracks_created BOOLEAN NOT NULL DEFAULT FALSE,
  tracks_changed BOOLEAN NOT NULL DEFAULT FALSE
);

CREATE TABLE IF NOT EXISTS bundles (
  entity_type TEXT NOT NULL REFERENCES entity_types(id) ON DELETE CASCADE,
  id TEXT NOT NULL,
  label TEXT NOT NULL,
  PRIMARY KEY (entity_type, id)
);

-- bundle = '' marks a base field shared by every bundle
CREATE TABLE IF NOT EXISTS field_definitions (
  entity_type TEXT NOT NULL REFERENCES entity_types(id) ON DELETE CASCADE,
  bundle TEXT NOT NULL DEFAULT '',
  name TEXT NOT NULL,
  label TEXT NOT NULL,
  type TEXT NOT NULL,
  required BOOLEAN NOT NULL DEFAULT FALSE,
  cardinality INTEGER NOT NULL DEFAULT 1,
  computed BOOLEAN NOT NULL DEFAULT FALSE,
  main_property TEXT,
  target_type TEXT,
  weight INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (entity_type, bundle, name)
);

CREATE TABLE IF NOT EXISTS entities (
  entity_type TEXT NOT NULL REFERENCES entity_types(id) ON DELETE CASCADE,
  id TEXT NOT NULL,
  uuid TEXT NOT NULL UNIQUE,
  bundle TEXT,
  langcode TEXT,
  label TEXT NOT NULL DEFAULT '',
  created BIGINT,
  changed BIGINT,
  PRIMARY KEY (entity_type, id)
);

CREATE TABLE IF NOT EXISTS entity_field_values (
  entity_type TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  field_name TEXT NOT NULL,
  delta INTEGER NOT NULL DEFAULT 0,
  properties JSONB NOT NULL DEFAULT '{}',
  PRIMARY KEY (entity_type, entity_id, field_name, delta),
  FOREIGN KEY (entity_type, entity_id) REFERENCES entities(entity_type, id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS files (
  id TEXT PRIMARY KEY,
  filename TEXT NOT NULL,
  uri TEXT NOT NULL,
  filemime TEXT NOT NULL DEFAULT 'application/octet-stream',
  filesize BIGINT NOT NULL DEFAULT 0
);

-- =====================================================
-- TRANSLATION
-- =====================================================

CREATE TABLE IF NOT EXISTS languages (
  langcode TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  locked BOOLEAN NOT NULL DEFAULT FALSE,
  weight INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS translation_settings (
  entity_type TEXT NOT NULL,
  bundle TEXT NOT NULL,
  enabled BOOLEAN NOT NULL DEFAULT FALSE,
  PRIMARY KEY (entity_type, bundle)
);

CREATE TABLE IF NOT EXISTS entity_translations (
  entity_type TEXT NOT NULL,
  entity_id TEXT NOT NULL,
  langcode TEXT NOT NULL,
  source_langcode TEXT,
  author TEXT,
  created BIGINT,
  changed BIGINT,
  published BOOLEAN NOT NULL DEFAULT TRUE,
  outdated BOOLEAN NOT NULL DEFAULT FALSE,
  PRIMARY KEY (entity_type, entity_id, langcode),
  FOREIGN KEY (entity_type, entity_id) REFERENCES entities(entity_type, id) ON DELETE CASCADE
);

-- =====================================================
-- STATISTICS, SETTINGS, SEARCH LOG
-- =====================================================

CREATE TABLE IF NOT EXISTS node_counter (
  nid TEXT PRIMARY KEY,
  totalcount BIGINT NOT NULL DEFAULT 0,
  daycount INTEGER NOT NULL DEFAULT 0,
  "timestamp" BIGINT NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value JSONB NOT NULL,
  updated_at TIMESTAMP NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS content_intel_search_log (
  id BIGSERIAL PRIMARY KEY,
  keywords VARCHAR(255) NOT NULL,
  results_count INTEGER NOT NULL DEFAULT 0,
  index_id VARCHAR(64),
  "timestamp" BIGINT NOT NULL
);
`;

export const INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_entities_type_bundle ON entities(entity_type, bundle);
CREATE INDEX IF NOT EXISTS idx_field_values_lookup ON entity_field_values(entity_type, field_name);
CREATE INDEX IF NOT EXISTS idx_search_log_keywords ON content_intel_search_log(keywords);
CREATE INDEX IF NOT EXISTS idx_search_log_timestamp ON content_intel_search_log("timestamp");
`;

/**
 * Initialize PostgreSQL schema
 */
export async function initializeSchema(exec: (sql: string) => Promise<void>): Promise<void> {
  log.info('Initializing PostgreSQL schema...');

  await exec(SCHEMA_SQL);
  log.info('Tables created');

  await exec(INDEXES_SQL);
  log.info('Indexes created');
}
