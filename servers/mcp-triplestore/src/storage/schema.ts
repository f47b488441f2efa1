/**
 * SQLite DDL for the fact table.
 * Executed every time the database is opened.
 */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS triples (
  id         TEXT NOT NULL COLLATE NOCASE,
  predicate  TEXT NOT NULL COLLATE NOCASE,
  object     TEXT NOT NULL COLLATE NOCASE,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
  PRIMARY KEY (id, predicate, object)
);

CREATE INDEX IF NOT EXISTS idx_triples_predicate ON triples(predicate, object);
CREATE INDEX IF NOT EXISTS idx_triples_object ON triples(object);
`;
