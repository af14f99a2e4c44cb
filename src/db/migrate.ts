import { sql } from "drizzle-orm";
import type { CorpusDb } from "./connection.js";

/** Narrative and classification columns covered by the full-text index. */
export const FTS_COLUMNS = [
  "nar_what_happened",
  "nar_before_incident",
  "incident_location",
  "nar_injury_illness",
  "nar_object_substance",
  "incident_description",
  "event_title_pred",
  "source_title_pred",
  "nature_title_pred",
] as const;

/**
 * Create the incidents table, its external-content FTS5 index, and the
 * secondary indexes. Idempotent.
 */
export function createCorpusSchema(db: CorpusDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS incidents (
      id INTEGER PRIMARY KEY,
      establishment_name TEXT,
      city TEXT,
      state TEXT,
      naics_code TEXT,
      industry_description TEXT,
      year_filing_for INTEGER,
      date_of_incident TEXT,
      incident_outcome INTEGER,
      dafw_num_away INTEGER NOT NULL DEFAULT 0,
      djtr_num_tr INTEGER NOT NULL DEFAULT 0,
      type_of_incident INTEGER,
      job_description TEXT,
      nar_what_happened TEXT,
      nar_before_incident TEXT,
      incident_location TEXT,
      nar_injury_illness TEXT,
      nar_object_substance TEXT,
      incident_description TEXT,
      nature_title_pred TEXT,
      part_title_pred TEXT,
      event_title_pred TEXT,
      source_title_pred TEXT,
      sec_source_title_pred TEXT
    )
  `);

  db.run(
    sql.raw(`
    CREATE VIRTUAL TABLE IF NOT EXISTS incidents_fts USING fts5(
      ${FTS_COLUMNS.join(",\n      ")},
      content='incidents',
      content_rowid='id'
    )
  `)
  );

  db.run(sql`CREATE INDEX IF NOT EXISTS idx_incident_outcome ON incidents(incident_outcome)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_year ON incidents(year_filing_for)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_event ON incidents(event_title_pred)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_naics ON incidents(naics_code)`);
}

/** Repopulate the FTS index from the incidents table after bulk inserts. */
export function rebuildSearchIndex(db: CorpusDb): void {
  db.run(sql`INSERT INTO incidents_fts(incidents_fts) VALUES('rebuild')`);
}
