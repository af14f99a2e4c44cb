import { sqliteTable, integer, text } from "drizzle-orm/sqlite-core";

// ── Incidents ──────────────────────────────────────────────────────
export const incidents = sqliteTable("incidents", {
  id: integer("id").primaryKey(),
  establishmentName: text("establishment_name"),
  city: text("city"),
  state: text("state"),
  naicsCode: text("naics_code"),
  industryDescription: text("industry_description"),
  yearFilingFor: integer("year_filing_for"),
  dateOfIncident: text("date_of_incident"),
  incidentOutcome: integer("incident_outcome"),
  dafwNumAway: integer("dafw_num_away").notNull().default(0),
  djtrNumTr: integer("djtr_num_tr").notNull().default(0),
  typeOfIncident: integer("type_of_incident"),
  jobDescription: text("job_description"),
  narWhatHappened: text("nar_what_happened"),
  narBeforeIncident: text("nar_before_incident"),
  incidentLocation: text("incident_location"),
  narInjuryIllness: text("nar_injury_illness"),
  narObjectSubstance: text("nar_object_substance"),
  incidentDescription: text("incident_description"),
  natureTitlePred: text("nature_title_pred"),
  partTitlePred: text("part_title_pred"),
  eventTitlePred: text("event_title_pred"),
  sourceTitlePred: text("source_title_pred"),
  secSourceTitlePred: text("sec_source_title_pred"),
});

export type IncidentRow = typeof incidents.$inferSelect;
export type NewIncidentRow = typeof incidents.$inferInsert;
