/**
 * Case Detail Ingestion
 *
 * Loads OSHA ITA case-detail CSV exports into the incidents table:
 * decode (UTF-8, else Latin-1) → parse → keep construction rows
 * (NAICS 23xxxx) with an integer id → insert → rebuild the FTS index.
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { asc, count, desc, eq, isNotNull, ne, sql } from "drizzle-orm";
import { z } from "zod";

import type { CorpusDb } from "../db/connection.js";
import { rebuildSearchIndex } from "../db/migrate.js";
import { incidents } from "../db/schema.js";
import type { NewIncidentRow } from "../db/schema.js";
import { sha256Bytes } from "../shared/hash.js";

export const CONSTRUCTION_NAICS_PREFIX = "23";
const INSERT_BATCH_SIZE = 200;

// ── Row schema ───────────────────────────────────────────────────────

function parseIntOrNull(v: unknown): number | null {
  if (typeof v === "number") return Number.isInteger(v) ? v : null;
  if (typeof v !== "string") return null;
  const trimmed = v.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

const OptionalText = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? v.trim() : null),
  z.string().nullable()
);

const OptionalInt = z.preprocess(parseIntOrNull, z.number().int().nullable());

const DayCount = z.preprocess((v) => parseIntOrNull(v) ?? 0, z.number().int());

export const CaseDetailRowSchema = z.object({
  id: OptionalInt,
  establishment_name: OptionalText,
  city: OptionalText,
  state: OptionalText,
  naics_code: OptionalText,
  industry_description: OptionalText,
  year_filing_for: OptionalInt,
  date_of_incident: OptionalText,
  incident_outcome: OptionalInt,
  dafw_num_away: DayCount,
  djtr_num_tr: DayCount,
  type_of_incident: OptionalInt,
  job_description: OptionalText,
  NEW_NAR_WHAT_HAPPENED: OptionalText,
  NEW_NAR_BEFORE_INCIDENT: OptionalText,
  NEW_INCIDENT_LOCATION: OptionalText,
  NEW_NAR_INJURY_ILLNESS: OptionalText,
  NEW_NAR_OBJECT_SUBSTANCE: OptionalText,
  NEW_INCIDENT_DESCRIPTION: OptionalText,
  nature_title_pred: OptionalText,
  part_title_pred: OptionalText,
  event_title_pred: OptionalText,
  source_title_pred: OptionalText,
  sec_source_title_pred: OptionalText,
});

/**
 * Map one CSV record to an incidents row, or null when it is not a
 * construction incident or has no usable id.
 */
export function mapCaseDetailRow(raw: Record<string, string>): NewIncidentRow | null {
  const parsed = CaseDetailRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;

  if (!r.naics_code?.startsWith(CONSTRUCTION_NAICS_PREFIX)) return null;
  if (r.id === null) return null;

  return {
    id: r.id,
    establishmentName: r.establishment_name,
    city: r.city,
    state: r.state,
    naicsCode: r.naics_code,
    industryDescription: r.industry_description,
    yearFilingFor: r.year_filing_for,
    dateOfIncident: r.date_of_incident,
    incidentOutcome: r.incident_outcome,
    dafwNumAway: r.dafw_num_away,
    djtrNumTr: r.djtr_num_tr,
    typeOfIncident: r.type_of_incident,
    jobDescription: r.job_description,
    narWhatHappened: r.NEW_NAR_WHAT_HAPPENED,
    narBeforeIncident: r.NEW_NAR_BEFORE_INCIDENT,
    incidentLocation: r.NEW_INCIDENT_LOCATION,
    narInjuryIllness: r.NEW_NAR_INJURY_ILLNESS,
    narObjectSubstance: r.NEW_NAR_OBJECT_SUBSTANCE,
    incidentDescription: r.NEW_INCIDENT_DESCRIPTION,
    natureTitlePred: r.nature_title_pred,
    partTitlePred: r.part_title_pred,
    eventTitlePred: r.event_title_pred,
    sourceTitlePred: r.source_title_pred,
    secSourceTitlePred: r.sec_source_title_pred,
  };
}

// ── Decoding & parsing ───────────────────────────────────────────────

export type CsvEncoding = "utf-8" | "latin1";

/** Decode strict UTF-8, falling back to Latin-1 for Windows exports. */
export function decodeCsv(buffer: Buffer): { text: string; encoding: CsvEncoding } {
  try {
    return { text: new TextDecoder("utf-8", { fatal: true }).decode(buffer), encoding: "utf-8" };
  } catch {
    return { text: buffer.toString("latin1"), encoding: "latin1" };
  }
}

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

export function parseCaseDetailCsv(text: string): Record<string, string>[] {
  const records: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });
  return CsvRecordsSchema.parse(records);
}

// ── Ingestion ────────────────────────────────────────────────────────

export interface FileIngestResult {
  file: string;
  sha256: string;
  encoding: CsvEncoding;
  rowsRead: number;
  rowsLoaded: number;
}

export interface IngestReport {
  files: FileIngestResult[];
  skippedFiles: string[];
  totalLoaded: number;
}

function insertRows(db: CorpusDb, rows: NewIncidentRow[]): number {
  let loaded = 0;
  db.transaction((tx) => {
    for (let i = 0; i < rows.length; i += INSERT_BATCH_SIZE) {
      const batch = rows.slice(i, i + INSERT_BATCH_SIZE);
      loaded += tx.insert(incidents).values(batch).onConflictDoNothing().run().changes;
    }
  });
  return loaded;
}

/** Ingest one CSV buffer; exported for callers that already hold the bytes. */
export function ingestCaseDetailBuffer(db: CorpusDb, buffer: Buffer, file: string): FileIngestResult {
  const { text, encoding } = decodeCsv(buffer);
  const records = parseCaseDetailCsv(text);
  const rows: NewIncidentRow[] = [];
  for (const record of records) {
    const row = mapCaseDetailRow(record);
    if (row) rows.push(row);
  }

  return {
    file,
    sha256: sha256Bytes(buffer),
    encoding,
    rowsRead: records.length,
    rowsLoaded: insertRows(db, rows),
  };
}

/**
 * Ingest every file, then rebuild the full-text index once.
 * Missing files are reported and skipped.
 */
export function ingestCaseDetailFiles(db: CorpusDb, files: string[]): IngestReport {
  const report: IngestReport = { files: [], skippedFiles: [], totalLoaded: 0 };

  for (const file of files) {
    if (!existsSync(file)) {
      console.warn(`[corpus] File not found, skipping: ${file}`);
      report.skippedFiles.push(file);
      continue;
    }
    console.log(`[corpus] Loading ${path.basename(file)}...`);
    const result = ingestCaseDetailBuffer(db, readFileSync(file), file);
    console.log(`[corpus]   ${result.encoding}: ${result.rowsLoaded} of ${result.rowsRead} rows loaded`);
    report.files.push(result);
    report.totalLoaded += result.rowsLoaded;
  }

  rebuildSearchIndex(db);
  return report;
}

// ── Summary ──────────────────────────────────────────────────────────

export interface CorpusSummary {
  totalRows: number;
  fatalCount: number;
  daysAwayCount: number;
  topEventTypes: Array<{ eventType: string; count: number }>;
}

export function summarizeCorpus(db: CorpusDb): CorpusSummary {
  const countWhere = (outcome?: number): number =>
    db
      .select({ n: count() })
      .from(incidents)
      .where(outcome === undefined ? undefined : eq(incidents.incidentOutcome, outcome))
      .get()?.n ?? 0;

  const n = sql<number>`count(*)`;
  const topEventTypes = db
    .select({ eventType: sql<string>`${incidents.eventTitlePred}`, count: n })
    .from(incidents)
    .where(sql`${isNotNull(incidents.eventTitlePred)} AND ${ne(incidents.eventTitlePred, "")}`)
    .groupBy(incidents.eventTitlePred)
    .orderBy(desc(n), asc(incidents.eventTitlePred))
    .limit(5)
    .all();

  return {
    totalRows: countWhere(),
    fatalCount: countWhere(1),
    daysAwayCount: countWhere(2),
    topEventTypes,
  };
}
