/**
 * SQLite Incident Corpus
 *
 * IncidentCorpus backed by the `incidents` table and its FTS5 index.
 * All queries are synchronous (better-sqlite3) and read-only, so one
 * instance can serve any number of retrieval and scoring calls.
 */

import Database from "better-sqlite3";
import { and, asc, count, desc, eq, gt, gte, inArray, isNotNull, isNull, ne, notInArray, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";

import { incidents } from "../db/schema.js";
import type { IncidentRow } from "../db/schema.js";
import { openCorpusDatabase } from "../db/connection.js";
import type { CorpusConnection, CorpusDb } from "../db/connection.js";
import { CorpusUnavailableError, MalformedQueryError } from "../shared/errors.js";
import type {
  CategoryPredicate,
  CategoryPredicateSet,
  ClassificationField,
  IncidentFilter,
  IncidentOutcome,
  IncidentRecord,
  PredicateField,
  ValueCount,
} from "../shared/types.js";
import type { IncidentCorpus } from "./types.js";

// ── Column maps ──────────────────────────────────────────────────────

const NARRATIVE_COLUMNS: readonly AnySQLiteColumn[] = [
  incidents.narWhatHappened,
  incidents.narBeforeIncident,
  incidents.incidentLocation,
  incidents.narInjuryIllness,
  incidents.narObjectSubstance,
  incidents.incidentDescription,
];

const PREDICATE_COLUMNS: Record<PredicateField, AnySQLiteColumn> = {
  eventType: incidents.eventTitlePred,
  source: incidents.sourceTitlePred,
  whatHappened: incidents.narWhatHappened,
};

const CLASSIFICATION_COLUMNS: Record<ClassificationField, AnySQLiteColumn> = {
  eventType: incidents.eventTitlePred,
  source: incidents.sourceTitlePred,
  secondarySource: incidents.secSourceTitlePred,
  natureOfInjury: incidents.natureTitlePred,
  bodyPart: incidents.partTitlePred,
};

const OUTCOME_CODES: Record<Exclude<IncidentOutcome, "unknown">, number> = {
  fatal: 1,
  days_away: 2,
  job_transfer: 3,
  other_recordable: 4,
};

const FETCH_CHUNK_SIZE = 500;

const MATCH_NONE = sql`0`;
const MATCH_ALL = sql`1`;

// ── Outcome codes ────────────────────────────────────────────────────

/** Map a stored `incident_outcome` code to an outcome; anything outside 1–4 is unknown. */
export function outcomeFromCode(code: number | null): IncidentOutcome {
  switch (code) {
    case 1:
      return "fatal";
    case 2:
      return "days_away";
    case 3:
      return "job_transfer";
    case 4:
      return "other_recordable";
    default:
      return "unknown";
  }
}

export function toIncidentRecord(row: IncidentRow): IncidentRecord {
  return {
    id: row.id,
    establishmentName: row.establishmentName,
    city: row.city,
    state: row.state,
    naicsCode: row.naicsCode,
    industryDescription: row.industryDescription,
    yearFilingFor: row.yearFilingFor,
    dateOfIncident: row.dateOfIncident,
    outcome: outcomeFromCode(row.incidentOutcome),
    daysAway: row.dafwNumAway,
    jobTransferDays: row.djtrNumTr,
    typeOfIncident: row.typeOfIncident,
    jobDescription: row.jobDescription,
    whatHappened: row.narWhatHappened,
    beforeIncident: row.narBeforeIncident,
    location: row.incidentLocation,
    injuryIllness: row.narInjuryIllness,
    objectSubstance: row.narObjectSubstance,
    incidentDescription: row.incidentDescription,
    natureOfInjury: row.natureTitlePred,
    bodyPart: row.partTitlePred,
    eventType: row.eventTitlePred,
    source: row.sourceTitlePred,
    secondarySource: row.secSourceTitlePred,
  };
}

// ── SQL builders ─────────────────────────────────────────────────────

/** Case-insensitive substring match with LIKE wildcards in `text` taken literally. */
export function containsText(column: AnySQLiteColumn, text: string): SQL {
  const escaped = text.replace(/[\\%_]/g, (c) => `\\${c}`);
  return sql`${column} LIKE ${`%${escaped}%`} ESCAPE '\\'`;
}

function compilePredicate(predicate: CategoryPredicate): SQL {
  switch (predicate.kind) {
    case "contains":
      return containsText(PREDICATE_COLUMNS[predicate.field], predicate.text);
    case "all":
      return and(...predicate.of.map(compilePredicate)) ?? MATCH_ALL;
    case "any":
      return or(...predicate.of.map(compilePredicate)) ?? MATCH_NONE;
  }
}

/** OR of the set's clauses; an empty set matches nothing. */
export function compilePredicateSet(set: CategoryPredicateSet): SQL {
  if (set.clauses.length === 0) return MATCH_NONE;
  return or(...set.clauses.map(compilePredicate)) ?? MATCH_NONE;
}

function outcomeCondition(outcome: IncidentOutcome): SQL {
  if (outcome === "unknown") {
    return (
      or(
        isNull(incidents.incidentOutcome),
        notInArray(incidents.incidentOutcome, Object.values(OUTCOME_CODES))
      ) ?? MATCH_NONE
    );
  }
  return eq(incidents.incidentOutcome, OUTCOME_CODES[outcome]);
}

function filterCondition(filter: IncidentFilter): SQL {
  const parts: SQL[] = [compilePredicateSet(filter.predicates)];
  if (filter.outcome !== undefined) parts.push(outcomeCondition(filter.outcome));
  if (filter.minDaysAway !== undefined) parts.push(gte(incidents.dafwNumAway, filter.minDaysAway));
  return and(...parts) ?? MATCH_NONE;
}

// ── Error classification ─────────────────────────────────────────────

function findSqliteError(err: unknown): InstanceType<typeof Database.SqliteError> | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof Database.SqliteError) return current;
    current = current.cause;
  }
  return null;
}

/** A MATCH failure that is about the expression, not the database. */
function isExpressionError(err: unknown): boolean {
  const sqliteErr = findSqliteError(err);
  if (!sqliteErr || sqliteErr.code !== "SQLITE_ERROR") return false;
  return !/no such table|no such module/i.test(sqliteErr.message);
}

// ── Corpus ───────────────────────────────────────────────────────────

export class SqliteIncidentCorpus implements IncidentCorpus {
  private readonly db: CorpusDb;
  private readonly sqlite: Database.Database;

  constructor(connection: CorpusConnection) {
    this.db = connection.db;
    this.sqlite = connection.sqlite;
  }

  /** Open a corpus file read-only. */
  static open(dbPath: string): SqliteIncidentCorpus {
    return new SqliteIncidentCorpus(openCorpusDatabase(dbPath, { readonly: true }));
  }

  private guard<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (err) {
      if (err instanceof CorpusUnavailableError) throw err;
      throw new CorpusUnavailableError(`Corpus query failed (${operation})`, { cause: err });
    }
  }

  searchNarratives(expression: string, limit: number): number[] {
    try {
      const rows = this.db.all<{ rowid: number }>(sql`
        SELECT rowid FROM incidents_fts
        WHERE incidents_fts MATCH ${expression}
        ORDER BY rank
        LIMIT ${limit}
      `);
      return rows.map((r) => r.rowid);
    } catch (err) {
      if (isExpressionError(err)) throw new MalformedQueryError(expression, { cause: err });
      throw new CorpusUnavailableError("Corpus query failed (full-text search)", { cause: err });
    }
  }

  findNarrativeText(text: string, limit: number): number[] {
    const condition = or(...NARRATIVE_COLUMNS.map((c) => containsText(c, text)));
    return this.selectIds("narrative substring", condition ?? MATCH_NONE, limit);
  }

  findClassificationText(text: string, limit: number): number[] {
    const condition = or(
      containsText(incidents.eventTitlePred, text),
      containsText(incidents.sourceTitlePred, text)
    );
    return this.selectIds("classification substring", condition ?? MATCH_NONE, limit);
  }

  findByPredicates(predicates: CategoryPredicateSet, limit: number): number[] {
    if (predicates.clauses.length === 0) return [];
    return this.selectIds("category predicates", compilePredicateSet(predicates), limit);
  }

  private selectIds(operation: string, condition: SQL, limit: number): number[] {
    return this.guard(operation, () =>
      this.db
        .select({ id: incidents.id })
        .from(incidents)
        .where(condition)
        .orderBy(asc(incidents.id))
        .limit(limit)
        .all()
        .map((r) => r.id)
    );
  }

  fetchIncidents(ids: readonly number[]): IncidentRecord[] {
    const unique = [...new Set(ids)];
    const records: IncidentRecord[] = [];
    for (let i = 0; i < unique.length; i += FETCH_CHUNK_SIZE) {
      const chunk = unique.slice(i, i + FETCH_CHUNK_SIZE);
      const rows = this.guard("fetch incidents", () =>
        this.db.select().from(incidents).where(inArray(incidents.id, chunk)).all()
      );
      records.push(...rows.map(toIncidentRecord));
    }
    return records;
  }

  countIncidents(filter: IncidentFilter): number {
    const row = this.guard("count", () =>
      this.db.select({ n: count() }).from(incidents).where(filterCondition(filter)).get()
    );
    return row?.n ?? 0;
  }

  averageDaysAway(filter: IncidentFilter): number {
    const row = this.guard("average days away", () =>
      this.db
        .select({ value: sql<number | null>`avg(${incidents.dafwNumAway})` })
        .from(incidents)
        .where(and(filterCondition(filter), gt(incidents.dafwNumAway, 0)))
        .get()
    );
    return row?.value ?? 0;
  }

  maxDaysAway(filter: IncidentFilter): number {
    const row = this.guard("max days away", () =>
      this.db
        .select({ value: sql<number | null>`max(${incidents.dafwNumAway})` })
        .from(incidents)
        .where(filterCondition(filter))
        .get()
    );
    return row?.value ?? 0;
  }

  topValues(field: ClassificationField, filter: IncidentFilter, limit: number): ValueCount[] {
    const column = CLASSIFICATION_COLUMNS[field];
    const n = sql<number>`count(*)`;
    const rows = this.guard(`top ${field}`, () =>
      this.db
        .select({ value: sql<string>`${column}`, count: n })
        .from(incidents)
        .where(and(filterCondition(filter), isNotNull(column), ne(column, "")))
        .groupBy(column)
        .orderBy(desc(n), asc(column))
        .limit(limit)
        .all()
    );
    return rows.map((r) => ({ value: r.value, count: r.count }));
  }

  countByYear(filter: IncidentFilter): Array<{ year: number; count: number }> {
    const n = sql<number>`count(*)`;
    const rows = this.guard("year breakdown", () =>
      this.db
        .select({ year: incidents.yearFilingFor, count: n })
        .from(incidents)
        .where(and(filterCondition(filter), isNotNull(incidents.yearFilingFor)))
        .groupBy(incidents.yearFilingFor)
        .orderBy(asc(incidents.yearFilingFor))
        .all()
    );
    const result: Array<{ year: number; count: number }> = [];
    for (const r of rows) {
      if (r.year !== null) result.push({ year: r.year, count: r.count });
    }
    return result;
  }

  close(): void {
    this.sqlite.close();
  }
}
