import { existsSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";
import { CorpusUnavailableError } from "../shared/errors.js";

export type CorpusDb = BetterSQLite3Database<typeof schema>;

export interface CorpusConnection {
  db: CorpusDb;
  sqlite: Database.Database;
}

/**
 * Open an existing corpus file. Query traffic opens it read-only;
 * ingestion passes `readonly: false`.
 */
export function openCorpusDatabase(
  dbPath: string,
  options: { readonly?: boolean } = {}
): CorpusConnection {
  const resolved = path.resolve(dbPath);
  if (!existsSync(resolved)) {
    throw new CorpusUnavailableError(`Corpus database not found: ${resolved}`);
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(resolved, {
      readonly: options.readonly ?? true,
      fileMustExist: true,
    });
  } catch (err) {
    throw new CorpusUnavailableError(`Cannot open corpus database: ${resolved}`, { cause: err });
  }

  return { db: drizzle(sqlite, { schema }), sqlite };
}

/** Create (or truncate to) a writable database for ingestion. */
export function createCorpusDatabase(dbPath: string): CorpusConnection {
  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  return { db: drizzle(sqlite, { schema }), sqlite };
}

/** In-memory corpus, used by tests and throwaway tooling. */
export function createMemoryCorpusDatabase(): CorpusConnection {
  const sqlite = new Database(":memory:");
  return { db: drizzle(sqlite, { schema }), sqlite };
}
