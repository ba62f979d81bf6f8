import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { cfg } from "./config/env.js";
import { log } from "./utils/logger.js";

const dbLog = log.withScope("db");

const dbByPath = new Map<string, Database.Database>();

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS translation_records (
  filename TEXT PRIMARY KEY,
  source_lang TEXT NOT NULL,
  target_lang TEXT NOT NULL,
  translated_at_ms INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS custom_terms (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  content TEXT NOT NULL,
  updated_at_ms INTEGER NOT NULL
);
`;

function assertTestDbPathSafety(dbPath: string): void {
  if (process.env.NODE_ENV !== "test") return;

  const resolvedTmpRoot = path.resolve(os.tmpdir());
  const normalize = (value: string) => path.normalize(value).toLowerCase();

  if (!normalize(dbPath).startsWith(normalize(resolvedTmpRoot + path.sep))) {
    throw new Error(
      `[db-test-safety] Refusing non-temp DB path in test mode: ${dbPath}. Expected under ${resolvedTmpRoot}`,
    );
  }
}

export function resolveTranslationDbPath(workingDir: string): string {
  return path.join(path.resolve(workingDir), cfg.db.filename);
}

function bootstrapDbAtPath(dbPath: string): Database.Database {
  assertTestDbPathSafety(dbPath);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA_SQL);
  return db;
}

/** One connection per working directory, opened on first use. */
export function getDbForDirectory(workingDir: string): Database.Database {
  const dbPath = resolveTranslationDbPath(workingDir);
  const existing = dbByPath.get(dbPath);
  if (existing) {
    dbLog.trace("cache-hit", { dbPath });
    return existing;
  }

  const db = bootstrapDbAtPath(dbPath);
  dbByPath.set(dbPath, db);
  dbLog.debug("opened-new", { dbPath });
  return db;
}

export function closeDbForDirectory(workingDir: string): void {
  const dbPath = resolveTranslationDbPath(workingDir);
  const db = dbByPath.get(dbPath);
  if (!db) return;
  db.close();
  dbByPath.delete(dbPath);
  dbLog.debug("closed", { dbPath });
}
