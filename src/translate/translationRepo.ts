import type Database from "better-sqlite3";
import type { TranslationRecord } from "./types.js";

type TranslationRecordRow = {
  filename: string;
  source_lang: string;
  target_lang: string;
  translated_at_ms: number;
};

function toRecord(row: TranslationRecordRow): TranslationRecord {
  return {
    filename: row.filename,
    sourceLang: row.source_lang,
    targetLang: row.target_lang,
    translatedAtMs: row.translated_at_ms,
  };
}

export function isFileTranslated(db: Database.Database, filename: string): boolean {
  const row = db
    .prepare<[string], { found: number }>("SELECT 1 AS found FROM translation_records WHERE filename = ?")
    .get(filename);
  return row !== undefined;
}

export function addTranslationRecord(
  db: Database.Database,
  record: { filename: string; sourceLang: string; targetLang: string },
  nowMs: number = Date.now(),
): void {
  db.prepare<[string, string, string, number]>(`
    INSERT INTO translation_records (filename, source_lang, target_lang, translated_at_ms)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(filename) DO UPDATE SET
      source_lang=excluded.source_lang,
      target_lang=excluded.target_lang,
      translated_at_ms=excluded.translated_at_ms
  `).run(record.filename, record.sourceLang, record.targetLang, nowMs);
}

export function getTranslationRecord(db: Database.Database, filename: string): TranslationRecord | null {
  const row = db
    .prepare<[string], TranslationRecordRow>(`
      SELECT filename, source_lang, target_lang, translated_at_ms
      FROM translation_records
      WHERE filename = ?
    `)
    .get(filename);
  return row ? toRecord(row) : null;
}

export function listTranslationRecords(db: Database.Database): TranslationRecord[] {
  return db
    .prepare<[], TranslationRecordRow>(`
      SELECT filename, source_lang, target_lang, translated_at_ms
      FROM translation_records
      ORDER BY filename
    `)
    .all()
    .map(toRecord);
}

export function removeTranslationRecord(db: Database.Database, filename: string): boolean {
  const result = db.prepare<[string]>("DELETE FROM translation_records WHERE filename = ?").run(filename);
  return result.changes > 0;
}

export function saveCustomTerms(db: Database.Database, content: string, nowMs: number = Date.now()): void {
  db.prepare<[string, number]>(`
    INSERT INTO custom_terms (id, content, updated_at_ms)
    VALUES (1, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      content=excluded.content,
      updated_at_ms=excluded.updated_at_ms
  `).run(content, nowMs);
}

export function getCustomTerms(db: Database.Database): string {
  const row = db
    .prepare<[], { content: string }>("SELECT content FROM custom_terms WHERE id = 1")
    .get();
  return row?.content ?? "";
}
