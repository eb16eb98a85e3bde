/**
 * SQLite corpus store.
 *
 * One row per statute in legal_documents, one row per record in
 * legal_provisions, an FTS5 index over provision titles and bodies, and a
 * small key/value db_metadata table.
 */

import Database from 'better-sqlite3';
import type { ProvisionRecord } from '../../src/corpus/types.js';

export type CorpusDatabase = InstanceType<typeof Database>;

export interface ProvisionRow {
  id: number;
  document_id: string;
  provision_ref: string;
  section_type: string;
  title: string;
  article: string;
  paragraph: string | null;
  book: string | null;
  chapter: string | null;
  part: string | null;
  content: string;
}

export interface InsertSummary {
  documents: number;
  provisions: number;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS legal_documents (
  id TEXT PRIMARY KEY,
  name TEXT,
  official_number TEXT,
  year INTEGER,
  valid_from TEXT,
  valid_to TEXT,
  source TEXT
);

CREATE TABLE IF NOT EXISTS legal_provisions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  document_id TEXT NOT NULL REFERENCES legal_documents(id),
  provision_ref TEXT NOT NULL,
  section_type TEXT NOT NULL CHECK (section_type IN ('ARTICLE', 'PARAGRAPH')),
  title TEXT NOT NULL,
  article TEXT NOT NULL,
  paragraph TEXT,
  book TEXT,
  chapter TEXT,
  part TEXT,
  content TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_provisions_document_article
  ON legal_provisions(document_id, article);

CREATE VIRTUAL TABLE IF NOT EXISTS provisions_fts USING fts5(title, content);

CREATE TABLE IF NOT EXISTS db_metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

export function openCorpusDatabase(filename: string, options: Database.Options = {}): CorpusDatabase {
  const db = new Database(filename, options);
  db.pragma('journal_mode = DELETE');
  db.pragma('foreign_keys = ON');
  return db;
}

export function createCorpusSchema(db: CorpusDatabase): void {
  db.exec(SCHEMA);
}

export function makeProvisionRef(record: Pick<ProvisionRecord, 'article' | 'paragraph'>): string {
  const slug = (value: string): string =>
    value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || value.toLowerCase();

  const article = `art${slug(record.article)}`;
  return record.paragraph === null ? article : `${article}-par${slug(record.paragraph)}`;
}

export function insertRecords(db: CorpusDatabase, records: readonly ProvisionRecord[]): InsertSummary {
  const insertDocument = db.prepare<[string, string | null, string | null, number | null, string | null, string | null, string | null]>(
    `INSERT INTO legal_documents (id, name, official_number, year, valid_from, valid_to, source)
     VALUES (?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(id) DO NOTHING`,
  );
  const insertProvision = db.prepare<[string, string, string, string, string, string | null, string | null, string | null, string | null, string]>(
    `INSERT INTO legal_provisions
       (document_id, provision_ref, section_type, title, article, paragraph, book, chapter, part, content)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const insertFts = db.prepare<[number | bigint, string, string]>(
    'INSERT INTO provisions_fts (rowid, title, content) VALUES (?, ?, ?)',
  );

  const run = db.transaction((batch: readonly ProvisionRecord[]): InsertSummary => {
    let documents = 0;
    for (const record of batch) {
      const inserted = insertDocument.run(
        record.code,
        record.name,
        record.official_number,
        record.year,
        record.valid_from,
        record.valid_to,
        record.source,
      );
      documents += inserted.changes;

      const provision = insertProvision.run(
        record.code,
        makeProvisionRef(record),
        record.section_type,
        record.title,
        record.article,
        record.paragraph,
        record.book,
        record.chapter,
        record.part,
        record.body,
      );
      insertFts.run(provision.lastInsertRowid, record.title, record.body);
    }
    return { documents, provisions: batch.length };
  });

  return run(records);
}

export function writeDbMetadata(db: CorpusDatabase, entries: Record<string, string>): void {
  const upsert = db.prepare<[string, string]>(
    'INSERT INTO db_metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
  );
  const run = db.transaction((pairs: Array<[string, string]>) => {
    for (const [key, value] of pairs) {
      upsert.run(key, value);
    }
  });
  run(Object.entries(entries));
}

export function searchProvisions(db: CorpusDatabase, query: string, limit = 20): ProvisionRow[] {
  return db.prepare<[string, number], ProvisionRow>(
    `SELECT p.id, p.document_id, p.provision_ref, p.section_type, p.title, p.article,
            p.paragraph, p.book, p.chapter, p.part, p.content
       FROM provisions_fts f
       JOIN legal_provisions p ON p.id = f.rowid
      WHERE provisions_fts MATCH ?
      ORDER BY rank
      LIMIT ?`,
  ).all(query, limit);
}

export function getProvisions(db: CorpusDatabase, documentId: string, article: string): ProvisionRow[] {
  return db.prepare<[string, string], ProvisionRow>(
    `SELECT id, document_id, provision_ref, section_type, title, article,
            paragraph, book, chapter, part, content
       FROM legal_provisions
      WHERE document_id = ? AND article = ?
      ORDER BY id`,
  ).all(documentId, article);
}
