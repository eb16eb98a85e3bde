/**
 * Corpus metadata read back from a built SQLite store.
 */

import type Database from 'better-sqlite3';

export interface CorpusMetadata {
  built_at?: string;
  corpus_file?: string;
  record_count: number;
  document_count: number;
}

export function readCorpusMetadata(db: InstanceType<typeof Database>): CorpusMetadata {
  const hasTable = db.prepare<[string], { name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
  );

  const metadata: CorpusMetadata = { record_count: 0, document_count: 0 };

  if (hasTable.get('db_metadata')) {
    const rows = db.prepare<[], { key: string; value: string }>('SELECT key, value FROM db_metadata').all();
    for (const row of rows) {
      if (row.key === 'built_at') metadata.built_at = row.value;
      if (row.key === 'corpus_file') metadata.corpus_file = row.value;
    }
  }

  if (hasTable.get('legal_provisions')) {
    const row = db.prepare<[], { cnt: number }>('SELECT COUNT(*) as cnt FROM legal_provisions').get();
    metadata.record_count = row?.cnt ?? 0;
  }

  if (hasTable.get('legal_documents')) {
    const row = db.prepare<[], { cnt: number }>('SELECT COUNT(*) as cnt FROM legal_documents').get();
    metadata.document_count = row?.cnt ?? 0;
  }

  return metadata;
}
