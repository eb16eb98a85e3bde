#!/usr/bin/env tsx
/**
 * Load data/final_corpus.jsonl into a searchable SQLite database.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { readCorpusMetadata } from '../src/utils/metadata.js';
import { readCorpus } from './lib/corpus-writer.js';
import { createCorpusSchema, insertRecords, openCorpusDatabase, writeDbMetadata } from './lib/database.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATA_DIR = path.resolve(__dirname, '../data');

function parseArgs(): { inputPath: string; dbPath: string } {
  const args = process.argv.slice(2);
  let inputPath = path.resolve(DATA_DIR, 'final_corpus.jsonl');
  let dbPath = path.resolve(DATA_DIR, 'database.db');

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--input' && args[i + 1]) {
      inputPath = path.resolve(args[i + 1]);
      i += 1;
    } else if (args[i] === '--db' && args[i + 1]) {
      dbPath = path.resolve(args[i + 1]);
      i += 1;
    }
  }

  return { inputPath, dbPath };
}

function main(): void {
  const { inputPath, dbPath } = parseArgs();

  console.log('Statute Corpus — Database Build');
  console.log('===============================');
  console.log(`Corpus: ${inputPath}`);
  console.log(`Database: ${dbPath}`);

  if (!fs.existsSync(inputPath)) {
    throw new Error(`Corpus file not found: ${inputPath} (run the ingest script first)`);
  }

  const records = readCorpus(inputPath);
  if (records.length === 0) {
    throw new Error(`Corpus file has no records: ${inputPath}`);
  }

  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  if (fs.existsSync(dbPath)) {
    fs.unlinkSync(dbPath);
  }

  const db = openCorpusDatabase(dbPath);
  try {
    createCorpusSchema(db);
    const summary = insertRecords(db, records);
    writeDbMetadata(db, {
      built_at: new Date().toISOString(),
      corpus_file: path.basename(inputPath),
      record_count: String(summary.provisions),
      document_count: String(summary.documents),
    });

    const metadata = readCorpusMetadata(db);
    console.log(`\nDocuments: ${metadata.document_count}`);
    console.log(`Provisions: ${metadata.record_count}`);
    console.log(`Built at: ${metadata.built_at ?? 'unknown'}`);
  } finally {
    db.close();
  }
}

try {
  main();
} catch (error) {
  console.error('Fatal database build error:', error);
  process.exit(1);
}
