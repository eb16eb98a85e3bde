/**
 * Contract tests for the SQLite corpus store.
 * Builds an in-memory database from the bundled sample statute.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildCorpusRecords } from '../../src/corpus/pipeline.js';
import { readCorpusMetadata } from '../../src/utils/metadata.js';
import {
  createCorpusSchema,
  getProvisions,
  insertRecords,
  makeProvisionRef,
  openCorpusDatabase,
  searchProvisions,
  writeDbMetadata,
  type CorpusDatabase,
} from '../../scripts/lib/database.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const SAMPLE_FILE = path.resolve(__dirname, '../../data/text/sample-statute.txt');

let db: CorpusDatabase;

beforeAll(() => {
  const records = buildCorpusRecords(fs.readFileSync(SAMPLE_FILE, 'utf8'), {
    code: 'SAMPLE_LIBRARIES_ACT',
    name: 'Public Libraries Act (sample)',
    year: 2021,
    source: 'sample-statute.txt',
  });

  db = openCorpusDatabase(':memory:');
  createCorpusSchema(db);
  insertRecords(db, records);
  writeDbMetadata(db, { built_at: '2026-01-01T00:00:00.000Z', corpus_file: 'final_corpus.jsonl' });
});

afterAll(() => {
  db.close();
});

describe('Database integrity', () => {
  it('should contain one document row per statute', () => {
    const row = db.prepare<[], { cnt: number }>('SELECT COUNT(*) as cnt FROM legal_documents').get();
    expect(row?.cnt).toBe(1);
  });

  it('should contain one provision row per record', () => {
    const row = db.prepare<[], { cnt: number }>('SELECT COUNT(*) as cnt FROM legal_provisions').get();
    expect(row?.cnt).toBe(8);
  });

  it('should have a working FTS index', () => {
    const rows = searchProvisions(db, 'board');
    expect(rows.map(row => row.provision_ref).sort()).toEqual(['art3-par1', 'art3-par2', 'art3a']);
  });
});

describe('Article retrieval', () => {
  it('should return the paragraphs of an article in source order', () => {
    const rows = getProvisions(db, 'SAMPLE_LIBRARIES_ACT', '3');

    expect(rows.map(row => [row.section_type, row.paragraph, row.chapter, row.part])).toEqual([
      ['PARAGRAPH', '1', 'II', '1'],
      ['PARAGRAPH', '2', 'II', '1'],
      ['PARAGRAPH', '3', 'II', '1'],
    ]);
    expect(rows[1].content).toBe('The board consists of at least five members.');
  });

  it('should return an unexploded article as a single row', () => {
    const rows = getProvisions(db, 'SAMPLE_LIBRARIES_ACT', '4');
    expect(rows).toHaveLength(1);
    expect(rows[0].section_type).toBe('ARTICLE');
    expect(rows[0].paragraph).toBeNull();
  });
});

describe('Negative tests', () => {
  it('should return no results for a fictional document', () => {
    expect(getProvisions(db, 'FICTIONAL_ACT_2099', '1')).toEqual([]);
  });

  it('should not store explanatory boilerplate', () => {
    const row = db.prepare<[], { cnt: number }>(
      "SELECT COUNT(*) as cnt FROM legal_provisions WHERE lower(content) LIKE 'sufficiently clear%'",
    ).get();
    expect(row?.cnt).toBe(0);
  });
});

describe('Metadata', () => {
  it('should read corpus metadata back', () => {
    expect(readCorpusMetadata(db)).toEqual({
      built_at: '2026-01-01T00:00:00.000Z',
      corpus_file: 'final_corpus.jsonl',
      record_count: 8,
      document_count: 1,
    });
  });

  it('should report zero counts for a database without a schema', () => {
    const empty = openCorpusDatabase(':memory:');
    try {
      expect(readCorpusMetadata(empty)).toEqual({ record_count: 0, document_count: 0 });
    } finally {
      empty.close();
    }
  });
});

describe('makeProvisionRef', () => {
  it('should build article and paragraph references', () => {
    expect(makeProvisionRef({ article: '3A', paragraph: null })).toBe('art3a');
    expect(makeProvisionRef({ article: '12', paragraph: '4' })).toBe('art12-par4');
    expect(makeProvisionRef({ article: 'IV', paragraph: null })).toBe('artiv');
  });
});
