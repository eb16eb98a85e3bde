#!/usr/bin/env tsx
/**
 * Statute corpus ingestion.
 *
 * Reads the source list (data/sources.json), extracts each statute's text,
 * runs the corpus pipeline and writes data/final_corpus.jsonl.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { runCorpusPipeline, type PipelineStats } from '../src/corpus/pipeline.js';
import type { ProvisionRecord } from '../src/corpus/types.js';
import { getVocabulary } from '../src/corpus/vocabulary.js';
import { writeCorpus } from './lib/corpus-writer.js';
import { readSourceText, type Extractor } from './lib/extractor.js';
import { downloadSource } from './lib/fetcher.js';
import { loadSources, type ResolvedSource } from './lib/sources.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATA_DIR = path.resolve(__dirname, '../data');
const DEFAULT_CONFIG_FILE = path.resolve(DATA_DIR, 'sources.json');
const DEFAULT_OUTPUT_FILE = path.resolve(DATA_DIR, 'final_corpus.jsonl');

interface Args {
  configPath: string;
  outputPath: string;
  skipFetch: boolean;
  refresh: boolean;
  limit: number | null;
  workers: number;
}

type DocumentOutcome =
  | { status: 'ok'; records: ProvisionRecord[]; stats: PipelineStats; extractor: Extractor }
  | { status: 'skipped'; reason: string };

function parseArgs(): Args {
  const args = process.argv.slice(2);
  let configPath = DEFAULT_CONFIG_FILE;
  let outputPath = DEFAULT_OUTPUT_FILE;
  let skipFetch = false;
  let refresh = false;
  let limit: number | null = null;
  let workers = 1;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--skip-fetch') {
      skipFetch = true;
    } else if (arg === '--refresh') {
      refresh = true;
    } else if (arg === '--config' && args[i + 1]) {
      configPath = path.resolve(args[i + 1]);
      i += 1;
    } else if (arg === '--output' && args[i + 1]) {
      outputPath = path.resolve(args[i + 1]);
      i += 1;
    } else if (arg === '--limit' && args[i + 1]) {
      const parsed = Number.parseInt(args[i + 1], 10);
      if (Number.isFinite(parsed) && parsed > 0) {
        limit = parsed;
      }
      i += 1;
    } else if (arg === '--workers' && args[i + 1]) {
      const parsed = Number.parseInt(args[i + 1], 10);
      if (Number.isFinite(parsed) && parsed > 0) {
        workers = parsed;
      }
      i += 1;
    }
  }

  if (skipFetch && refresh) {
    throw new Error('--skip-fetch and --refresh cannot be used together');
  }

  return { configPath, outputPath, skipFetch, refresh, limit, workers };
}

async function processSource(source: ResolvedSource, args: Args): Promise<DocumentOutcome> {
  const { entry, filePath } = source;

  if (entry.url && !args.skipFetch) {
    try {
      await downloadSource(entry.url, filePath, args.refresh);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'skipped', reason: `download failed (${message})` };
    }
  }

  if (!fs.existsSync(filePath)) {
    return { status: 'skipped', reason: `missing file ${path.relative(process.cwd(), filePath)}` };
  }

  let extracted: Awaited<ReturnType<typeof readSourceText>>;
  try {
    extracted = await readSourceText(filePath, source.kind);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'skipped', reason: `extraction failed (${message})` };
  }

  if (!extracted.text.trim()) {
    return { status: 'skipped', reason: 'no text extracted' };
  }

  const { records, stats } = runCorpusPipeline(extracted.text, source.metadata, {
    vocabulary: getVocabulary(source.vocabulary),
  });

  if (records.length === 0) {
    return { status: 'skipped', reason: `no provisions found (${stats.blocks} article headers)` };
  }

  return { status: 'ok', records, stats, extractor: extracted.extractor };
}

async function main(): Promise<void> {
  const args = parseArgs();

  console.log('Statute Corpus — Ingestion');
  console.log('==========================');
  console.log(`Sources: ${args.configPath}`);
  if (args.skipFetch) console.log('Mode: --skip-fetch');
  if (args.refresh) console.log('Mode: --refresh');
  if (args.limit) console.log(`Mode: --limit ${args.limit}`);
  console.log(`Workers: ${args.workers}`);

  const sources = loadSources(args.configPath);
  const items = args.limit ? sources.slice(0, args.limit) : sources;
  console.log(`\nConfigured documents: ${sources.length}`);
  console.log(`Planned ingestion count: ${items.length}`);

  // One buffer per document, merged in configuration order once all are done.
  const outcomes: DocumentOutcome[] = new Array(items.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (true) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) {
        return;
      }

      const source = items[index];
      const outcome = await processSource(source, args);
      outcomes[index] = outcome;

      if (outcome.status === 'ok') {
        const { stats } = outcome;
        console.log(
          `  ${source.entry.code}: ok (${stats.blocks} articles, ${stats.exploded} after paragraph split, `
          + `${stats.kept} kept, ${outcome.extractor})`,
        );
      } else {
        console.log(`  ${source.entry.code}: skip (${outcome.reason})`);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, args.workers) }, () => worker()));

  const records: ProvisionRecord[] = [];
  const skipReasons: string[] = [];
  let written = 0;

  outcomes.forEach((outcome, index) => {
    if (outcome.status === 'ok') {
      records.push(...outcome.records);
      written += 1;
    } else {
      skipReasons.push(`${items[index].entry.code}: ${outcome.reason}`);
    }
  });

  if (records.length === 0) {
    throw new Error('Ingestion produced zero records');
  }

  writeCorpus(args.outputPath, records);

  const paragraphs = records.filter(record => record.section_type === 'PARAGRAPH').length;

  console.log('\nIngestion summary');
  console.log('-----------------');
  console.log(`Documents processed: ${written}`);
  console.log(`Documents skipped: ${skipReasons.length}`);
  console.log(`Article records: ${records.length - paragraphs}`);
  console.log(`Paragraph records: ${paragraphs}`);
  console.log(`Total records: ${records.length} → ${args.outputPath}`);
  if (skipReasons.length > 0) {
    console.log('\nSkipped details:');
    for (const reason of skipReasons) {
      console.log(`  - ${reason}`);
    }
  }
}

main().catch(error => {
  console.error('Fatal ingestion error:', error);
  process.exit(1);
});
