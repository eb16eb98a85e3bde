/**
 * JSONL serialization of provision records.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ProvisionRecord } from '../../src/corpus/types.js';
import { formatIssues } from './sources.js';

export const RECORD_FIELDS = [
  'code',
  'name',
  'official_number',
  'year',
  'section_type',
  'title',
  'article',
  'paragraph',
  'book',
  'chapter',
  'part',
  'valid_from',
  'valid_to',
  'source',
  'body',
] as const satisfies ReadonlyArray<keyof ProvisionRecord>;

export function serializeRecord(record: ProvisionRecord): string {
  const ordered: Record<string, string | number | null> = {};
  for (const field of RECORD_FIELDS) {
    ordered[field] = record[field] ?? null;
  }
  return JSON.stringify(ordered);
}

export function serializeCorpus(records: readonly ProvisionRecord[]): string {
  return records.map(record => `${serializeRecord(record)}\n`).join('');
}

export function writeCorpus(outPath: string, records: readonly ProvisionRecord[]): void {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, serializeCorpus(records), 'utf8');
}

const nullableText = z.string().nullable();

export const ProvisionRecordSchema = z.object({
  code: z.string().min(1),
  name: nullableText,
  official_number: nullableText,
  year: z.number().int().nullable(),
  section_type: z.enum(['ARTICLE', 'PARAGRAPH']),
  title: z.string(),
  article: z.string().min(1),
  paragraph: nullableText,
  book: nullableText,
  chapter: nullableText,
  part: nullableText,
  valid_from: nullableText,
  valid_to: nullableText,
  source: nullableText,
  body: z.string(),
}) satisfies z.ZodType<ProvisionRecord>;

export function parseCorpus(jsonl: string): ProvisionRecord[] {
  const records: ProvisionRecord[] = [];
  const lines = jsonl.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parsed = ProvisionRecordSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      throw new Error(`Line ${i + 1} is not a provision record: ${formatIssues(parsed.error)}`);
    }
    records.push(parsed.data);
  }

  return records;
}

export function readCorpus(inPath: string): ProvisionRecord[] {
  return parseCorpus(fs.readFileSync(inPath, 'utf8'));
}
