/**
 * Source list for corpus ingestion.
 *
 * Each entry names one statute file (PDF or already-extracted text), an
 * optional download URL and the metadata carried onto every record.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { DocumentMetadata } from '../../src/corpus/types.js';
import type { VocabularyId } from '../../src/corpus/vocabulary.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const SourceEntrySchema = z.object({
  file: z.string().min(1),
  url: z.string().url().optional(),
  code: z.string().min(1),
  name: z.string().min(1).nullable().default(null),
  official_number: z.string().min(1).nullable().default(null),
  year: z.number().int().nullable().default(null),
  valid_from: isoDate.nullable().default(null),
  valid_to: isoDate.nullable().default(null),
  vocabulary: z.enum(['en', 'id']).default('en'),
});

export const SourceListSchema = z.array(SourceEntrySchema).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.code)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'code'],
        message: `duplicate document code "${entry.code}"`,
      });
    }
    seen.add(entry.code);
  });
});

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export interface ResolvedSource {
  entry: SourceEntry;
  /** Absolute path of the local file. */
  filePath: string;
  kind: 'pdf' | 'text';
  vocabulary: VocabularyId;
  metadata: DocumentMetadata;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseSourceList(raw: unknown): SourceEntry[] {
  const parsed = SourceListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid source configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function resolveSource(entry: SourceEntry, baseDir: string): ResolvedSource {
  const filePath = path.resolve(baseDir, entry.file);
  const extension = path.extname(filePath).toLowerCase();

  return {
    entry,
    filePath,
    kind: extension === '.pdf' ? 'pdf' : 'text',
    vocabulary: entry.vocabulary,
    metadata: {
      code: entry.code,
      name: entry.name,
      official_number: entry.official_number,
      year: entry.year,
      valid_from: entry.valid_from,
      valid_to: entry.valid_to,
      source: path.basename(filePath),
    },
  };
}

export function loadSources(configPath: string): ResolvedSource[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read source configuration (${configPath}): ${message}`);
  }

  const baseDir = path.dirname(configPath);
  return parseSourceList(raw).map(entry => resolveSource(entry, baseDir));
}
