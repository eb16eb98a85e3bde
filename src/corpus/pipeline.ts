/**
 * Raw statute text → final provision records.
 *
 * structure detection → per-Article records → paragraph explosion →
 * explanatory filtering. Total over its input: text without headers simply
 * yields no records.
 */

import { dropExplanatory } from './explanatory.js';
import { explodeParagraphs } from './paragraphs.js';
import { buildArticleRecord } from './records.js';
import { detectArticleBlocks } from './structure.js';
import type { DocumentMetadata, ProvisionRecord } from './types.js';
import { ENGLISH_VOCABULARY, type StatuteVocabulary } from './vocabulary.js';

export interface PipelineOptions {
  vocabulary?: StatuteVocabulary;
}

export interface PipelineStats {
  blocks: number;
  articles: number;
  exploded: number;
  kept: number;
}

export interface PipelineResult {
  records: ProvisionRecord[];
  stats: PipelineStats;
}

export function runCorpusPipeline(
  rawText: string,
  metadata: DocumentMetadata,
  options: PipelineOptions = {},
): PipelineResult {
  const vocabulary = options.vocabulary ?? ENGLISH_VOCABULARY;

  if (!rawText.trim()) {
    return { records: [], stats: { blocks: 0, articles: 0, exploded: 0, kept: 0 } };
  }

  const blocks = detectArticleBlocks(rawText, vocabulary);
  const articles = blocks
    .map(block => buildArticleRecord(block, metadata, vocabulary))
    .filter(record => record.body.length > 0);
  const exploded = explodeParagraphs(articles);
  const records = dropExplanatory(exploded, vocabulary);

  return {
    records,
    stats: {
      blocks: blocks.length,
      articles: articles.length,
      exploded: exploded.length,
      kept: records.length,
    },
  };
}

export function buildCorpusRecords(
  rawText: string,
  metadata: DocumentMetadata,
  options: PipelineOptions = {},
): ProvisionRecord[] {
  return runCorpusPipeline(rawText, metadata, options).records;
}
