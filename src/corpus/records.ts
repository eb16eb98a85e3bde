/**
 * Article block → flat provision record.
 */

import { normalizeText } from './normalizer.js';
import type { ArticleBlock, DocumentMetadata, ProvisionRecord } from './types.js';
import { ENGLISH_VOCABULARY, type StatuteVocabulary } from './vocabulary.js';

export function buildArticleRecord(
  block: ArticleBlock,
  metadata: DocumentMetadata,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): ProvisionRecord {
  return {
    code: metadata.code,
    name: metadata.name ?? null,
    official_number: metadata.official_number ?? null,
    year: metadata.year ?? null,
    section_type: 'ARTICLE',
    title: `${vocabulary.article} ${block.label}`,
    article: block.label,
    paragraph: null,
    book: block.book?.label ?? null,
    chapter: block.chapter?.label ?? null,
    part: block.part?.label ?? null,
    valid_from: metadata.valid_from ?? null,
    valid_to: metadata.valid_to ?? null,
    source: metadata.source ?? null,
    body: normalizeText(block.body),
  };
}
