/**
 * Structure detection for raw statute text.
 *
 * Splits a document into contiguous Article blocks and tags each block with
 * the Book, Chapter and Part it sits under. Text before the first Article
 * header is not part of any block.
 */

import { MarkerIndex } from './marker-index.js';
import { tokenizeStructure, type StructureToken } from './tokenizer.js';
import type { ArticleBlock, HierarchyMarker, HierarchyType } from './types.js';
import { ENGLISH_VOCABULARY, escapeRegExp, type StatuteVocabulary } from './vocabulary.js';

export interface DocumentStructure {
  books: MarkerIndex;
  chapters: MarkerIndex;
  parts: MarkerIndex;
  blocks: ArticleBlock[];
}

function isHierarchyToken(token: StructureToken): token is StructureToken & { kind: HierarchyType } {
  return token.kind !== 'ARTICLE';
}

function toMarker(token: StructureToken & { kind: HierarchyType }): HierarchyMarker {
  return {
    type: token.kind,
    label: token.label,
    title: token.title,
    offset: token.offset,
  };
}

/**
 * Remove the "Article <label>" header line from the start of a block span.
 * Only the first occurrence is touched. Accepts the same line ends as the
 * tokenizer's multiline anchors, bare "\r" included.
 */
export function stripArticleHeader(
  span: string,
  label: string,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): string {
  const header = new RegExp(
    `^[ \\t]*${escapeRegExp(vocabulary.article)}[ \\t]+${escapeRegExp(label)}[^\\S\\r\\n]*(?:\\r\\n?|\\n|$)`,
    'i',
  );
  return span.replace(header, '');
}

export function detectStructure(
  text: string,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): DocumentStructure {
  const tokens = tokenizeStructure(text, vocabulary);
  const markers = tokens.filter(isHierarchyToken).map(toMarker);

  const books = new MarkerIndex('BOOK', markers);
  const chapters = new MarkerIndex('CHAPTER', markers);
  const parts = new MarkerIndex('PART', markers);

  const articles = tokens.filter(token => token.kind === 'ARTICLE');
  const blocks = articles.map((token, index): ArticleBlock => {
    const start = token.offset;
    const end = index + 1 < articles.length ? articles[index + 1].offset : text.length;
    const span = text.slice(start, end);

    return {
      label: token.label,
      start,
      end,
      text: span,
      body: stripArticleHeader(span, token.label, vocabulary),
      book: books.nearestAtOrBefore(start),
      chapter: chapters.nearestAtOrBefore(start),
      part: parts.nearestAtOrBefore(start),
    };
  });

  return { books, chapters, parts, blocks };
}

export function detectArticleBlocks(
  text: string,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): ArticleBlock[] {
  return detectStructure(text, vocabulary).blocks;
}
