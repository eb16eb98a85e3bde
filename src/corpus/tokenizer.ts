/**
 * Line-anchored header tokenizer.
 *
 * Scans raw statute text for BOOK / CHAPTER / PART / ARTICLE headers and
 * returns them as one typed stream ordered by offset. Everything downstream
 * works on tokens, not on the patterns that produced them.
 */

import type { HierarchyType } from './types.js';
import { ENGLISH_VOCABULARY, escapeRegExp, type StatuteVocabulary } from './vocabulary.js';

export type StructureTokenKind = HierarchyType | 'ARTICLE';

export interface StructureToken {
  kind: StructureTokenKind;
  label: string;
  /** Text following the numeral on a BOOK / CHAPTER / PART line; empty for articles. */
  title: string;
  /** Start of the header line. */
  offset: number;
  length: number;
}

interface HeaderPattern {
  kind: StructureTokenKind;
  regex: RegExp;
}

const KIND_ORDER: Record<StructureTokenKind, number> = {
  BOOK: 0,
  CHAPTER: 1,
  PART: 2,
  ARTICLE: 3,
};

const patternCache = new Map<StatuteVocabulary, HeaderPattern[]>();

function divisionPattern(keyword: string, numeral: string): RegExp {
  // Numeral must end at whitespace or line end; the rest of the line is the title.
  return new RegExp(
    `^[ \\t]*${escapeRegExp(keyword)}[ \\t]+(${numeral})(?=\\s|$)[^\\S\\n]*(.*)$`,
    'gim',
  );
}

function buildPatterns(vocabulary: StatuteVocabulary): HeaderPattern[] {
  return [
    { kind: 'BOOK', regex: divisionPattern(vocabulary.book, '[IVXLC]+') },
    { kind: 'CHAPTER', regex: divisionPattern(vocabulary.chapter, '[IVXLC]+') },
    { kind: 'PART', regex: divisionPattern(vocabulary.part, '[0-9IVXLC]+') },
    {
      kind: 'ARTICLE',
      // Header must be the whole line, so "Article 5 applies" in running text is not a header.
      regex: new RegExp(
        `^[ \\t]*${escapeRegExp(vocabulary.article)}[ \\t]+(\\d+[A-Za-z]?|[IVXLCM]+)[^\\S\\n]*$`,
        'gim',
      ),
    },
  ];
}

function patternsFor(vocabulary: StatuteVocabulary): HeaderPattern[] {
  let patterns = patternCache.get(vocabulary);
  if (!patterns) {
    patterns = buildPatterns(vocabulary);
    patternCache.set(vocabulary, patterns);
  }
  return patterns;
}

export function tokenizeStructure(
  text: string,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): StructureToken[] {
  const tokens: StructureToken[] = [];

  for (const { kind, regex } of patternsFor(vocabulary)) {
    for (const match of text.matchAll(regex)) {
      tokens.push({
        kind,
        label: match[1].trim(),
        title: (match[2] ?? '').trim(),
        offset: match.index ?? 0,
        length: match[0].length,
      });
    }
  }

  return tokens.sort((a, b) => a.offset - b.offset || KIND_ORDER[a.kind] - KIND_ORDER[b.kind]);
}
