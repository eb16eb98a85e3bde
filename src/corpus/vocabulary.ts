/**
 * Drafting vocabularies: the header keywords and explanatory phrases a
 * statute is written with.
 */

export type VocabularyId = 'en' | 'id';

export interface StatuteVocabulary {
  id: VocabularyId;
  book: string;
  chapter: string;
  part: string;
  article: string;
  /** Lower-case word that marks an explanatory annex in a record title. */
  explanatoryTitle: string;
  /** Lower-case boilerplate opening an explanatory entry that adds nothing. */
  sufficientlyClear: string;
}

export const ENGLISH_VOCABULARY: StatuteVocabulary = {
  id: 'en',
  book: 'BOOK',
  chapter: 'CHAPTER',
  part: 'PART',
  article: 'Article',
  explanatoryTitle: 'explanatory',
  sufficientlyClear: 'sufficiently clear',
};

// Indonesian statutes: BUKU / BAB / Bagian / Pasal, annex "Penjelasan".
export const INDONESIAN_VOCABULARY: StatuteVocabulary = {
  id: 'id',
  book: 'BUKU',
  chapter: 'BAB',
  part: 'Bagian',
  article: 'Pasal',
  explanatoryTitle: 'penjelasan',
  sufficientlyClear: 'cukup jelas',
};

const VOCABULARIES: Record<VocabularyId, StatuteVocabulary> = {
  en: ENGLISH_VOCABULARY,
  id: INDONESIAN_VOCABULARY,
};

export function getVocabulary(id: VocabularyId): StatuteVocabulary {
  return VOCABULARIES[id];
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
