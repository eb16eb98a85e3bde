/**
 * Explanatory-annex filter.
 *
 * Lexical only: an explanatory entry worded differently from the
 * vocabulary's boilerplate is kept.
 */

import type { ProvisionRecord } from './types.js';
import { ENGLISH_VOCABULARY, type StatuteVocabulary } from './vocabulary.js';

export function isExplanatory(
  record: Pick<ProvisionRecord, 'title' | 'body'>,
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): boolean {
  if (record.title.toLowerCase().includes(vocabulary.explanatoryTitle)) {
    return true;
  }
  return record.body.trimStart().toLowerCase().startsWith(vocabulary.sufficientlyClear);
}

export function dropExplanatory(
  records: readonly ProvisionRecord[],
  vocabulary: StatuteVocabulary = ENGLISH_VOCABULARY,
): ProvisionRecord[] {
  return records.filter(record => !isExplanatory(record, vocabulary));
}
