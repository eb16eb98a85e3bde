/**
 * Article → numbered-paragraph explosion.
 *
 * Markers are trusted by position: the digits inside "(n)" become the
 * paragraph label verbatim, with no check on order or uniqueness. A bare
 * "(12)" citation inside running text counts as a marker too.
 */

import { PARAGRAPH_MARKER } from './normalizer.js';
import type { ProvisionRecord } from './types.js';

export const MIN_PARAGRAPH_MARKERS = 2;

export interface ParagraphRun {
  label: string;
  text: string;
}

/**
 * Pair each marker's digits with the trimmed text up to the next marker.
 * Text before the first marker is discarded; empty runs are kept here and
 * dropped by the caller.
 */
export function splitParagraphRuns(body: string): ParagraphRun[] {
  const markers = [...body.matchAll(PARAGRAPH_MARKER)];

  return markers.map((marker, index) => {
    const from = (marker.index ?? 0) + marker[0].length;
    const to = index + 1 < markers.length ? markers[index + 1].index ?? body.length : body.length;
    return {
      label: marker[1],
      text: body.slice(from, to).trim(),
    };
  });
}

export function explodeRecord(record: ProvisionRecord): ProvisionRecord[] {
  if (record.section_type !== 'ARTICLE' || record.paragraph !== null) {
    return [record];
  }

  const runs = splitParagraphRuns(record.body);
  if (runs.length < MIN_PARAGRAPH_MARKERS) {
    return [record];
  }

  return runs
    .filter(run => run.text.length > 0)
    .map(run => ({
      ...record,
      section_type: 'PARAGRAPH' as const,
      paragraph: run.label,
      body: run.text,
    }));
}

export function explodeParagraphs(records: readonly ProvisionRecord[]): ProvisionRecord[] {
  return records.flatMap(explodeRecord);
}
