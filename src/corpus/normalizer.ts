/**
 * Text cleanup for extracted statute text.
 *
 * Keeps layout separators and numbered-paragraph markers such as "(1)" or
 * "( 2 )" exactly as they appear: whitespace rules run only on the text
 * between markers.
 */

/** Numbered-paragraph marker: "(", optional spaces, digits, optional spaces, ")". */
export const PARAGRAPH_MARKER = /\(\s*(\d+)\s*\)/g;

const MARKER_SPLIT = /(\(\s*\d+\s*\))/;

function cleanSegment(segment: string): string {
  return segment
    .replace(/-[^\S\n]*\n\s*/g, '') // line-wrap hyphenation
    .replace(/\s*\.\s*\.\s*\.\s*/g, '…')
    .replace(/[^\S\n]+(?=\n)/g, '') // trailing whitespace per line
    .replace(/\n{4,}/g, '\n\n')
    .replace(/[^\S\n]{2,}/g, ' ');
}

export function normalizeText(text: string): string {
  const composed = text.replace(/\0/g, '').normalize('NFC');

  // split() with a capture group puts markers at odd indexes.
  // Joins can bring a combining mark next to its base, so compose again.
  return composed
    .split(MARKER_SPLIT)
    .map((segment, index) => (index % 2 === 1 ? segment : cleanSegment(segment)))
    .join('')
    .normalize('NFC')
    .trim();
}
