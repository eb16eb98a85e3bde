/**
 * Shared types for statute corpus construction.
 */

export type HierarchyType = 'BOOK' | 'CHAPTER' | 'PART';

export type SectionType = 'ARTICLE' | 'PARAGRAPH';

export interface HierarchyMarker {
  type: HierarchyType;
  label: string;
  title: string;
  offset: number;
}

export interface ArticleBlock {
  label: string;
  start: number;
  end: number;
  /** Raw source span, header line included. */
  text: string;
  /** The span with its header line removed. */
  body: string;
  book: HierarchyMarker | null;
  chapter: HierarchyMarker | null;
  part: HierarchyMarker | null;
}

export interface DocumentMetadata {
  code: string;
  name?: string | null;
  official_number?: string | null;
  year?: number | null;
  valid_from?: string | null;
  valid_to?: string | null;
  source?: string | null;
}

export interface ProvisionRecord {
  code: string;
  name: string | null;
  official_number: string | null;
  year: number | null;
  section_type: SectionType;
  title: string;
  article: string;
  paragraph: string | null;
  book: string | null;
  chapter: string | null;
  part: string | null;
  valid_from: string | null;
  valid_to: string | null;
  source: string | null;
  body: string;
}
