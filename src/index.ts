export { dropExplanatory, isExplanatory } from './corpus/explanatory.js';
export { MarkerIndex } from './corpus/marker-index.js';
export { normalizeText, PARAGRAPH_MARKER } from './corpus/normalizer.js';
export {
  explodeParagraphs,
  explodeRecord,
  splitParagraphRuns,
  MIN_PARAGRAPH_MARKERS,
  type ParagraphRun,
} from './corpus/paragraphs.js';
export {
  buildCorpusRecords,
  runCorpusPipeline,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStats,
} from './corpus/pipeline.js';
export { buildArticleRecord } from './corpus/records.js';
export { detectArticleBlocks, detectStructure, stripArticleHeader, type DocumentStructure } from './corpus/structure.js';
export { tokenizeStructure, type StructureToken, type StructureTokenKind } from './corpus/tokenizer.js';
export type {
  ArticleBlock,
  DocumentMetadata,
  HierarchyMarker,
  HierarchyType,
  ProvisionRecord,
  SectionType,
} from './corpus/types.js';
export {
  ENGLISH_VOCABULARY,
  INDONESIAN_VOCABULARY,
  getVocabulary,
  type StatuteVocabulary,
  type VocabularyId,
} from './corpus/vocabulary.js';
