import { describe, it, expect } from 'vitest';
import { detectArticleBlocks, detectStructure, stripArticleHeader } from '../../src/corpus/structure.js';
import { INDONESIAN_VOCABULARY } from '../../src/corpus/vocabulary.js';

const TEXT = [
  'Preamble text',
  'CHAPTER I GENERAL',
  'Article 1',
  'First body.',
  'Article 2',
  'Second body.',
  'CHAPTER II OTHER',
  'PART 1',
  'Article 3',
  'Third.',
].join('\n');

describe('detectArticleBlocks', () => {
  it('should split the text into one block per article header', () => {
    const blocks = detectArticleBlocks(TEXT);

    expect(blocks.map(block => block.label)).toEqual(['1', '2', '3']);
    expect(blocks.map(block => block.body)).toEqual([
      'First body.\n',
      'Second body.\nCHAPTER II OTHER\nPART 1\n',
      'Third.',
    ]);
  });

  it('should cover the text contiguously from the first header to the end', () => {
    const blocks = detectArticleBlocks(TEXT);

    expect(blocks[0].start).toBe(TEXT.indexOf('Article 1'));
    for (let i = 0; i + 1 < blocks.length; i++) {
      expect(blocks[i].end).toBe(blocks[i + 1].start);
      expect(blocks[i].start).toBeLessThan(blocks[i + 1].start);
    }
    expect(blocks[blocks.length - 1].end).toBe(TEXT.length);
    expect(blocks.map(block => block.text).join('')).toBe(TEXT.slice(blocks[0].start));
  });

  it('should assign the nearest preceding chapter and part', () => {
    const blocks = detectArticleBlocks(TEXT);

    expect(blocks.map(block => block.chapter?.label ?? null)).toEqual(['I', 'I', 'II']);
    expect(blocks.map(block => block.part?.label ?? null)).toEqual([null, null, '1']);
    expect(blocks.map(block => block.book)).toEqual([null, null, null]);
    expect(blocks[2].chapter?.title).toBe('OTHER');
  });

  it('should return no blocks when there are no article headers', () => {
    expect(detectArticleBlocks('CHAPTER I\nJust some text mentioning Article 3 in passing.')).toEqual([]);
    expect(detectArticleBlocks('')).toEqual([]);
  });

  it('should keep partition invariants on irregular input', () => {
    const samples = [
      'Article 1',
      'Article 1\nArticle 2\nArticle 3',
      '\n\n  Article 7  \nbody\nBOOK II\n\nArticle 8\n',
      'junk\nArticle IX\nsee Article 10\nArticle 10\n(1) a\n(2) b',
    ];

    for (const sample of samples) {
      const blocks = detectArticleBlocks(sample);
      expect(blocks.length).toBeGreaterThan(0);
      expect(blocks[blocks.length - 1].end).toBe(sample.length);
      for (let i = 0; i + 1 < blocks.length; i++) {
        expect(blocks[i].end).toBe(blocks[i + 1].start);
      }
      expect(blocks.map(block => block.text).join('')).toBe(sample.slice(blocks[0].start));
    }
  });

  it('should strip headers ended by a bare carriage return', () => {
    const blocks = detectArticleBlocks('Article 1\rBody one.\rArticle 2\rBody two.');

    expect(blocks.map(block => block.label)).toEqual(['1', '2']);
    expect(blocks.map(block => block.body)).toEqual(['Body one.\r', 'Body two.']);
  });

  it('should detect Indonesian headers with the Indonesian vocabulary', () => {
    const text = 'BUKU I\nBAB II\nBagian 3\nPasal 10\nIsi pasal.\nPasal 10A\nIsi lain.';

    const structure = detectStructure(text, INDONESIAN_VOCABULARY);

    expect(structure.books.size).toBe(1);
    expect(structure.chapters.size).toBe(1);
    expect(structure.parts.size).toBe(1);
    expect(structure.blocks.map(block => [block.label, block.book?.label, block.chapter?.label, block.part?.label])).toEqual([
      ['10', 'I', 'II', '3'],
      ['10A', 'I', 'II', '3'],
    ]);
    expect(structure.blocks[0].body).toBe('Isi pasal.\n');
  });
});

describe('stripArticleHeader', () => {
  it('should remove the header line', () => {
    expect(stripArticleHeader('Article 7\nBody text', '7')).toBe('Body text');
    expect(stripArticleHeader('  Article 7  \nBody text', '7')).toBe('Body text');
  });

  it('should remove a header ended by any line break', () => {
    expect(stripArticleHeader('Article 7\rBody', '7')).toBe('Body');
    expect(stripArticleHeader('Article 7\r\nBody', '7')).toBe('Body');
    expect(stripArticleHeader('Article 7 \t\r\nBody', '7')).toBe('Body');
  });

  it('should remove the header only once', () => {
    expect(stripArticleHeader('Article 7\nArticle 7\nBody', '7')).toBe('Article 7\nBody');
  });

  it('should only remove a header with the exact label', () => {
    expect(stripArticleHeader('Article 7\nBody', '8')).toBe('Article 7\nBody');
  });

  it('should leave an empty body for a bare header', () => {
    expect(stripArticleHeader('Article 7', '7')).toBe('');
  });
});
