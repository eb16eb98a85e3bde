import { describe, it, expect } from 'vitest';
import { explodeParagraphs, explodeRecord, splitParagraphRuns } from '../../src/corpus/paragraphs.js';
import type { ProvisionRecord } from '../../src/corpus/types.js';

function articleRecord(body: string, article = '1'): ProvisionRecord {
  return {
    code: 'X',
    name: null,
    official_number: null,
    year: null,
    section_type: 'ARTICLE',
    title: `Article ${article}`,
    article,
    paragraph: null,
    book: null,
    chapter: 'I',
    part: null,
    valid_from: null,
    valid_to: null,
    source: 'x.pdf',
    body,
  };
}

describe('splitParagraphRuns', () => {
  it('should pair each marker with the text up to the next marker', () => {
    expect(splitParagraphRuns('Intro (1) a (2) b')).toEqual([
      { label: '1', text: 'a' },
      { label: '2', text: 'b' },
    ]);
  });

  it('should return nothing for text without markers', () => {
    expect(splitParagraphRuns('No markers here.')).toEqual([]);
  });
});

describe('explodeRecord', () => {
  it('should replace an article with one record per numbered paragraph', () => {
    const records = explodeRecord(articleRecord('(1) foo (2) bar'));

    expect(records).toHaveLength(2);
    expect(records.map(record => [record.section_type, record.paragraph, record.body])).toEqual([
      ['PARAGRAPH', '1', 'foo'],
      ['PARAGRAPH', '2', 'bar'],
    ]);
    expect(records.every(record => record.article === '1' && record.chapter === 'I')).toBe(true);
    expect(records.every(record => record.title === 'Article 1' && record.source === 'x.pdf')).toBe(true);
  });

  it('should leave an article without markers unchanged', () => {
    const record = articleRecord('The board meets monthly.');

    const result = explodeRecord(record);

    expect(result).toEqual([record]);
    expect(result[0].paragraph).toBeNull();
    expect(result[0].section_type).toBe('ARTICLE');
  });

  it('should leave an article with a single marker unchanged', () => {
    const record = articleRecord('(1) Only one paragraph.');
    expect(explodeRecord(record)).toEqual([record]);
  });

  it('should discard text before the first marker', () => {
    const records = explodeRecord(articleRecord('The following applies:\n(1) first\n(2) second'));
    expect(records.map(record => record.body)).toEqual(['first', 'second']);
  });

  it('should drop paragraphs whose text is empty', () => {
    const records = explodeRecord(articleRecord('(1) (2) text'));
    expect(records.map(record => [record.paragraph, record.body])).toEqual([['2', 'text']]);
  });

  it('should use the literal marker digits without renumbering', () => {
    const records = explodeRecord(articleRecord('(3) c (3) d (10) e'));
    expect(records.map(record => record.paragraph)).toEqual(['3', '3', '10']);
  });

  it('should accept markers with inner whitespace', () => {
    const records = explodeRecord(articleRecord('( 4 ) x ( 5 ) y'));
    expect(records.map(record => [record.paragraph, record.body])).toEqual([
      ['4', 'x'],
      ['5', 'y'],
    ]);
  });

  it('should treat bare parenthesised numbers in running text as markers', () => {
    const records = explodeRecord(articleRecord('Fines under Act (2019) apply (7) times.'));
    expect(records.map(record => [record.paragraph, record.body])).toEqual([
      ['2019', 'apply'],
      ['7', 'times.'],
    ]);
  });

  it('should pass paragraph records and labelled articles through', () => {
    const paragraph: ProvisionRecord = { ...articleRecord('(1) a (2) b'), section_type: 'PARAGRAPH', paragraph: '1' };
    const labelled: ProvisionRecord = { ...articleRecord('(1) a (2) b'), paragraph: '3' };

    expect(explodeRecord(paragraph)).toEqual([paragraph]);
    expect(explodeRecord(labelled)).toEqual([labelled]);
  });
});

describe('explodeParagraphs', () => {
  it('should keep source order across records', () => {
    const records = explodeParagraphs([
      articleRecord('(1) a (2) b', '1'),
      articleRecord('plain', '2'),
      articleRecord('(1) c (2) d', '3'),
    ]);

    expect(records.map(record => `${record.article}:${record.paragraph ?? '-'}:${record.body}`)).toEqual([
      '1:1:a',
      '1:2:b',
      '2:-:plain',
      '3:1:c',
      '3:2:d',
    ]);
  });
});
