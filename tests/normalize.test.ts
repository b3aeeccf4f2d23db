import { describe, it, expect } from '@jest/globals';
import { normalizeScraperResponse } from '../src/ingest/scraper/normalize';

describe('normalizeScraperResponse', () => {
  it('maps scraper records onto paper records', () => {
    const result = normalizeScraperResponse(
      {
        papers: [
          {
            paper_id: 'abc',
            title: ' Attention Is Enough ',
            abstract: null,
            authors: ['A. Author', ' B. Author '],
            year: 2021,
            venue: 'NeurIPS',
            url: 'https://papers.example/abc',
            metadata: { citations: 12, note: '', nested: { a: 1 } },
          },
        ],
      },
      10
    );

    expect(result).toEqual({
      success: true,
      dropped: 0,
      papers: [
        {
          id: 'abc',
          title: 'Attention Is Enough',
          abstract: '',
          metadata: {
            citations: '12',
            authors: 'A. Author, B. Author',
            year: '2021',
            venue: 'NeurIPS',
            url: 'https://papers.example/abc',
          },
        },
      ],
    });
  });

  it('accepts a bare array and derives missing ids', () => {
    const result = normalizeScraperResponse(
      [{ title: 'One' }, { title: 'Two', url: 'https://papers.example/two' }],
      10
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.papers.map((p) => p.id)).toEqual(['paper-1', 'https://papers.example/two']);
  });

  it('does not let a derived id collide with an explicit one', () => {
    const result = normalizeScraperResponse(
      { papers: [{ title: 'A' }, { id: 'paper-1', title: 'B' }, { id: 'paper-1-2', title: 'C' }] },
      10
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.dropped).toBe(0);
    expect(result.papers.map((p) => [p.id, p.title])).toEqual([
      ['paper-1-3', 'A'],
      ['paper-1', 'B'],
      ['paper-1-2', 'C'],
    ]);
  });

  it('drops records without a title and repeated ids', () => {
    const result = normalizeScraperResponse(
      [{ abstract: 'orphan' }, { id: 'a', title: 'A' }, { id: 'a', title: 'A again' }, { id: 7, title: 'Seven' }],
      10
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.dropped).toBe(2);
    expect(result.papers.map((p) => [p.id, p.title])).toEqual([
      ['a', 'A'],
      ['7', 'Seven'],
    ]);
  });

  it('keeps order and stops at the cap', () => {
    const result = normalizeScraperResponse([{ title: 'One' }, { title: 'Two' }, { title: 'Three' }], 2);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.papers.map((p) => p.title)).toEqual(['One', 'Two']);
  });

  it('rejects an unexpected envelope', () => {
    expect(normalizeScraperResponse({ results: [] }, 10)).toEqual({
      success: false,
      error: 'expected a paper list or an object with a "papers" array',
    });
  });
});
