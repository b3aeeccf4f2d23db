import { describe, it, expect } from '@jest/globals';
import { QueryRefiner } from '../src/pipeline/queryRefiner';
import { silentLogger } from '../src/utils/logger';

describe('QueryRefiner', () => {
  const refiner = new QueryRefiner(silentLogger);

  it('adds academic context to short topical queries', () => {
    expect(refiner.refine('Graph neural networks')).toEqual({
      text: 'graph neural networks research',
      was_refined: true,
    });
  });

  it('drops short stop words and punctuation from long questions', () => {
    expect(refiner.refine('  What is the effect of Transformers on protein folding?  ')).toEqual({
      text: 'what effect of transformers on protein folding research',
      was_refined: true,
    });
  });

  it('keeps queries that already mention an academic keyword', () => {
    expect(refiner.refine('A survey of LLM agents').text).toBe('a survey of llm agents');
    expect(refiner.refine('papers on X').text).toBe('papers on x');
  });

  it('keeps accented letters and non-Latin scripts intact', () => {
    expect(refiner.refine('Réseaux de neurones en imagerie médicale')).toEqual({
      text: 'réseaux de neurones en imagerie médicale research',
      was_refined: true,
    });
    expect(refiner.refine('Künstliche Intelligenz').text).toBe('künstliche intelligenz research');
    expect(refiner.refine('機械学習').text).toBe('機械学習 research');
  });

  it('reports an already refined query as unchanged', () => {
    expect(refiner.refine('graph neural networks research')).toEqual({
      text: 'graph neural networks research',
      was_refined: false,
    });
  });

  it('returns the raw query when nothing is left after cleanup', () => {
    expect(refiner.refine('!!!')).toEqual({ text: '!!!', was_refined: false });
  });

  it('never throws', () => {
    class BrokenRefiner extends QueryRefiner {
      protected rewrite(_query: string): string {
        throw new Error('rewrite failed');
      }
    }
    const broken = new BrokenRefiner(silentLogger);

    expect(broken.refine('papers on X')).toEqual({ text: 'papers on X', was_refined: false });
  });

  describe('extractKeyTerms', () => {
    it('keeps distinct words longer than three characters', () => {
      expect(refiner.extractKeyTerms('Graph neural networks for drug discovery')).toEqual([
        'graph',
        'neural',
        'networks',
        'drug',
        'discovery',
      ]);
    });

    it('removes duplicates and stop words', () => {
      expect(refiner.extractKeyTerms('Where were these models, these models?')).toEqual(['these', 'models']);
    });

    it('keeps accented words whole', () => {
      expect(refiner.extractKeyTerms('Réseaux de neurones en imagerie médicale')).toEqual([
        'réseaux',
        'neurones',
        'imagerie',
        'médicale',
      ]);
    });
  });
});
