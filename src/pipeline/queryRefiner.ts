import type { RefinedQuery } from './types';
import { createConsoleLogger, type Logger } from '../utils/logger';

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'is', 'are', 'was', 'were', 'be', 'been',
  'what', 'how', 'where', 'when', 'why', 'which',
]);

const ACADEMIC_KEYWORDS = ['research', 'study', 'paper', 'analysis', 'survey'];

// anything that is not a letter, mark, digit, underscore, whitespace or hyphen
const NON_WORD = /[^\p{L}\p{M}\p{N}_\s-]/gu;

export interface QueryRefinerLike {
  refine(rawQuery: string): RefinedQuery;
}

/**
 * Local heuristics that turn a conversational query into a search string.
 * Refinement is best effort: `refine` never throws.
 */
export class QueryRefiner implements QueryRefinerLike {
  constructor(private logger: Logger = createConsoleLogger('QueryRefiner')) {}

  refine(rawQuery: string): RefinedQuery {
    try {
      const text = this.rewrite(rawQuery);
      if (!text) {
        return { text: rawQuery, was_refined: false };
      }
      return { text, was_refined: text !== rawQuery };
    } catch (error) {
      this.logger.warn('Query refinement failed, using raw query', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { text: rawQuery, was_refined: false };
    }
  }

  extractKeyTerms(query: string): string[] {
    const words = query
      .toLowerCase()
      .replace(NON_WORD, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 3 && !STOP_WORDS.has(w));
    return Array.from(new Set(words));
  }

  protected rewrite(query: string): string {
    let refined = query.toLowerCase().trim();
    refined = refined.replace(/\s+/g, ' ');
    refined = refined.replace(NON_WORD, ' ');

    let words = refined.split(' ').filter(Boolean);
    // short queries keep every word; they rarely carry filler
    if (words.length > 5) {
      words = words.filter((w) => !STOP_WORDS.has(w) || w.length > 3);
    }
    refined = words.join(' ');

    return this.addAcademicContext(refined);
  }

  private addAcademicContext(query: string): string {
    if (!query) return query;
    const hasKeyword = ACADEMIC_KEYWORDS.some((keyword) => query.includes(keyword));
    if (!hasKeyword && query.split(' ').length < 8) {
      return `${query} research`;
    }
    return query;
  }
}
