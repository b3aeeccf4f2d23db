import { describe, it, expect } from '@jest/globals';
import { formatTaskOutput, isRefusal, splitListItems } from '../src/agents/resultFormatter';
import { FormatError } from '../src/agents/errors';

describe('splitListItems', () => {
  it('splits a numbered list', () => {
    expect(splitListItems('1. Gap A\n2. Gap B')).toEqual(['Gap A', 'Gap B']);
  });

  it('accepts bullets and parenthesised numbers', () => {
    expect(splitListItems('- First\n* Second\n• Third\n4) Fourth')).toEqual([
      'First',
      'Second',
      'Third',
      'Fourth',
    ]);
  });

  it('ignores a preamble and joins continuation lines', () => {
    const text = 'Here are the gaps:\n1. Limited datasets\n   across domains\n2. No long-term studies';
    expect(splitListItems(text)).toEqual(['Limited datasets across domains', 'No long-term studies']);
  });

  it('strips bold headings', () => {
    expect(splitListItems('1. **Data scarcity**: few labelled sets')).toEqual([
      'Data scarcity: few labelled sets',
    ]);
  });

  it('ends an item at a blank line', () => {
    expect(splitListItems('1. Gap A\n\nClosing remarks.')).toEqual(['Gap A']);
  });
});

describe('isRefusal', () => {
  it('detects common refusals', () => {
    expect(isRefusal("I'm sorry, but I can't help with that.")).toBe(true);
    expect(isRefusal('As an AI language model, I cannot do that.')).toBe(true);
    expect(isRefusal('I cannot provide medical advice.')).toBe(true);
  });

  it('accepts ordinary answers', () => {
    expect(isRefusal('These papers cannot agree on a benchmark.')).toBe(false);
  });
});

describe('formatTaskOutput', () => {
  it('trims summary text', () => {
    expect(formatTaskOutput('summary', '  A concise summary.\n')).toEqual({
      success: true,
      data: 'A concise summary.',
    });
  });

  it('rejects empty output', () => {
    const result = formatTaskOutput('explanation', '   ');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(FormatError);
    expect(result.error.kind).toBe('empty');
    expect(result.error.task).toBe('explanation');
  });

  it('rejects refusals', () => {
    const result = formatTaskOutput('summary', "I'm sorry, I can't help with that.");
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('refusal_detected');
  });

  it('returns gaps as a list', () => {
    expect(formatTaskOutput('gap_analysis', '1. Gap A\n2. Gap B')).toEqual({
      success: true,
      data: ['Gap A', 'Gap B'],
    });
  });

  it('rejects gap analysis without list items', () => {
    const result = formatTaskOutput('gap_analysis', 'The literature is complete.');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('unparsable_structure');
    expect(result.error.message).toBe('Output for gap_analysis rejected (unparsable_structure): no list items found');
  });
});
