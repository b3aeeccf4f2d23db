import type { AnalysisTask, TaskOutputs } from '../pipeline/types';
import { FormatError } from './errors';

export type FormatResult<T> = { success: true; data: T } | { success: false; error: FormatError };

const REFUSAL_PATTERNS: RegExp[] = [
  /^i['’]?m sorry\b/i,
  /^i am sorry\b/i,
  /^sorry,? (but )?i (can(no|')t|am unable|won['’]?t)/i,
  /^i (cannot|can['’]t|am unable to|won['’]?t) (help|assist|provide|comply|answer|do that)/i,
  /^as an ai\b/i,
  /^i['’]?m (not able|unable) to\b/i,
];

// "1. text", "2) text", "- text", "* text", "• text"
const LIST_ITEM = /^\s*(?:\d{1,2}[.)]|[-*•])\s+(.*)$/;

export function isRefusal(text: string): boolean {
  const head = text.trim().slice(0, 200);
  return REFUSAL_PATTERNS.some((pattern) => pattern.test(head));
}

function stripEmphasis(text: string): string {
  return text.replace(/^\*\*(.+?)\*\*:?/, '$1:').replace(/\*\*/g, '').replace(/:$/, '').trim();
}

/**
 * Splits list-shaped LLM output into items. Lines before the first marker are treated
 * as preamble; unmarked lines after an item continue that item.
 */
export function splitListItems(text: string): string[] {
  const items: string[] = [];
  let current: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    const match = LIST_ITEM.exec(line);
    if (match) {
      if (current) items.push(current);
      current = stripEmphasis(match[1] ?? '');
    } else if (!trimmed) {
      if (current) items.push(current);
      current = null;
    } else if (current !== null) {
      current = `${current} ${trimmed}`;
    }
  }
  if (current) items.push(current);

  return items.filter((item) => item.length > 0);
}

function validateText(task: AnalysisTask, rawText: string): FormatResult<string> {
  const text = rawText.trim();
  if (!text) {
    return { success: false, error: new FormatError('empty', task) };
  }
  if (isRefusal(text)) {
    return { success: false, error: new FormatError('refusal_detected', task, text.slice(0, 80)) };
  }
  return { success: true, data: text };
}

function formatGaps(rawText: string): FormatResult<string[]> {
  const validated = validateText('gap_analysis', rawText);
  if (!validated.success) return validated;

  const gaps = splitListItems(validated.data);
  if (gaps.length === 0) {
    return {
      success: false,
      error: new FormatError('unparsable_structure', 'gap_analysis', 'no list items found'),
    };
  }
  return { success: true, data: gaps };
}

const FORMATTERS: { [K in AnalysisTask]: (rawText: string) => FormatResult<TaskOutputs[K]> } = {
  summary: (rawText) => validateText('summary', rawText),
  gap_analysis: formatGaps,
  explanation: (rawText) => validateText('explanation', rawText),
};

/** Validates raw LLM text for `task` and shapes it into that task's output field. */
export function formatTaskOutput<K extends AnalysisTask>(
  task: K,
  rawText: string
): FormatResult<TaskOutputs[K]> {
  return FORMATTERS[task](rawText);
}
