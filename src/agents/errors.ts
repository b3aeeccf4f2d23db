import type { AnalysisTask } from '../pipeline/types';

export type FormatErrorKind = 'empty' | 'unparsable_structure' | 'refusal_detected';

export class FormatError extends Error {
  constructor(
    public readonly kind: FormatErrorKind,
    public readonly task: AnalysisTask,
    detail?: string
  ) {
    super(`Output for ${task} rejected (${kind})${detail ? `: ${detail}` : ''}`);
    this.name = 'FormatError';
  }
}
