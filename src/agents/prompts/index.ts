import type { AnalysisTask, EducationLevel } from '../../pipeline/types';
import { SUMMARY_PROMPT } from './summary';
import { GAP_ANALYSIS_PROMPT } from './gapAnalysis';
import { EXPLANATION_PROMPT } from './explanation';

export { SUMMARY_PROMPT, GAP_ANALYSIS_PROMPT, EXPLANATION_PROMPT };

export const TASK_PROMPTS: Record<AnalysisTask, string> = {
  summary: SUMMARY_PROMPT,
  gap_analysis: GAP_ANALYSIS_PROMPT,
  explanation: EXPLANATION_PROMPT,
};

export const AUDIENCES: Record<EducationLevel, string> = {
  Beginner: 'a beginner with no specialized background in the field',
  Intermediate: 'an undergraduate-level reader with foundational knowledge',
  Advanced: 'a graduate-level researcher with expert knowledge',
};

export const LEVEL_GUIDANCE: Record<EducationLevel, string> = {
  Beginner:
    'Use plain language and short sentences. Avoid jargon; when a technical term is unavoidable, define it in everyday words.',
  Intermediate:
    'Use standard academic vocabulary, defining specialized terms on first use. Balance depth with readability.',
  Advanced:
    'Use precise technical language without simplification. Discuss methodological detail, assumptions and limitations.',
};
