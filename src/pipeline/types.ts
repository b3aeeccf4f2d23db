export const ANALYSIS_TASKS = ['summary', 'gap_analysis', 'explanation'] as const;

export type AnalysisTask = (typeof ANALYSIS_TASKS)[number];

export const EDUCATION_LEVELS = ['Beginner', 'Intermediate', 'Advanced'] as const;

export type EducationLevel = (typeof EDUCATION_LEVELS)[number];

export interface UserProfile {
  education_level: EducationLevel;
  domain_interests?: readonly string[];
}

export interface AnalysisRequest {
  raw_query: string;
  user_profile: UserProfile;
  tasks?: readonly AnalysisTask[];
  deadline_ms?: number;
}

export interface RefinedQuery {
  text: string;
  was_refined: boolean;
}

export interface PaperRecord {
  id: string;
  title: string;
  abstract: string;
  metadata: Record<string, string>;
}

export interface PromptPayload {
  task: AnalysisTask;
  rendered_text: string;
}

export interface LLMResponse {
  task: AnalysisTask;
  raw_text: string;
  latency_ms: number;
}

/** What each task contributes to the structured output once formatted. */
export interface TaskOutputs {
  summary: string;
  gap_analysis: string[];
  explanation: string;
}

export interface StructuredOutput {
  status: 'complete' | 'partial';
  summary: string | null;
  research_gaps: string[] | null;
  explanation: string | null;
  warnings: string[];
  education_level: EducationLevel;
  query: {
    original: string;
    refined: string;
    was_refined: boolean;
  };
  paper_count: number;
  metadata: {
    request_id: string;
    processed_at: string;
    version: string;
  };
}
