import { z } from 'zod';
import { ANALYSIS_TASKS, type EducationLevel } from './types';

const LEVEL_ALIASES: Record<string, EducationLevel> = {
  beginner: 'Beginner',
  intermediate: 'Intermediate',
  advanced: 'Advanced',
  high_school: 'Beginner',
  general: 'Beginner',
  undergraduate: 'Intermediate',
  graduate: 'Advanced',
  phd: 'Advanced',
};

export const EducationLevelSchema = z
  .string()
  .transform((value, ctx): EducationLevel => {
    const level = LEVEL_ALIASES[value.trim().toLowerCase().replace(/[\s-]+/g, '_')];
    if (!level) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown education level "${value}" (expected Beginner, Intermediate or Advanced)`,
      });
      return z.NEVER;
    }
    return level;
  });

function uniqueInOrder<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

export const AnalysisRequestSchema = z.object({
  raw_query: z.string().trim().min(1, 'raw_query must not be empty').max(1000),
  user_profile: z.object({
    education_level: EducationLevelSchema,
    domain_interests: z
      .array(z.string().trim().min(1))
      .optional()
      .transform((interests) => (interests ? uniqueInOrder(interests) : undefined)),
  }),
  tasks: z
    .array(z.enum(ANALYSIS_TASKS))
    .min(1, 'tasks must name at least one task when provided')
    .optional()
    .transform((tasks) => (tasks ? uniqueInOrder(tasks) : undefined)),
  deadline_ms: z.number().int().positive().optional(),
});

export type AnalysisRequestInput = z.input<typeof AnalysisRequestSchema>;

export const RefineQueryBodySchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty').max(1000),
});

export function formatValidationErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
