import * as fs from 'fs';
import { z } from 'zod';
import {
  ANALYSIS_TASKS,
  EDUCATION_LEVELS,
  type AnalysisTask,
  type EducationLevel,
  type PaperRecord,
  type PromptPayload,
  type UserProfile,
} from '../pipeline/types';
import { AUDIENCES, LEVEL_GUIDANCE, TASK_PROMPTS } from './prompts';

export type TemplateKey = `${AnalysisTask}:${EducationLevel}`;
export type PromptTemplateTable = ReadonlyMap<TemplateKey, string>;

export const CHARS_PER_TOKEN = 4;
const PAPER_SEPARATOR = '\n\n';
const MIN_ABSTRACT_CHARS = 40;
const NO_ABSTRACT = '(abstract not available)';
const METADATA_FIELDS: Array<[key: string, label: string]> = [
  ['authors', 'Authors'],
  ['year', 'Year'],
  ['venue', 'Venue'],
];

export function templateKey(task: AnalysisTask, level: EducationLevel): TemplateKey {
  return `${task}:${level}`;
}

const TEMPLATE_KEYS: ReadonlySet<string> = new Set(
  ANALYSIS_TASKS.flatMap((task) => EDUCATION_LEVELS.map((level) => templateKey(task, level)))
);

function isTemplateKey(key: string): key is TemplateKey {
  return TEMPLATE_KEYS.has(key);
}

export function fillPlaceholders(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => values[name] ?? match);
}

export function defaultTemplateTable(): PromptTemplateTable {
  const table = new Map<TemplateKey, string>();
  for (const task of ANALYSIS_TASKS) {
    for (const level of EDUCATION_LEVELS) {
      table.set(
        templateKey(task, level),
        fillPlaceholders(TASK_PROMPTS[task], { level_guidance: LEVEL_GUIDANCE[level] })
      );
    }
  }
  return table;
}

const TemplateOverridesSchema = z
  .record(z.string(), z.string().min(1))
  .superRefine((record, ctx) => {
    for (const [key, template] of Object.entries(record)) {
      if (!isTemplateKey(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'unknown template key' });
      } else if (!template.includes('{{papers}}')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'template must contain {{papers}}' });
      }
    }
  });

/**
 * Built-in templates, overridden entry by entry from a JSON file of
 * `{ "summary:Beginner": "..." }` when a path is configured. Read once at startup.
 */
export function loadTemplateTable(overridesPath?: string): PromptTemplateTable {
  const table = new Map(defaultTemplateTable());
  if (!overridesPath) return table;

  const raw: unknown = JSON.parse(fs.readFileSync(overridesPath, 'utf8'));
  const parsed = TemplateOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid prompt templates in ${overridesPath}:\n${issues.join('\n')}`);
  }
  for (const [key, template] of Object.entries(parsed.data)) {
    if (isTemplateKey(key)) table.set(key, template);
  }
  return table;
}

export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  let cut = text.slice(0, Math.max(0, maxChars - 1));
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > maxChars / 2) {
    cut = cut.slice(0, lastSpace);
  }
  return `${cut.trimEnd()}…`;
}

function renderHeader(index: number, paper: PaperRecord): string {
  const lines = [`Paper ${index + 1}: ${paper.title}`];
  for (const [key, label] of METADATA_FIELDS) {
    const value = paper.metadata[key];
    if (value) lines.push(`${label}: ${value}`);
  }
  lines.push('Abstract: ');
  return lines.join('\n');
}

export interface RenderedPapers {
  text: string;
  included: number;
  omitted: number;
}

/**
 * Renders papers in the given order into at most `charBudget` characters, followed by a
 * note on omitted papers. Abstracts that do not fit are cut; once not even a header fits,
 * the remaining papers are left out.
 */
export function renderPapers(papers: readonly PaperRecord[], charBudget: number): RenderedPapers {
  const blocks: string[] = [];
  let remaining = charBudget;

  for (const [i, paper] of papers.entries()) {
    const separator = blocks.length > 0 ? PAPER_SEPARATOR.length : 0;
    const header = renderHeader(i, paper);
    const abstract = paper.abstract.trim() || NO_ABSTRACT;
    const room = remaining - separator - header.length;

    if (room < MIN_ABSTRACT_CHARS) {
      if (blocks.length > 0) break;
      // the first paper is always sent: title and abstract only, cut to the budget
      blocks.push(truncateAtWord(`Paper ${i + 1}: ${paper.title}\nAbstract: ${abstract}`, charBudget));
      remaining = 0;
      continue;
    }

    const body = truncateAtWord(abstract, room);
    blocks.push(header + body);
    remaining -= separator + header.length + body.length;
  }

  const omitted = papers.length - blocks.length;
  let text = blocks.join(PAPER_SEPARATOR);
  if (omitted > 0) {
    text += `${PAPER_SEPARATOR}(${omitted} more paper${omitted === 1 ? '' : 's'} omitted to fit the prompt budget.)`;
  }
  return { text, included: blocks.length, omitted };
}

export interface PromptBuilderOptions {
  tokenBudget: number;
}

export class PromptBuilder {
  constructor(
    private options: PromptBuilderOptions,
    private templates: PromptTemplateTable = defaultTemplateTable()
  ) {}

  build(
    task: AnalysisTask,
    papers: readonly PaperRecord[],
    profile: UserProfile,
    query?: string
  ): string {
    const template = this.templates.get(templateKey(task, profile.education_level));
    if (!template) {
      throw new Error(`No prompt template for ${templateKey(task, profile.education_level)}`);
    }

    const rendered = renderPapers(papers, this.options.tokenBudget * CHARS_PER_TOKEN);
    const interests = profile.domain_interests ?? [];

    return fillPlaceholders(template, {
      query: query?.trim() || 'Not specified',
      papers: rendered.text,
      paper_count: String(rendered.included),
      education_level: profile.education_level,
      audience: AUDIENCES[profile.education_level],
      interests: interests.length > 0 ? interests.join(', ') : 'Not specified',
      level_guidance: LEVEL_GUIDANCE[profile.education_level],
    });
  }

  buildPayload(
    task: AnalysisTask,
    papers: readonly PaperRecord[],
    profile: UserProfile,
    query?: string
  ): PromptPayload {
    return { task, rendered_text: this.build(task, papers, profile, query) };
  }
}
