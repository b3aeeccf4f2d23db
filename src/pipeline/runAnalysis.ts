import { v4 as uuidv4 } from 'uuid';
import type { Settings } from '../config/settings';
import type { TextGenerator } from '../agents/llmClient';
import type { PromptBuilder } from '../agents/promptBuilder';
import { formatTaskOutput } from '../agents/resultFormatter';
import type { PaperSource } from '../ingest/scraper/client';
import { createConsoleLogger, withContext, type Logger } from '../utils/logger';
import { AbortedError, linkedController, raceWithSignal } from '../utils/timeout';
import { TransportError } from '../utils/transport';
import { PipelineError } from './errors';
import type { QueryRefinerLike } from './queryRefiner';
import {
  ANALYSIS_TASKS,
  type AnalysisRequest,
  type AnalysisTask,
  type LLMResponse,
  type PaperRecord,
  type RefinedQuery,
  type StructuredOutput,
  type TaskOutputs,
} from './types';

export const OUTPUT_VERSION = '1.0.0';

export type AnalysisResult =
  | { success: true; output: StructuredOutput }
  | { success: false; error: PipelineError };

export interface AnalyzeOptions {
  /** Caller cancellation, e.g. the HTTP client went away. */
  signal?: AbortSignal;
  requestId?: string;
}

export interface AnalysisOrchestratorDeps {
  config: Settings['pipeline'];
  scraper: PaperSource;
  llm: TextGenerator;
  promptBuilder: PromptBuilder;
  refiner?: QueryRefinerLike;
  logger?: Logger;
}

type TaskOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'failed'; reason: string }
  | { status: 'skipped' };

interface TaskContext {
  request: AnalysisRequest;
  papers: readonly PaperRecord[];
  requested: ReadonlySet<AnalysisTask>;
  signal: AbortSignal;
  log: Logger;
}

function failureReason(error: unknown): string {
  if (error instanceof AbortedError) return 'deadline_exceeded';
  if (error instanceof TransportError) return error.kind;
  return 'internal_error';
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof TransportError) {
    return {
      error: error.message,
      kind: error.kind,
      service: error.service,
      statusCode: error.statusCode,
      attempt: error.attempt,
    };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}

function valueOf<T>(outcome: TaskOutcome<T>): T | null {
  return outcome.status === 'fulfilled' ? outcome.value : null;
}

/**
 * Runs one analysis: optional query refinement, paper retrieval, then the requested LLM
 * tasks concurrently. Task failures are isolated and reported as warnings; only a failed
 * retrieval, an empty retrieval or the failure of every task fails the whole request.
 */
export class AnalysisOrchestrator {
  private config: Settings['pipeline'];
  private scraper: PaperSource;
  private llm: TextGenerator;
  private promptBuilder: PromptBuilder;
  private refiner?: QueryRefinerLike;
  private logger: Logger;

  constructor(deps: AnalysisOrchestratorDeps) {
    this.config = deps.config;
    this.scraper = deps.scraper;
    this.llm = deps.llm;
    this.promptBuilder = deps.promptBuilder;
    this.refiner = deps.refiner;
    this.logger = deps.logger ?? createConsoleLogger('Pipeline');
  }

  async analyze(request: AnalysisRequest, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const requestId = options.requestId ?? uuidv4();
    const deadlineMs = Math.min(this.config.overallDeadlineMs, request.deadline_ms ?? Infinity);
    const linked = linkedController(options.signal);
    const timer = setTimeout(() => {
      linked.controller.abort(new Error(`Deadline of ${deadlineMs}ms exceeded`));
    }, deadlineMs);

    try {
      return await this.run(request, requestId, linked.controller.signal);
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }
  }

  private async run(
    request: AnalysisRequest,
    requestId: string,
    signal: AbortSignal
  ): Promise<AnalysisResult> {
    const startedAt = Date.now();
    const log = withContext(this.logger, { requestId });
    const query = this.refineQuery(request.raw_query, log);

    let papers: PaperRecord[];
    try {
      papers = await raceWithSignal(
        this.scraper.fetchPapers(query.text, this.config.maxPapers, { signal }),
        signal
      );
    } catch (error) {
      if (signal.aborted) {
        log.warn('Deadline exceeded during paper retrieval', describeError(error));
        return { success: false, error: new PipelineError('deadline_exceeded', [], error) };
      }
      log.error('Paper retrieval failed', describeError(error));
      return { success: false, error: new PipelineError('retrieval_failed', [], error) };
    }

    if (papers.length === 0) {
      log.warn('Scraper returned no papers', { query: query.text });
      return { success: false, error: new PipelineError('no_papers_found') };
    }

    const context: TaskContext = {
      request,
      papers,
      requested: new Set<AnalysisTask>(request.tasks ?? ANALYSIS_TASKS),
      signal,
      log,
    };

    const [summary, gaps, explanation] = await Promise.all([
      this.runTask('summary', context),
      this.runTask('gap_analysis', context),
      this.runTask('explanation', context),
    ]);

    const outcomes: Array<[AnalysisTask, TaskOutcome<unknown>]> = [
      ['summary', summary],
      ['gap_analysis', gaps],
      ['explanation', explanation],
    ];
    const failures: string[] = [];
    const warnings: string[] = [];
    let succeeded = 0;
    for (const [task, outcome] of outcomes) {
      if (outcome.status === 'fulfilled') succeeded++;
      if (outcome.status === 'failed') {
        failures.push(outcome.reason);
        warnings.push(`${task} failed: ${outcome.reason}`);
      }
    }

    if (succeeded === 0) {
      const kind = failures.every((reason) => reason === 'deadline_exceeded')
        ? 'deadline_exceeded'
        : 'all_tasks_failed';
      log.error('Every requested analysis task failed', { warnings });
      return { success: false, error: new PipelineError(kind, warnings) };
    }

    const output: StructuredOutput = {
      status: warnings.length > 0 ? 'partial' : 'complete',
      summary: valueOf(summary),
      research_gaps: valueOf(gaps),
      explanation: valueOf(explanation),
      warnings,
      education_level: request.user_profile.education_level,
      query: {
        original: request.raw_query,
        refined: query.text,
        was_refined: query.was_refined,
      },
      paper_count: papers.length,
      metadata: {
        request_id: requestId,
        processed_at: new Date().toISOString(),
        version: OUTPUT_VERSION,
      },
    };

    log.info('Analysis finished', {
      status: output.status,
      papers: papers.length,
      warnings: warnings.length,
      durationMs: Date.now() - startedAt,
    });
    return { success: true, output };
  }

  private refineQuery(rawQuery: string, log: Logger): RefinedQuery {
    if (!this.config.refineQueryEnabled || !this.refiner) {
      return { text: rawQuery, was_refined: false };
    }
    try {
      const refined = this.refiner.refine(rawQuery);
      if (refined.was_refined) {
        log.info('Query refined', { original: rawQuery, refined: refined.text });
      }
      return refined;
    } catch (error) {
      log.warn('Query refinement threw, continuing with raw query', describeError(error));
      return { text: rawQuery, was_refined: false };
    }
  }

  private async runTask<K extends AnalysisTask>(
    task: K,
    context: TaskContext
  ): Promise<TaskOutcome<TaskOutputs[K]>> {
    if (!context.requested.has(task)) return { status: 'skipped' };
    const { request, papers, signal, log } = context;

    try {
      const prompt = this.promptBuilder.build(task, papers, request.user_profile, request.raw_query);
      const generation = await raceWithSignal(this.llm.generate(prompt, { signal, label: task }), signal);
      const response: LLMResponse = {
        task,
        raw_text: generation.text,
        latency_ms: generation.latencyMs,
      };
      log.info(`[${task}] LLM response received`, {
        latencyMs: response.latency_ms,
        attempts: generation.attempts,
        model: generation.model,
        finishReason: generation.finishReason,
        inputTokens: generation.inputTokens,
        outputTokens: generation.outputTokens,
      });

      const formatted = formatTaskOutput(task, response.raw_text);
      if (!formatted.success) {
        log.warn(`[${task}] Output rejected`, {
          kind: formatted.error.kind,
          finishReason: generation.finishReason,
        });
        return { status: 'failed', reason: formatted.error.kind };
      }
      return { status: 'fulfilled', value: formatted.data };
    } catch (error) {
      const reason = signal.aborted ? 'deadline_exceeded' : failureReason(error);
      log.warn(`[${task}] Task failed`, { reason, ...describeError(error) });
      return { status: 'failed', reason };
    }
  }
}
