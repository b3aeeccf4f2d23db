import type { FastifyRequest, FastifyReply } from 'fastify';
import type { AnalysisOrchestrator } from '../../pipeline/runAnalysis';
import type { QueryRefiner } from '../../pipeline/queryRefiner';
import {
  AnalysisRequestSchema,
  RefineQueryBodySchema,
  formatValidationErrors,
} from '../../pipeline/schemas';
import type { AnalysisRequest } from '../../pipeline/types';
import { createError } from '../middleware/errorHandler';

export class AnalysisController {
  constructor(
    private orchestrator: AnalysisOrchestrator,
    private refiner: QueryRefiner
  ) {}

  async refineQuery(request: FastifyRequest, reply: FastifyReply) {
    const parsed = RefineQueryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw createError(formatValidationErrors(parsed.error), 400, 'INVALID_REQUEST');
    }

    const { query } = parsed.data;
    const refined = this.refiner.refine(query);

    reply.send({
      data: {
        original_query: query,
        refined_query: refined.text,
        was_refined: refined.was_refined,
        key_terms: this.refiner.extractKeyTerms(refined.text),
      },
    });
  }

  async analyzePapers(request: FastifyRequest, reply: FastifyReply) {
    const parsed = AnalysisRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw createError(formatValidationErrors(parsed.error), 400, 'INVALID_REQUEST');
    }

    const analysisRequest: Readonly<AnalysisRequest> = Object.freeze(parsed.data);
    request.log.info(
      { query: analysisRequest.raw_query, tasks: analysisRequest.tasks ?? 'all' },
      'Analyzing papers'
    );

    const result = await this.orchestrator.analyze(analysisRequest, { requestId: request.id });
    if (!result.success) {
      throw result.error;
    }

    reply.send({ data: result.output });
  }
}
