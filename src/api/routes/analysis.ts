import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AnalysisController } from '../controllers/analysisController';
import { requireApiKey } from '../middleware';

export function registerAnalysisRoutes(
  fastify: FastifyInstance,
  controller: AnalysisController,
  auth: { apiKey?: string; env: string }
) {
  const preHandler = requireApiKey(auth.apiKey, auth.env);

  // POST /api/ai/refine_query
  fastify.post('/api/ai/refine_query', { preHandler }, async (request: FastifyRequest, reply: FastifyReply) => {
    await controller.refineQuery(request, reply);
  });

  // POST /api/ai/analyze_papers
  fastify.post('/api/ai/analyze_papers', { preHandler }, async (request: FastifyRequest, reply: FastifyReply) => {
    await controller.analyzePapers(request, reply);
  });
}
