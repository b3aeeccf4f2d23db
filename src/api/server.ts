import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadSettings, type Settings } from '../config/settings';
import { LLMClient, type TextGenerator } from '../agents/llmClient';
import { createLLMProvider } from '../agents/providers';
import { PromptBuilder, loadTemplateTable } from '../agents/promptBuilder';
import { ScraperClient, type PaperSource } from '../ingest/scraper/client';
import { AnalysisOrchestrator } from '../pipeline/runAnalysis';
import { QueryRefiner } from '../pipeline/queryRefiner';
import { LaneLimiter } from '../utils/limiter';
import { fromFastifyLogger } from '../utils/logger';
import { AnalysisController } from './controllers/analysisController';
import { errorHandler } from './middleware';
import { registerAnalysisRoutes, registerHealthRoutes, type HealthCheckable } from './routes';

export interface ServerDeps {
  settings?: Readonly<Settings>;
  /** Overrides the HTTP scraper client, e.g. with an in-process fake. */
  scraper?: PaperSource & HealthCheckable;
  /** Overrides the client built from `LLM_PROVIDER`. */
  llm?: TextGenerator;
}

export async function buildServer(deps: ServerDeps = {}) {
  const settings = deps.settings ?? loadSettings();

  const fastify = Fastify({
    logger: {
      level: settings.server.logLevel,
      transport:
        settings.server.env === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  // Register CORS
  await fastify.register(cors, {
    origin: settings.server.corsOrigin,
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  // One limiter per process so concurrent requests share the dependency caps
  const limiter = new LaneLimiter({
    llm: settings.llm.concurrency,
    scraper: settings.scraper.concurrency,
  });

  const scraper =
    deps.scraper ??
    new ScraperClient(settings.scraper, fromFastifyLogger(fastify.log, 'scraper'), limiter);
  const llm =
    deps.llm ??
    new LLMClient(
      createLLMProvider(settings.llm),
      settings.llm,
      fromFastifyLogger(fastify.log, 'llm'),
      limiter
    );

  const refiner = new QueryRefiner(fromFastifyLogger(fastify.log, 'query-refiner'));
  const orchestrator = new AnalysisOrchestrator({
    config: settings.pipeline,
    scraper,
    llm,
    promptBuilder: new PromptBuilder(
      { tokenBudget: settings.pipeline.promptTokenBudget },
      loadTemplateTable(settings.pipeline.promptTemplatesPath)
    ),
    refiner,
    logger: fromFastifyLogger(fastify.log, 'pipeline'),
  });

  registerHealthRoutes(fastify, scraper);
  registerAnalysisRoutes(fastify, new AnalysisController(orchestrator, refiner), {
    apiKey: settings.server.apiKey,
    env: settings.server.env,
  });

  return fastify;
}

export async function start() {
  const settings = loadSettings();
  const server = await buildServer({ settings });
  const { host, port } = settings.server;

  await server.listen({ port, host });
  server.log.info(`Research intelligence service listening on http://${host}:${port}`);

  const shutdown = async (signal: string) => {
    server.log.info(`${signal} received, closing server`);
    await server.close();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

if (require.main === module) {
  start().catch((err) => {
    console.error('Error starting server:', err);
    process.exit(1);
  });
}
