import type { FastifyInstance } from 'fastify';

export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}

export function registerHealthRoutes(fastify: FastifyInstance, scraper: HealthCheckable) {
  // Liveness only
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  fastify.get('/health/dependencies', async () => {
    const scraperUp = await scraper.healthCheck();
    return {
      status: scraperUp ? 'ok' : 'degraded',
      dependencies: { scraper: scraperUp },
      timestamp: new Date().toISOString(),
    };
  });
}
