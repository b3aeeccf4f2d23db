import type { FastifyRequest, FastifyReply } from 'fastify';
import { createError } from './errorHandler';

/**
 * Checks the `x-api-key` header the Backend sends. Without a configured key the
 * check is skipped outside production.
 */
export function requireApiKey(expectedKey: string | undefined, env: string) {
  return async function apiKeyPreHandler(request: FastifyRequest, _reply: FastifyReply) {
    if (!expectedKey) {
      if (env === 'production') {
        throw createError('API key authentication required', 401, 'AUTH_REQUIRED');
      }
      return;
    }

    const apiKey = request.headers['x-api-key'];
    if (typeof apiKey !== 'string' || apiKey !== expectedKey) {
      throw createError('Invalid or missing API key', 401, 'INVALID_API_KEY');
    }
  };
}
