import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { PipelineError } from '../../pipeline/errors';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

export async function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  if (error instanceof PipelineError) {
    request.log.warn({ kind: error.kind, warnings: error.warnings, cause: error.cause }, 'Analysis failed');
    return reply.status(error.statusCode).send({
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        warnings: error.warnings,
      },
    });
  }

  const statusCode = error.statusCode || 500;
  const message = statusCode >= 500 ? 'Internal Server Error' : error.message || 'Bad Request';

  request.log.error(error, 'Request error');

  return reply.status(statusCode).send({
    error: {
      message,
      code: error.code || (statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST'),
      statusCode,
    },
  });
}
