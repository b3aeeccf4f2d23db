import type { FastifyBaseLogger } from 'fastify';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export function createConsoleLogger(scope: string): Logger {
  return {
    error: (msg, ctx) => console.error(`[${scope}] ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`[${scope}] ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`[${scope}] ${msg}`, ctx || ''),
  };
}

/** Routes pipeline logs through the server's pino instance. */
export function fromFastifyLogger(log: FastifyBaseLogger, component: string): Logger {
  const child = log.child({ component });
  return {
    error: (msg, ctx) => child.error(ctx ?? {}, msg),
    warn: (msg, ctx) => child.warn(ctx ?? {}, msg),
    info: (msg, ctx) => child.info(ctx ?? {}, msg),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
};

/** Adds `bindings` to the context of every entry. */
export function withContext(logger: Logger, bindings: Record<string, unknown>): Logger {
  return {
    error: (msg, ctx) => logger.error(msg, { ...bindings, ...ctx }),
    warn: (msg, ctx) => logger.warn(msg, { ...bindings, ...ctx }),
    info: (msg, ctx) => logger.info(msg, { ...bindings, ...ctx }),
  };
}
