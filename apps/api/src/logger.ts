import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';

// Fastify's request logger and the services share one pino instance.
export type Logger = FastifyBaseLogger;

export function createLogger(level: string): Logger {
  return pino({ level, base: { service: 'voice-reminder' } });
}

export function errorContext(err: unknown) {
  return err instanceof Error
    ? { message: err.message, stack: err.stack, cause: err.cause instanceof Error ? err.cause.message : undefined }
    : { message: String(err) };
}
