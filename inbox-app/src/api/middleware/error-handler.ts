import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import {
  InvalidFilterError,
  InvalidSelectionError,
  RecordSourceError,
  StoreUnavailableError,
  TokenExpiredError,
  TokenNotFoundError,
} from 'bulk-select';
import {
  BulkJobNotFoundError,
  BulkJobNotRunningError,
  InvalidActionParamsError,
  UnknownActionKindError,
} from '../../domain/errors.js';

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    if (
      error instanceof InvalidFilterError ||
      error instanceof InvalidSelectionError ||
      error instanceof UnknownActionKindError ||
      error instanceof InvalidActionParamsError
    ) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    if (error instanceof TokenNotFoundError || error instanceof BulkJobNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    // Expired is not "unknown": the client should reselect rather than give up
    if (error instanceof TokenExpiredError) {
      return reply.status(410).send({
        error: error.name,
        message: error.message,
        hint: 'Reselect and retry',
      });
    }

    if (error instanceof BulkJobNotRunningError) {
      return reply.status(409).send({ error: error.name, message: error.message });
    }

    if (error instanceof StoreUnavailableError) {
      request.log.warn({ err: error }, 'selection token store unavailable');
      return reply.status(503).send({
        error: error.name,
        message: 'Selection store temporarily unavailable',
        retryable: true,
      });
    }

    if (error instanceof RecordSourceError) {
      request.log.warn({ err: error }, 'record store unavailable');
      return reply.status(503).send({
        error: error.name,
        message: 'Record store temporarily unavailable',
        retryable: true,
      });
    }

    // Fastify built-in errors have a numeric `statusCode`; pass it through
    if (hasStatusCode(error)) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
