import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { ConcurrencyError, EventDecodeError, EventStoreError } from 'lifecycle-event-store';
import { CourseNotFoundError, InvariantViolationError } from '../../domain/errors.js';

const RUNTIME_ERRORS = [TypeError, RangeError, ReferenceError, SyntaxError];

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError: unknown, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Lost a race on the pair or course: safe to reload and retry
    if (error instanceof ConcurrencyError) {
      return reply.status(409).send({
        error: 'ConcurrencyError',
        retryable: true,
        hint: 'Reload and retry',
      });
    }

    if (error instanceof CourseNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'ValidationError', message: 'Invalid request', issues: error.issues });
    }

    // Broken derived values and infrastructure failures stay opaque
    if (
      error instanceof InvariantViolationError ||
      error instanceof EventStoreError ||
      error instanceof EventDecodeError
    ) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify's own errors (bad JSON, unsupported media type) carry a status code
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    // Domain errors: named Error subclass (not a plain Error)
    if (error.constructor !== Error && !RUNTIME_ERRORS.some((type) => error instanceof type)) {
      return reply.status(422).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
