import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { MemoryError } from 'memory-core';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

function errorBody(code: string, message: string, details?: unknown): ErrorBody {
  return { error: { code, message, ...(details !== undefined && { details }) } };
}

/**
 * Every failure leaves the daemon as `{ error: { code, message, details? } }`.
 * Unexpected errors are logged and answered with a generic 500.
 */
export async function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof MemoryError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, code: error.code }, error.message);
      } else {
        request.log.info({ code: error.code }, error.message);
      }
      return reply.code(error.statusCode).send(errorBody(error.code, error.message, error.details));
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const message = issues
        .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ');
      return reply.code(400).send(errorBody('VALIDATION_ERROR', message, { issues }));
    }

    // Fastify's own client errors: malformed JSON, bad content type, body too large.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const code = error.statusCode === 400 ? 'VALIDATION_ERROR' : (error.code || 'BAD_REQUEST');
      return reply.code(error.statusCode).send(errorBody(code, error.message));
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send(errorBody('INTERNAL_ERROR', 'Internal server error'));
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send(errorBody('NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });
}
