import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';

import { RunstreakError, StorageError } from '../errors.js';
import { logger } from '../utils/logger.js';

function statusForError(error: RunstreakError): number {
  if (error instanceof StorageError) {
    return error.details?.duplicate === true ? 409 : 503;
  }
  return 500;
}

async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.errors,
      });
    }

    if (error.validation) {
      return reply.status(400).send({
        statusCode: 400,
        error: 'Validation Error',
        message: error.message,
      });
    }

    logger.error({
      err: error,
      request: {
        method: request.method,
        url: request.url,
        query: request.query,
      },
    }, 'Request error');

    if (error instanceof RunstreakError) {
      const statusCode = statusForError(error);
      return reply.status(statusCode).send({
        statusCode,
        error: error.name,
        errorType: error.errorType,
        message: error.message,
      });
    }

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      statusCode,
      error: error.name || 'Internal Server Error',
      message: error.message || 'An unexpected error occurred',
    });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
});
