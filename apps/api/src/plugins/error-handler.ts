// =============================================================================
// Attendwell API: Global error handler plugin
// =============================================================================

import type { FastifyInstance, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError } from '../lib/errors.js';
import { UniqueViolationError } from '../repositories/types.js';
import { captureException } from '../sentry.js';

async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError | ZodError | Error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      });
    }

    // Zod validation errors → 400
    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.flatten(),
        },
      });
    }

    // Routes translate the collisions they expect; one that slips through is still a bad request
    if (error instanceof UniqueViolationError) {
      return reply.status(400).send({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'A record with these values already exists' },
      });
    }

    // Fastify validation errors → 400
    if ('validation' in error && error.validation) {
      return reply.status(400).send({
        success: false,
        error: {
          code: 'BAD_REQUEST',
          message: error.message,
          details: error.validation,
        },
      });
    }

    // Known HTTP errors (statusCode set by Fastify or a plugin)
    const statusCode = 'statusCode' in error && error.statusCode ? error.statusCode : 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        success: false,
        error: {
          code: statusCode === 429 ? 'RATE_LIMITED' : 'CLIENT_ERROR',
          message: error.message,
        },
      });
    }

    // Unexpected server errors: log, send to Sentry, return a generic message
    request.log.error({ err: error, req: { method: request.method, url: request.url } }, 'Unhandled error');
    captureException(error, { method: request.method, url: request.url });

    return reply.status(500).send({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
      },
    });
  });
}

export default fp(errorHandlerPlugin, { name: 'error-handler' });
