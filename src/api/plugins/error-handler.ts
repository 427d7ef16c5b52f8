import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { AppError, InvalidDomainError } from '../../lib/errors.js';
import { ZodError } from 'zod';

const errorHandlerPluginFn: FastifyPluginAsync = async (app) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof InvalidDomainError) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        input: error.input,
      });
    }

    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'VALIDATION_ERROR',
        message: 'Invalid request',
        details: error.flatten().fieldErrors,
      });
    }

    // Fastify validation and body parsing errors
    if (error.validation || (error.statusCode !== undefined && error.statusCode < 500)) {
      return reply.status(error.statusCode ?? 400).send({
        error: error.validation ? 'VALIDATION_ERROR' : (error.code ?? 'BAD_REQUEST'),
        message: error.message,
      });
    }

    request.log.error(error, 'Unhandled error');
    return reply.status(500).send({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
};

export const errorHandlerPlugin = fp(errorHandlerPluginFn, { name: 'error-handler' });
