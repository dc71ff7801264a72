import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { AppError, ValidationError } from '../../lib/errors.js';
import { ZodError } from 'zod';

const errorHandlerPluginFn: FastifyPluginAsync = async (app) => {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        details: error.details,
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

    // Fastify schema and content-type errors
    if (error.validation || error.statusCode === 400) {
      return reply.status(400).send({
        error: 'VALIDATION_ERROR',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
};

export const errorHandlerPlugin = fp(errorHandlerPluginFn, { name: 'error-handler' });
