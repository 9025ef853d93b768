import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { ChartValidationError, ValidationError } from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    // Schedules that parse but cannot be laid out
    if (error instanceof ChartValidationError) {
      response.error = 'Chart Error';
      response.message = error.message;
      response.statusCode = 400;
      response.details = error.details;
      request.log.warn({ code: error.code }, error.message);
      return reply.status(400).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    // Handle Fastify errors (e.g., malformed JSON bodies)
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      } else if (error.statusCode === 415) {
        response.error = 'Unsupported Media Type';
      }
      return reply.status(error.statusCode).send(response);
    }

    // Log unexpected errors
    fastify.log.error(error);

    return reply.status(500).send(response);
  });
}
