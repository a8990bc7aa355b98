import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '@shared/errors/app-error.js';
import { formatZodError } from '@shared/errors/zod-error-formatter.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

function errorCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case 401:
      return ErrorCodes.UNAUTHORIZED;
    case 403:
      return ErrorCodes.FORBIDDEN;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 409:
      return ErrorCodes.CONFLICT;
    default:
      return ErrorCodes.BAD_REQUEST;
  }
}

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  // Zod validation error
  if (error instanceof ZodError) {
    return reply.status(400).send(formatZodError(error).toResponse(requestId));
  }

  // Known operational error
  if (error instanceof AppError) {
    logger.warn({ err: error, requestId }, error.message);
    return reply.status(error.statusCode).send(error.toResponse(requestId));
  }

  // Request schema validation (fastify-type-provider-zod)
  if ('validation' in error && error.validation) {
    return reply.status(400).send({
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: {
        issues: error.validation.map((issue) => ({
          field: issue.instancePath.replace(/^\//, '').replace(/\//g, '.'),
          message: issue.message ?? 'Invalid value',
        })),
      },
      requestId,
    });
  }

  // httpErrors thrown from routes (@fastify/sensible)
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  if (statusCode && statusCode >= 400 && statusCode < 500 && statusCode !== 429) {
    return reply.status(statusCode).send({
      error: error.message,
      code: errorCodeForStatus(statusCode),
      requestId,
    });
  }

  // Rate limit error
  if (statusCode === 429) {
    return reply.status(429).send({
      error: 'Too many requests',
      code: ErrorCodes.RATE_LIMITED,
      requestId,
    });
  }

  // Unknown error
  logger.error({ err: error, requestId }, 'Unhandled error');
  return reply.status(500).send({
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
  });
}
