/**
 * Error handler - maps engine errors onto HTTP responses
 * @module errors
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  NotFoundError,
  StorageCorruptionError,
  ValidationError,
  type ValidationIssue,
} from '@stockbill/core';

/**
 * JSON body of every error response
 */
export interface ErrorResponse {
  error: string;
  message: string;
  issues?: ValidationIssue[];
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

/**
 * Status code and body for an error raised while handling a request
 */
export function mapError(error: unknown): MappedError {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { error: error.code, message: error.message, issues: error.issues },
    };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.code, message: error.message } };
  }
  if (error instanceof StorageCorruptionError) {
    return { status: 500, body: { error: error.code, message: error.message } };
  }
  if (isClientError(error)) {
    return { status: error.statusCode, body: { error: 'BAD_REQUEST', message: error.message } };
  }
  return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

function isClientError(error: unknown): error is FastifyError & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

/**
 * Install the error handler on a Fastify instance
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const { status, body } = mapError(error);

    if (status >= 500) {
      request.log.error({ err: error }, 'request failed');
    } else {
      request.log.info({ code: body.error }, body.message);
    }

    return reply.code(status).send(body);
  });
}
