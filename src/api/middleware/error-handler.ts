/**
 * Error Handler Middleware
 *
 * Maps thrown errors onto the ErrorResponse envelope
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { SessionError, VotingError } from '../../errors.js';
import type { ErrorResponse } from '../types.js';

/**
 * API error with status code
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function send(reply: FastifyReply, statusCode: number, message: string, code?: string): void {
  const response: ErrorResponse = {
    error: { message, code, statusCode },
  };
  reply.status(statusCode).send(response);
}

/**
 * Error handler function for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof ZodError) {
    const response: ErrorResponse = {
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        statusCode: 400,
      },
    };

    reply.status(400).send({
      ...response,
      validationErrors: error.errors,
    });
    return;
  }

  if (error instanceof ApiError) {
    send(reply, error.statusCode, error.message, error.code);
    return;
  }

  // Session refusals conflict with the current phase
  if (error instanceof SessionError) {
    send(reply, 409, error.message, error.code);
    return;
  }

  if (error instanceof VotingError) {
    send(reply, 400, error.message, error.code);
    return;
  }

  if ('statusCode' in error && typeof error.statusCode === 'number') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    send(reply, error.statusCode, error.message, code);
    return;
  }

  request.log.error({ err: error }, 'unhandled API error');
  send(reply, 500, 'Internal server error', 'INTERNAL_ERROR');
}

export function notFound(resource: string, id: string): ApiError {
  return new ApiError(404, `${resource} not found: ${id}`, 'NOT_FOUND');
}

export function unauthorized(message = 'Unauthorized'): ApiError {
  return new ApiError(401, message, 'UNAUTHORIZED');
}
