// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, SessionError, ValidationError } from '../../utils/errors.js';
import { Messages } from '../../utils/messages.js';
import type { Logger } from '../../utils/logger.js';

export function createErrorHandler(logger: Logger, isDev: boolean) {
  return function errorHandler(
    error: FastifyError,
    request: FastifyRequest,
    reply: FastifyReply,
  ): void {
    const context = {
      requestId: request.id,
      method: request.method,
      url: request.url,
    };

    if (error instanceof AppError) {
      // Client errors are expected outcomes, not faults
      if (error.statusCode >= 500) {
        logger.error({ ...context, err: error }, 'Request error');
      } else {
        logger.info({ ...context, code: error.code }, 'Request rejected');
      }

      if (error instanceof SessionError) {
        reply.header('WWW-Authenticate', 'Bearer');
      }

      reply.status(error.statusCode).send({
        error: {
          message: error.message,
          code: error.code,
          ...(error instanceof ValidationError &&
            error.details !== undefined && { details: error.details }),
          ...(isDev && { stack: error.stack }),
        },
        requestId: request.id,
      });
      return;
    }

    // Fastify validation errors
    if (error.validation) {
      logger.info({ ...context, code: 'VALIDATION_ERROR' }, 'Request rejected');
      reply.status(400).send({
        error: {
          message: Messages.VALIDATION_FAILED,
          code: 'VALIDATION_ERROR',
          details: isDev ? error.validation : undefined,
        },
        requestId: request.id,
      });
      return;
    }

    // Malformed JSON and other framework-level client errors
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      logger.info({ ...context, code: error.code }, 'Request rejected');
      reply.status(statusCode).send({
        error: {
          message: error.message,
          code: error.code,
        },
        requestId: request.id,
      });
      return;
    }

    logger.error({ ...context, err: error }, 'Request error');

    // Never leak details in production
    reply.status(statusCode).send({
      error: {
        message: isDev ? error.message : Messages.INTERNAL_ERROR,
        code: 'INTERNAL_ERROR',
        ...(isDev && { stack: error.stack }),
      },
      requestId: request.id,
    });
  };
}
