import type { FastifyInstance, FastifyReply } from 'fastify';
import { ErrorType, LedgerError, RecordValidationError } from '@services/errors.js';
import type { ErrorContext } from '@services/error-handler.js';

const STATUS_BY_TYPE: Record<ErrorType, number> = {
  [ErrorType.VALIDATION_ERROR]: 400,
  [ErrorType.INSUFFICIENT_FUNDS]: 422,
  [ErrorType.INVALID_SIGNATURE]: 400,
  [ErrorType.INVALID_INPUT]: 409,
  [ErrorType.INVALID_BLOCK]: 409,
  [ErrorType.STORE_UNAVAILABLE]: 503,
  [ErrorType.CONCURRENCY_ERROR]: 409,
  [ErrorType.SYSTEM_ERROR]: 500
};

export function statusForError(error: unknown): number {
  return error instanceof LedgerError ? STATUS_BY_TYPE[error.type] : 500;
}

/**
 * Reply with the status matching a thrown error. Ledger errors describe a
 * problem with the request (or an unavailable store) and are passed on;
 * anything else is logged and reported as an internal error.
 */
export function sendError(
  fastify: FastifyInstance,
  reply: FastifyReply,
  error: unknown,
  context: ErrorContext
): FastifyReply {
  const structuredError = fastify.services.errorHandler.createStructuredError(error, context);
  const statusCode = statusForError(error);

  if (statusCode === 500) {
    fastify.log.error({ structuredError, originalError: error }, `Unexpected error in ${context.operation}`);
    return reply.status(500).send({
      success: false,
      error: 'Internal server error',
      type: ErrorType.SYSTEM_ERROR
    });
  }

  return reply.status(statusCode).send({
    success: false,
    error: error instanceof RecordValidationError ? error.errors.join('; ') : structuredError.message,
    type: structuredError.type
  });
}
