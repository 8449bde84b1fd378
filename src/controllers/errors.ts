import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { ConfigurationError, UnsupportedOperationError, errorMessage } from '../utils/errors';

/**
 * Map a handler failure onto the API's error body
 */
export function sendError(reply: FastifyReply, error: unknown, context: string) {
  if (error instanceof z.ZodError) {
    return reply.status(400).send({
      success: false,
      error: 'Validation error',
      details: error.errors,
    });
  }

  reply.log.error({ err: error }, `${context} error`);

  if (error instanceof ConfigurationError) {
    return reply.status(503).send({ success: false, error: error.message });
  }

  if (error instanceof UnsupportedOperationError) {
    return reply.status(501).send({ success: false, error: error.message });
  }

  return reply.status(500).send({
    success: false,
    error: errorMessage(error) || 'Internal server error',
  });
}
