import type { FastifyError, FastifyInstance } from 'fastify';
import type { Logger } from '../../../application/ports/driven/logger-port.js';
import { DialogueError } from '../../../domain/errors/dialogue-errors.js';
import { HttpError } from '../http-errors.js';

/**
 * Every error leaves as { error: { code, message, requestId } }.
 * Installed on the root instance so it covers every route plugin.
 */
export function setupErrorHandler(app: FastifyInstance, logger: Logger, nodeEnv: string): void {
  app.setErrorHandler((error: FastifyError | HttpError | DialogueError, request, reply) => {
    const requestId = request.id;
    const statusCode =
      error instanceof DialogueError ? 503 : error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;

    const errorContext = {
      requestId,
      method: request.method,
      url: request.url,
      statusCode,
      code: error.code,
    };

    if (error instanceof HttpError || error instanceof DialogueError) {
      logger.warn(
        { ...errorContext, error: { name: error.name, message: error.message, cause: error.cause?.message } },
        'Application error'
      );
      return reply.status(statusCode).send({
        error: { code: error.code, message: error.message, requestId },
      });
    }

    logger.error(
      {
        ...errorContext,
        error: {
          name: error.name,
          message: error.message,
          stack: nodeEnv === 'development' ? error.stack : undefined,
        },
      },
      'Unhandled error'
    );

    const message = nodeEnv === 'production' && statusCode >= 500 ? 'Internal server error' : error.message;
    return reply.status(statusCode).send({
      error: { code: error.code || 'INTERNAL_ERROR', message, requestId },
    });
  });
}
