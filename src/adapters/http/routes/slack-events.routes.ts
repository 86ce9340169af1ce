import type { FastifyPluginAsync } from 'fastify';
import type { MessageRouter } from '../../../application/services/message-router.js';
import type { Logger } from '../../../application/ports/driven/logger-port.js';
import { toError } from '../../../domain/errors/dialogue-errors.js';
import type { SlackWebApiAdapter } from '../../slack/slack-web-api-adapter.js';
import { UnauthorizedError, ValidationError } from '../http-errors.js';

export interface SlackEventsRoutesOptions {
  slackAdapter: SlackWebApiAdapter;
  messageRouter: MessageRouter;
  logger: Logger;
}

declare module 'fastify' {
  interface FastifyRequest {
    rawBody: string;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Slack Events API endpoint.
 *
 * Events are acknowledged right away and handled in the background: Slack expects
 * an answer within three seconds and redelivers otherwise.
 */
export const slackEventsRoutes: FastifyPluginAsync<SlackEventsRoutesOptions> = async (fastify, options) => {
  const { slackAdapter, messageRouter, logger } = options;

  // Signatures are computed over the exact bytes received
  fastify.decorateRequest('rawBody', '');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (request, body, done) => {
    const text = body.toString();
    request.rawBody = text;
    try {
      done(null, text.length > 0 ? JSON.parse(text) : {});
    } catch (error) {
      done(new ValidationError('Request body is not valid JSON', toError(error)), undefined);
    }
  });

  fastify.post('/slack/events', async (request, reply) => {
    const requestId = request.id;

    const signatureValid = slackAdapter.validateSignature(
      request.rawBody,
      {
        timestamp: headerValue(request.headers['x-slack-request-timestamp']),
        signature: headerValue(request.headers['x-slack-signature']),
      },
      requestId
    );
    if (!signatureValid) {
      throw new UnauthorizedError('Invalid Slack signature');
    }

    const payload = slackAdapter.parseWebhook(request.body, requestId);

    switch (payload.kind) {
      case 'url_verification':
        return reply.send({ challenge: payload.challenge });
      case 'ignored':
        logger.debug({ requestId, reason: payload.reason }, 'Slack event ignored');
        return reply.send({ ok: true });
      case 'message':
        messageRouter.handleIncomingMessage(payload.event, requestId).catch((error: unknown) => {
          logger.error({ requestId, threadId: payload.event.threadId, error: toError(error) }, 'Error handling Slack event');
        });
        return reply.send({ ok: true });
    }
  });
};
