import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { DialogueEngine } from '../../../application/services/dialogue-engine.js';
import type { Logger } from '../../../application/ports/driven/logger-port.js';
import type { Config } from '../../../infrastructure/config/config.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../http-errors.js';

export interface DevtoolsConversationRoutesOptions {
  engine: Pick<DialogueEngine, 'handleMessage' | 'peekSession'>;
  config: Pick<Config, 'nodeEnv' | 'devToolsEnabled' | 'devToolsToken'>;
  logger: Logger;
}

const conversationBodySchema = z.object({
  threadId: z.string().min(1).default('devtools'),
  senderId: z.string().min(1).default('devtools-user'),
  text: z.string().min(1),
});

const threadParamsSchema = z.object({ threadId: z.string().min(1) });

/**
 * Drives the dialogue engine directly, bypassing Slack.
 * Never served in production; guarded by x-dev-tools-token when DEVTOOLS_TOKEN is set.
 */
export const devtoolsConversationRoutes: FastifyPluginAsync<DevtoolsConversationRoutesOptions> = async (
  fastify,
  options
) => {
  const { engine, config, logger } = options;

  fastify.addHook('onRequest', async (request) => {
    if (!config.devToolsEnabled || config.nodeEnv === 'production') {
      throw new NotFoundError('Not found');
    }

    if (config.devToolsToken && request.headers['x-dev-tools-token'] !== config.devToolsToken) {
      logger.warn({ requestId: request.id }, 'DevTools request with missing or invalid token');
      throw new ForbiddenError();
    }
  });

  fastify.post('/devtools/conversation', async (request) => {
    const parsed = conversationBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid body: ${parsed.error.errors.map((e) => `${e.path.join('.')} ${e.message}`).join(', ')}`
      );
    }

    const { threadId, senderId, text } = parsed.data;
    const reply = await engine.handleMessage(threadId, text, senderId, request.id);
    const session = await engine.peekSession(threadId);

    return { threadId, reply, session };
  });

  fastify.get('/devtools/conversation/:threadId', async (request) => {
    const parsed = threadParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      throw new ValidationError('threadId is required');
    }

    const session = await engine.peekSession(parsed.data.threadId);
    return { threadId: parsed.data.threadId, session };
  });
};
