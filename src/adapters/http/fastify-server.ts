import crypto from 'crypto';
import { fastify, type FastifyInstance } from 'fastify';
import { fastifyRequestContext } from '@fastify/request-context';
import type { DialogueEngine } from '../../application/services/dialogue-engine.js';
import type { MessageRouter } from '../../application/services/message-router.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { Config } from '../../infrastructure/config/config.js';
import type { SlackWebApiAdapter } from '../slack/slack-web-api-adapter.js';
import { setupErrorHandler } from './plugins/error-handler.js';
import { devtoolsConversationRoutes } from './routes/devtools-conversation.routes.js';
import { slackEventsRoutes } from './routes/slack-events.routes.js';

declare module '@fastify/request-context' {
  interface RequestContextData {
    requestId: string;
    logger: Logger;
  }
}

export interface AppDependencies {
  messageRouter: MessageRouter;
  slackAdapter: SlackWebApiAdapter;
  dialogueEngine: DialogueEngine;
  config: Config;
  logger: Logger;
}

export class FastifyServer {
  private app: FastifyInstance;

  constructor(private dependencies: AppDependencies) {
    this.app = fastify({
      requestIdHeader: 'x-request-id',
      genReqId: () => crypto.randomUUID(),
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    const { logger, config } = this.dependencies;

    setupErrorHandler(this.app, logger, config.nodeEnv);

    void this.app.register(fastifyRequestContext);

    this.app.addHook('onRequest', async (request) => {
      request.requestContext.set('requestId', request.id);
      request.requestContext.set('logger', logger);
    });

    this.app.addHook('onResponse', async (request, reply) => {
      logger.info(
        {
          requestId: request.requestContext.get('requestId') ?? request.id,
          method: request.method,
          url: request.url,
          statusCode: reply.statusCode,
          responseTime: reply.elapsedTime,
        },
        'Request completed'
      );
    });
  }

  private setupRoutes(): void {
    const { messageRouter, slackAdapter, dialogueEngine, config, logger } = this.dependencies;

    this.app.get('/health', async () => {
      return { status: 'ok', service: config.serviceName, timestamp: new Date().toISOString() };
    });

    void this.app.register(slackEventsRoutes, { slackAdapter, messageRouter, logger });
    void this.app.register(devtoolsConversationRoutes, { engine: dialogueEngine, config, logger });
  }

  getInstance(): FastifyInstance {
    return this.app;
  }

  async listen(): Promise<void> {
    const { port, host } = this.dependencies.config;
    await this.app.listen({ port, host });
    this.dependencies.logger.info({ port, host }, 'HTTP server started');
  }

  async close(): Promise<void> {
    await this.app.close();
  }
}
