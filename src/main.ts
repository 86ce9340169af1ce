import type { Redis } from 'ioredis';
import { loadConfig } from './infrastructure/config/config.js';
import { PinoLogger } from './infrastructure/logging/pino-logger.js';
import { InMemorySessionStore } from './adapters/in-memory/in-memory-session-store.js';
import { InProcessThreadLock } from './adapters/in-memory/in-process-thread-lock.js';
import { createRedisClient } from './adapters/redis/redis-client.js';
import { RedisSessionStore } from './adapters/redis/redis-session-store.js';
import { RedisThreadLock } from './adapters/redis/redis-thread-lock.js';
import { KeywordIntentGateway } from './adapters/nlu/keyword-intent-gateway.js';
import { HttpIntentGateway } from './adapters/nlu/http-intent-gateway.js';
import { ServiceNowAdapter } from './adapters/servicenow/servicenow-adapter.js';
import { LocalKnowledgeBaseAdapter } from './adapters/knowledge-base/local-knowledge-base-adapter.js';
import { SlackWebApiAdapter } from './adapters/slack/slack-web-api-adapter.js';
import { FastifyServer } from './adapters/http/fastify-server.js';
import { createDefaultActionCatalog } from './application/catalog/default-action-catalog.js';
import { createActionHandlers } from './application/use-cases/action-handlers.js';
import { DialogueEngine } from './application/services/dialogue-engine.js';
import { MessageRouter } from './application/services/message-router.js';
import type { SessionStore } from './application/ports/driven/session-store.port.js';
import type { ThreadLock } from './application/ports/driven/thread-lock.port.js';
import type { IntentGateway } from './application/ports/driven/intent-gateway.port.js';
import type { KnowledgeBase } from './application/ports/driven/knowledge-base.port.js';

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = new PinoLogger(config.logLevel, config.serviceName);

  logger.info({ nodeEnv: config.nodeEnv }, 'Starting application');

  let redis: Redis | undefined;
  try {
    // Session state and thread lock
    let sessionStore: SessionStore;
    let threadLock: ThreadLock;
    if (config.redisEnabled && config.redisUrl) {
      redis = createRedisClient(config.redisUrl, logger);
      sessionStore = new RedisSessionStore(redis, logger);
      threadLock = new RedisThreadLock(redis, logger);
    } else {
      logger.info({}, 'Redis disabled, sessions are kept in memory');
      sessionStore = new InMemorySessionStore(logger);
      threadLock = new InProcessThreadLock();
    }

    // Intent classification
    const intentGateway: IntentGateway = config.intentGatewayUrl
      ? new HttpIntentGateway(config.intentGatewayUrl, config.intentGatewayTimeoutMs, logger)
      : new KeywordIntentGateway(logger);

    // Backends
    const serviceNow = new ServiceNowAdapter(config, logger);
    const knowledgeBase: KnowledgeBase =
      config.knowledgeBaseSource === 'local'
        ? new LocalKnowledgeBaseAdapter(config.knowledgeBaseDir, logger)
        : serviceNow;

    const catalog = createDefaultActionCatalog(createActionHandlers(serviceNow, knowledgeBase, logger));

    const dialogueEngine = new DialogueEngine(sessionStore, threadLock, intentGateway, catalog, logger, {
      confidenceThreshold: config.intentConfidenceThreshold,
      interruptConfidenceThreshold: config.interruptConfidenceThreshold,
      maxTurnsPerIntent: config.maxTurnsPerIntent,
      sessionTtlSeconds: config.sessionTtlSeconds,
      // room for the adapters' own retries
      handlerTimeoutMs: config.backendTimeoutMs * 2,
      classifierTimeoutMs: config.intentGatewayTimeoutMs * 2,
    });

    const slackAdapter = new SlackWebApiAdapter(config, logger);
    const messageRouter = new MessageRouter(dialogueEngine, slackAdapter, logger, {
      dedupeWindowSeconds: config.messageDedupeWindowSeconds,
    });

    const server = new FastifyServer({ messageRouter, slackAdapter, dialogueEngine, config, logger });

    const shutdown = async (): Promise<void> => {
      logger.info({}, 'Shutting down');
      await server.close();
      if (redis) {
        await redis.quit();
      }
      process.exit(0);
    };

    const onSignal = (): void => {
      shutdown().catch((error: unknown) => {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      });
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    await server.listen();
  } catch (error) {
    logger.error({ error }, 'Fatal error during startup');
    if (redis) {
      redis.disconnect();
    }
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  // configuration errors happen before a logger exists
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
