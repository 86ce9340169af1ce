import { Redis } from 'ioredis';
import type { Logger } from '../../application/ports/driven/logger-port.js';

/**
 * Shared ioredis connection for the session store and the thread lock
 */
export function createRedisClient(redisUrl: string, logger: Logger): Redis {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => {
      if (times > 10) {
        logger.error({ attempts: times }, 'Giving up reconnecting to Redis');
        return null;
      }
      return Math.min(times * 50, 2000);
    },
    reconnectOnError: (err) => err.message.includes('READONLY'),
  });

  client.on('error', (err: Error) => {
    logger.warn({ error: err.message }, 'Redis connection error');
  });

  client.on('connect', () => {
    logger.info({}, 'Redis connected');
  });

  return client;
}
