import crypto from 'crypto';
import type { Redis } from 'ioredis';
import { SessionStoreUnavailableError, toError } from '../../domain/errors/dialogue-errors.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { ThreadLock } from '../../application/ports/driven/thread-lock.port.js';
import { KeyedSerialQueue } from '../../infrastructure/utils/keyed-serial-queue.js';

const KEY_PREFIX = 'dialogue:lock:';

// Deletes the key only while it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export interface RedisThreadLockOptions {
  /** Expiry of the Redis key, so a crashed holder cannot block a thread forever */
  lockTtlMs: number;
  acquireTimeoutMs: number;
  retryDelayMs: number;
}

const DEFAULT_OPTIONS: RedisThreadLockOptions = {
  lockTtlMs: 30_000,
  acquireTimeoutMs: 10_000,
  retryDelayMs: 50,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * ThreadLock shared by every instance behind the same Redis.
 *
 * Tasks first queue in process, then take a SET NX PX lock carrying a random token.
 * When Redis errors the task still runs under the in-process queue.
 */
export class RedisThreadLock implements ThreadLock {
  private localQueue = new KeyedSerialQueue();

  constructor(
    private client: Redis,
    private logger: Logger,
    private options: RedisThreadLockOptions = DEFAULT_OPTIONS
  ) {}

  runExclusive<T>(threadId: string, task: () => Promise<T>): Promise<T> {
    return this.localQueue.run(threadId, () => this.runLocked(threadId, task));
  }

  private async runLocked<T>(threadId: string, task: () => Promise<T>): Promise<T> {
    const key = `${KEY_PREFIX}${threadId}`;
    const token = crypto.randomUUID();

    let acquired: boolean;
    try {
      acquired = await this.acquire(key, token);
    } catch (error) {
      this.logger.warn({ threadId, error: toError(error) }, 'Redis lock unavailable, using in-process lock only');
      return task();
    }

    if (!acquired) {
      throw new SessionStoreUnavailableError(
        `Could not lock thread ${threadId} within ${this.options.acquireTimeoutMs}ms`
      );
    }

    try {
      return await task();
    } finally {
      await this.release(key, token, threadId);
    }
  }

  private async acquire(key: string, token: string): Promise<boolean> {
    const deadline = Date.now() + this.options.acquireTimeoutMs;

    for (;;) {
      const result = await this.client.set(key, token, 'PX', this.options.lockTtlMs, 'NX');
      if (result === 'OK') {
        return true;
      }
      if (Date.now() >= deadline) {
        return false;
      }
      await sleep(this.options.retryDelayMs);
    }
  }

  private async release(key: string, token: string, threadId: string): Promise<void> {
    try {
      await this.client.eval(RELEASE_SCRIPT, 1, key, token);
    } catch (error) {
      this.logger.warn({ threadId, error: toError(error) }, 'Could not release Redis lock; it will expire');
    }
  }
}
