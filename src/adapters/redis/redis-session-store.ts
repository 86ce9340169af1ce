import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { ConversationSession } from '../../domain/entities/conversation-session.js';
import { ACTION_INTENTS } from '../../domain/enums/intent-type.js';
import { SessionStoreUnavailableError, toError } from '../../domain/errors/dialogue-errors.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { SessionStore } from '../../application/ports/driven/session-store.port.js';

const KEY_PREFIX = 'dialogue:session:';

const storedSessionSchema = z.object({
  threadId: z.string(),
  activeIntent: z.enum(ACTION_INTENTS),
  collectedSlots: z.record(z.string()),
  pendingSlot: z.string().nullable(),
  lastUpdated: z.string().datetime(),
  turnCount: z.number().int().nonnegative(),
  senderId: z.string(),
});

/**
 * Redis SessionStore: one JSON value per thread, TTL restarted on every write (SETEX)
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private client: Redis,
    private logger: Logger
  ) {}

  async get(threadId: string): Promise<ConversationSession | null> {
    let value: string | null;
    try {
      value = await this.client.get(this.getKey(threadId));
    } catch (error) {
      throw new SessionStoreUnavailableError('Could not read session from Redis', toError(error));
    }

    if (value === null) {
      return null;
    }

    return this.parse(threadId, value);
  }

  async put(threadId: string, session: ConversationSession, ttlSeconds: number): Promise<void> {
    const value = JSON.stringify({ ...session, lastUpdated: session.lastUpdated.toISOString() });
    try {
      await this.client.setex(this.getKey(threadId), ttlSeconds, value);
    } catch (error) {
      throw new SessionStoreUnavailableError('Could not write session to Redis', toError(error));
    }
  }

  async delete(threadId: string): Promise<void> {
    try {
      await this.client.del(this.getKey(threadId));
    } catch (error) {
      throw new SessionStoreUnavailableError('Could not delete session from Redis', toError(error));
    }
  }

  private getKey(threadId: string): string {
    return `${KEY_PREFIX}${threadId}`;
  }

  /**
   * Unreadable values are treated as absent
   */
  private parse(threadId: string, value: string): ConversationSession | null {
    let raw: unknown;
    try {
      raw = JSON.parse(value);
    } catch (error) {
      this.logger.warn({ threadId, error: toError(error) }, 'Stored session is not valid JSON');
      return null;
    }

    const parsed = storedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ threadId, issues: parsed.error.errors.map((e) => e.path.join('.')) }, 'Stored session has an unexpected shape');
      return null;
    }

    return { ...parsed.data, lastUpdated: new Date(parsed.data.lastUpdated) };
  }
}
