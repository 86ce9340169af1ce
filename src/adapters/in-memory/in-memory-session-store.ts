import type { ConversationSession } from '../../domain/entities/conversation-session.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { SessionStore } from '../../application/ports/driven/session-store.port.js';

const SWEEP_INTERVAL_MS = 60 * 1000;

/**
 * In-memory SessionStore
 * Used in development and tests, or when Redis is disabled
 *
 * Sessions are copied on the way in and out, so callers never share mutable state with the store.
 */
export class InMemorySessionStore implements SessionStore {
  private storage: Map<string, { session: ConversationSession; expiresAt: number }> = new Map();
  private sweepTimer: NodeJS.Timeout;

  constructor(
    private logger: Logger,
    private now: () => number = Date.now
  ) {
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
    this.logger.info({}, 'InMemorySessionStore initialized');
  }

  async get(threadId: string): Promise<ConversationSession | null> {
    const item = this.storage.get(threadId);
    if (!item) {
      return null;
    }

    if (this.now() >= item.expiresAt) {
      this.storage.delete(threadId);
      return null;
    }

    return structuredClone(item.session);
  }

  async put(threadId: string, session: ConversationSession, ttlSeconds: number): Promise<void> {
    this.storage.set(threadId, {
      session: structuredClone(session),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(threadId: string): Promise<void> {
    this.storage.delete(threadId);
  }

  size(): number {
    return this.storage.size;
  }

  dispose(): void {
    clearInterval(this.sweepTimer);
    this.storage.clear();
  }

  private sweep(): void {
    const now = this.now();
    for (const [threadId, item] of this.storage) {
      if (now >= item.expiresAt) {
        this.storage.delete(threadId);
      }
    }
  }
}
