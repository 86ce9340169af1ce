import type { ConversationSession } from '../../../domain/entities/conversation-session.js';

/**
 * Port for per-thread conversation sessions.
 *
 * Implementations throw SessionStoreUnavailableError when the backing store fails.
 */
export interface SessionStore {
  /**
   * Returns the session, or null when absent or older than its TTL
   */
  get(threadId: string): Promise<ConversationSession | null>;

  /**
   * Overwrites the whole session and restarts its TTL
   */
  put(threadId: string, session: ConversationSession, ttlSeconds: number): Promise<void>;

  /**
   * Idempotent
   */
  delete(threadId: string): Promise<void>;
}
