import type { ActionIntent } from '../enums/intent-type.js';

/**
 * State of an in-progress conversation in one thread.
 *
 * A session only exists while an intent is open: no session means IDLE.
 */
export interface ConversationSession {
  threadId: string;
  activeIntent: ActionIntent;
  collectedSlots: Record<string, string>;
  pendingSlot: string | null;
  lastUpdated: Date;
  turnCount: number;
  senderId: string;
}

export function openSession(
  threadId: string,
  intent: ActionIntent,
  senderId: string,
  now: Date = new Date()
): ConversationSession {
  return {
    threadId,
    activeIntent: intent,
    collectedSlots: {},
    pendingSlot: null,
    lastUpdated: now,
    turnCount: 1,
    senderId,
  };
}

export function isSessionExpired(session: ConversationSession, ttlSeconds: number, now: Date = new Date()): boolean {
  return now.getTime() - session.lastUpdated.getTime() >= ttlSeconds * 1000;
}
