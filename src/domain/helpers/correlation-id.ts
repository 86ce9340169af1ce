import crypto from 'crypto';

/**
 * Deterministic id for one completed slot set in one thread.
 * Same thread, intent and slots always give the same id; key order does not matter.
 */
export function buildCorrelationId(threadId: string, intent: string, slots: Readonly<Record<string, string>>): string {
  const canonicalSlots = Object.keys(slots)
    .sort()
    .map((key) => `${key}=${slots[key]}`)
    .join('&');

  return crypto.createHash('sha256').update(`${threadId}|${intent}|${canonicalSlots}`).digest('hex');
}
