/**
 * Intents that map to an IT-operations action with slots to fill
 */
export const ACTION_INTENTS = [
  'ticket_status',
  'ticket_create',
  'password_reset',
  'kb_search',
  'software_request',
] as const;

export type ActionIntent = (typeof ACTION_INTENTS)[number];

/**
 * Intents answered with a canned reply, never opening a session
 */
export const CONVERSATIONAL_INTENTS = ['greeting', 'help'] as const;

export type ConversationalIntent = (typeof CONVERSATIONAL_INTENTS)[number];

export const CANCEL_INTENT = 'cancel';

export function isActionIntent(value: string): value is ActionIntent {
  return (ACTION_INTENTS as readonly string[]).includes(value);
}

export function isConversationalIntent(value: string): value is ConversationalIntent {
  return (CONVERSATIONAL_INTENTS as readonly string[]).includes(value);
}
