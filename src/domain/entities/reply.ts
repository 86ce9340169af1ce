import type { ActionIntent } from '../enums/intent-type.js';

export type DialoguePhase = 'IDLE' | 'COLLECTING';

export type ReplyOutcome =
  | 'prompt'
  | 'reprompt'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'clarification'
  | 'help'
  | 'conversational'
  | 'handoff';

/**
 * What the engine hands back to the transport for one inbound message
 */
export interface Reply {
  text: string;
  outcome: ReplyOutcome;
  state: DialoguePhase;
  intent?: ActionIntent;
  pendingSlot?: string;
}
