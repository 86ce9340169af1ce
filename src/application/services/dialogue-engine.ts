import crypto from 'crypto';
import { openSession, isSessionExpired, type ConversationSession } from '../../domain/entities/conversation-session.js';
import type { Reply, ReplyOutcome } from '../../domain/entities/reply.js';
import {
  CANCEL_INTENT,
  isConversationalIntent,
  type ActionIntent,
  type ConversationalIntent,
} from '../../domain/enums/intent-type.js';
import {
  BackendUnavailableError,
  SlotValidationFailedError,
  TooManyTurnsError,
  UnrecognizedIntentError,
  toError,
} from '../../domain/errors/dialogue-errors.js';
import { buildCorrelationId } from '../../domain/helpers/correlation-id.js';
import { normalizeText } from '../../infrastructure/utils/text-normalizer.js';
import { withTimeout } from '../../infrastructure/utils/timeout.js';
import type { ActionCatalog } from '../catalog/action-catalog.js';
import { renderPrompt, type ActionDefinition, type SlotDefinition } from '../catalog/action-definition.js';
import type { IntentClassification, IntentGateway } from '../ports/driven/intent-gateway.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { SessionStore } from '../ports/driven/session-store.port.js';
import type { ThreadLock } from '../ports/driven/thread-lock.port.js';
import {
  BACKEND_UNAVAILABLE_REPLY,
  CANCELLED_REPLY,
  CLASSIFIER_UNAVAILABLE_REPLY,
  ENGINE_UNAVAILABLE_REPLY,
  HANDOFF_REPLY,
  MULTI_TURN_UNAVAILABLE_REPLY,
  NOTHING_TO_CANCEL_REPLY,
  clarificationReply,
  greetingReply,
  helpReply,
  noMatchReply,
  repromptReply,
} from './reply-templates.js';

/**
 * Checked before any slot validation, so "stop" can never become a slot value
 */
const CANCEL_COMMANDS = new Set([
  'cancel',
  'stop',
  'abort',
  'quit',
  'exit',
  'never mind',
  'nevermind',
  'forget it',
]);

export interface DialogueEngineOptions {
  /** Below this an idle message gets a clarification */
  confidenceThreshold: number;
  /** A different intent must reach this to interrupt one being collected */
  interruptConfidenceThreshold: number;
  maxTurnsPerIntent: number;
  sessionTtlSeconds: number;
  handlerTimeoutMs: number;
  classifierTimeoutMs: number;
  now?: () => Date;
}

/**
 * Classifier output mapped onto what the engine can do with it
 */
type ClassifiedIntent =
  | { kind: 'action'; definition: ActionDefinition; entities: Record<string, string>; confidence: number }
  | { kind: 'conversational'; intent: ConversationalIntent }
  | { kind: 'cancel' }
  | { kind: 'low_confidence'; intent: string | null; confidence: number }
  | { kind: 'unrecognized'; intent: string }
  | { kind: 'no_match' }
  | { kind: 'classifier_unavailable' };

interface Turn {
  threadId: string;
  senderId: string;
  requestId: string;
  text: string;
  now: Date;
  /** false once the store has failed during this turn */
  persistence: boolean;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled classification: ${JSON.stringify(value)}`);
}

function idle(text: string, outcome: ReplyOutcome): Reply {
  return { text, outcome, state: 'IDLE' };
}

export function isCancelCommand(text: string): boolean {
  return CANCEL_COMMANDS.has(normalizeText(text).replace(/[.!?]+$/, ''));
}

/**
 * Dialogue state machine: IDLE → COLLECTING(intent, slot) → … → EXECUTING → IDLE.
 *
 * One call handles one inbound message under the thread lock and always resolves to a Reply.
 */
export class DialogueEngine {
  private readonly now: () => Date;

  constructor(
    private sessionStore: SessionStore,
    private threadLock: ThreadLock,
    private intentGateway: IntentGateway,
    private catalog: ActionCatalog,
    private logger: Logger,
    private options: DialogueEngineOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handleMessage(
    threadId: string,
    rawText: string,
    senderId: string,
    requestId: string = crypto.randomUUID()
  ): Promise<Reply> {
    try {
      return await this.threadLock.runExclusive(threadId, () =>
        this.processTurn({
          threadId,
          senderId,
          requestId,
          text: rawText.trim(),
          now: this.now(),
          persistence: true,
        })
      );
    } catch (error) {
      this.logger.error({ requestId, threadId, error: toError(error) }, 'Dialogue turn failed');
      return idle(ENGINE_UNAVAILABLE_REPLY, 'failed');
    }
  }

  /**
   * True when a live session exists for the thread; store failures count as none
   */
  async hasActiveSession(threadId: string): Promise<boolean> {
    return (await this.peekSession(threadId)) !== null;
  }

  async peekSession(threadId: string): Promise<ConversationSession | null> {
    try {
      const session = await this.sessionStore.get(threadId);
      if (session === null || isSessionExpired(session, this.options.sessionTtlSeconds, this.now())) {
        return null;
      }
      return session;
    } catch (error) {
      this.logger.warn({ threadId, error: toError(error) }, 'Could not read session');
      return null;
    }
  }

  private async processTurn(turn: Turn): Promise<Reply> {
    const session = await this.loadSession(turn);

    if (session === null) {
      return this.handleIdle(turn);
    }
    return this.continueCollecting(session, turn);
  }

  private async loadSession(turn: Turn): Promise<ConversationSession | null> {
    let session: ConversationSession | null;
    try {
      session = await this.sessionStore.get(turn.threadId);
    } catch (error) {
      this.logger.warn(
        { requestId: turn.requestId, threadId: turn.threadId, error: toError(error) },
        'Session store unavailable, handling message without stored state'
      );
      turn.persistence = false;
      return null;
    }

    if (session !== null && isSessionExpired(session, this.options.sessionTtlSeconds, turn.now)) {
      this.logger.info(
        { requestId: turn.requestId, threadId: turn.threadId, intent: session.activeIntent },
        'Session expired'
      );
      await this.clearSession(turn);
      return null;
    }

    return session;
  }

  private async handleIdle(turn: Turn): Promise<Reply> {
    if (isCancelCommand(turn.text)) {
      return idle(NOTHING_TO_CANCEL_REPLY, 'conversational');
    }

    const classified = await this.classify(turn);
    const descriptions = this.catalog.describeActions();

    switch (classified.kind) {
      case 'action':
        return this.startIntent(classified.definition, classified.entities, turn);
      case 'conversational':
        return idle(
          classified.intent === 'greeting' ? greetingReply(descriptions) : helpReply(descriptions),
          'conversational'
        );
      case 'cancel':
        return idle(NOTHING_TO_CANCEL_REPLY, 'conversational');
      case 'low_confidence':
      case 'unrecognized':
        return idle(clarificationReply(descriptions), 'clarification');
      case 'no_match':
        return idle(noMatchReply(descriptions), 'help');
      case 'classifier_unavailable':
        return idle(CLASSIFIER_UNAVAILABLE_REPLY, 'failed');
      default:
        return assertNever(classified);
    }
  }

  private async continueCollecting(stored: ConversationSession, turn: Turn): Promise<Reply> {
    const session: ConversationSession = {
      ...stored,
      collectedSlots: { ...stored.collectedSlots },
      turnCount: stored.turnCount + 1,
    };

    if (isCancelCommand(turn.text)) {
      return this.cancel(session, turn);
    }
    if (session.turnCount > this.options.maxTurnsPerIntent) {
      return this.handOff(session, turn);
    }

    const definition = this.catalog.get(session.activeIntent);
    const slot = definition.requiredSlots.find((candidate) => candidate.name === session.pendingSlot);
    if (slot === undefined) {
      return this.advance(session, turn);
    }

    const validation = slot.validate(turn.text);
    if (validation.kind === 'accepted') {
      session.collectedSlots[slot.name] = validation.value;
      return this.advance(session, turn);
    }
    if (validation.kind === 'declined') {
      return this.decline(session, definition, slot, turn);
    }

    const classified = await this.classify(turn);
    if (classified.kind === 'cancel') {
      return this.cancel(session, turn);
    }
    if (classified.kind === 'action') {
      if (this.isInterruption(session, classified)) {
        return this.switchTopic(session, classified, turn);
      }
      if (classified.definition.intent === session.activeIntent && this.mergeEntities(session, classified.entities)) {
        return this.advance(session, turn);
      }
    }

    return this.reprompt(session, new SlotValidationFailedError(slot.name, validation.message), slot, turn);
  }

  /**
   * A "no" either cancels the intent or sends the user back to the slot it names
   */
  private decline(
    session: ConversationSession,
    definition: ActionDefinition,
    slot: SlotDefinition,
    turn: Turn
  ): Promise<Reply> {
    const onDecline = slot.onDecline;
    const reaskSlot =
      onDecline === undefined ? undefined : definition.requiredSlots.find((candidate) => candidate.name === onDecline.reask);
    if (onDecline === undefined || reaskSlot === undefined) {
      return this.cancel(session, turn);
    }

    delete session.collectedSlots[reaskSlot.name];
    delete session.collectedSlots[slot.name];
    this.logger.debug(
      { requestId: turn.requestId, threadId: turn.threadId, slot: slot.name, reask: reaskSlot.name },
      'Answer declined, asking again'
    );

    return this.keepCollecting(session, reaskSlot, turn, {
      text: onDecline.prompt,
      outcome: 'reprompt',
      state: 'COLLECTING',
      intent: session.activeIntent,
      pendingSlot: reaskSlot.name,
    });
  }

  private isInterruption(
    session: ConversationSession,
    classified: Extract<ClassifiedIntent, { kind: 'action' }>
  ): boolean {
    return (
      classified.definition.intent !== session.activeIntent &&
      classified.confidence >= this.options.interruptConfidenceThreshold
    );
  }

  private switchTopic(
    session: ConversationSession,
    classified: Extract<ClassifiedIntent, { kind: 'action' }>,
    turn: Turn
  ): Promise<Reply> {
    this.logger.info(
      {
        requestId: turn.requestId,
        threadId: turn.threadId,
        from: session.activeIntent,
        to: classified.definition.intent,
        confidence: classified.confidence,
      },
      'Topic switch'
    );
    return this.startIntent(classified.definition, classified.entities, turn);
  }

  private startIntent(definition: ActionDefinition, entities: Record<string, string>, turn: Turn): Promise<Reply> {
    const session = openSession(turn.threadId, definition.intent, turn.senderId, turn.now);
    this.mergeEntities(session, entities);

    this.logger.info(
      {
        requestId: turn.requestId,
        threadId: turn.threadId,
        intent: definition.intent,
        prefilledSlots: Object.keys(session.collectedSlots),
      },
      'Intent opened'
    );

    return this.advance(session, turn);
  }

  /**
   * Copies entities that pass their slot's validator. Returns whether any slot was filled.
   */
  private mergeEntities(session: ConversationSession, entities: Record<string, string>): boolean {
    const definition = this.catalog.get(session.activeIntent);
    let merged = false;

    for (const slot of [...definition.requiredSlots, ...definition.optionalSlots]) {
      const raw = entities[slot.name];
      if (raw === undefined) {
        continue;
      }
      const validation = slot.validate(raw);
      if (validation.kind === 'accepted') {
        session.collectedSlots[slot.name] = validation.value;
        merged = true;
      }
    }

    return merged;
  }

  /**
   * Executes when every required slot is filled, otherwise asks for the next one
   */
  private async advance(session: ConversationSession, turn: Turn): Promise<Reply> {
    const definition = this.catalog.get(session.activeIntent);
    const nextSlot = definition.requiredSlots.find((slot) => session.collectedSlots[slot.name] === undefined);

    if (nextSlot === undefined) {
      return this.execute(session, definition, turn);
    }

    return this.keepCollecting(session, nextSlot, turn, {
      text: renderPrompt(nextSlot, session.collectedSlots),
      outcome: 'prompt',
      state: 'COLLECTING',
      intent: session.activeIntent,
      pendingSlot: nextSlot.name,
    });
  }

  private reprompt(
    session: ConversationSession,
    failure: SlotValidationFailedError,
    slot: SlotDefinition,
    turn: Turn
  ): Promise<Reply> {
    this.logger.debug(
      { requestId: turn.requestId, threadId: turn.threadId, slot: failure.slot, turnCount: session.turnCount },
      'Slot value rejected'
    );

    return this.keepCollecting(session, slot, turn, {
      text: repromptReply(failure.message, renderPrompt(slot, session.collectedSlots)),
      outcome: 'reprompt',
      state: 'COLLECTING',
      intent: session.activeIntent,
      pendingSlot: slot.name,
    });
  }

  /**
   * Persists a session that stays in COLLECTING, unless a store failure ends it
   */
  private async keepCollecting(
    session: ConversationSession,
    slot: SlotDefinition,
    turn: Turn,
    reply: Reply
  ): Promise<Reply> {
    if (!turn.persistence) {
      return idle(MULTI_TURN_UNAVAILABLE_REPLY, 'clarification');
    }

    const next: ConversationSession = { ...session, pendingSlot: slot.name, lastUpdated: turn.now };
    try {
      await this.sessionStore.put(turn.threadId, next, this.options.sessionTtlSeconds);
    } catch (error) {
      this.logger.error(
        { requestId: turn.requestId, threadId: turn.threadId, error: toError(error) },
        'Could not persist session'
      );
      // a stale session must not resume on the next message
      await this.clearSession(turn);
      turn.persistence = false;
      return idle(MULTI_TURN_UNAVAILABLE_REPLY, 'clarification');
    }

    return reply;
  }

  private async execute(session: ConversationSession, definition: ActionDefinition, turn: Turn): Promise<Reply> {
    const slots = { ...session.collectedSlots };
    const context = {
      threadId: turn.threadId,
      senderId: session.senderId,
      requestId: turn.requestId,
      correlationId: buildCorrelationId(turn.threadId, definition.intent, slots),
    };
    const intent: ActionIntent = definition.intent;

    try {
      const result = await withTimeout(
        definition.handler.execute(slots, context),
        this.options.handlerTimeoutMs,
        `${intent} handler`
      );

      this.logger.info(
        { requestId: turn.requestId, threadId: turn.threadId, intent, status: result.status },
        'Action executed'
      );

      return { text: result.reply, outcome: result.status === 'success' ? 'completed' : 'failed', state: 'IDLE', intent };
    } catch (error) {
      const failure = new BackendUnavailableError(`Action ${intent} failed`, toError(error));
      this.logger.error(
        { requestId: turn.requestId, threadId: turn.threadId, intent, code: failure.code, error: failure.cause },
        failure.message
      );
      return { text: BACKEND_UNAVAILABLE_REPLY, outcome: 'failed', state: 'IDLE', intent };
    } finally {
      await this.clearSession(turn);
    }
  }

  private async cancel(session: ConversationSession, turn: Turn): Promise<Reply> {
    this.logger.info(
      { requestId: turn.requestId, threadId: turn.threadId, intent: session.activeIntent },
      'Intent cancelled'
    );
    await this.clearSession(turn);
    return idle(CANCELLED_REPLY, 'cancelled');
  }

  private async handOff(session: ConversationSession, turn: Turn): Promise<Reply> {
    const limit = new TooManyTurnsError(session.turnCount);
    this.logger.warn(
      {
        requestId: turn.requestId,
        threadId: turn.threadId,
        intent: session.activeIntent,
        code: limit.code,
        turnCount: limit.turnCount,
      },
      'Handing conversation off to a human agent'
    );
    await this.clearSession(turn);
    return idle(HANDOFF_REPLY, 'handoff');
  }

  private async clearSession(turn: Turn): Promise<void> {
    if (!turn.persistence) {
      return;
    }
    try {
      await this.sessionStore.delete(turn.threadId);
    } catch (error) {
      this.logger.error(
        { requestId: turn.requestId, threadId: turn.threadId, error: toError(error) },
        'Could not clear session'
      );
      turn.persistence = false;
    }
  }

  private async classify(turn: Turn): Promise<ClassifiedIntent> {
    let classification: IntentClassification;
    try {
      classification = await withTimeout(
        this.intentGateway.classify(turn.text, turn.requestId),
        this.options.classifierTimeoutMs,
        'Intent classification'
      );
    } catch (error) {
      this.logger.warn(
        { requestId: turn.requestId, threadId: turn.threadId, error: toError(error) },
        'Intent classification failed'
      );
      return { kind: 'classifier_unavailable' };
    }

    this.logger.debug(
      {
        requestId: turn.requestId,
        threadId: turn.threadId,
        intent: classification.intent,
        confidence: classification.confidence,
      },
      'Message classified'
    );

    return this.interpret(classification);
  }

  private interpret(classification: IntentClassification): ClassifiedIntent {
    const { intent, confidence, entities } = classification;

    if (intent === null) {
      return { kind: 'no_match' };
    }
    if (confidence < this.options.confidenceThreshold) {
      return { kind: 'low_confidence', intent, confidence };
    }
    if (intent === CANCEL_INTENT) {
      return { kind: 'cancel' };
    }
    if (isConversationalIntent(intent)) {
      return { kind: 'conversational', intent };
    }

    try {
      const definition = this.catalog.lookup(intent);
      return { kind: 'action', definition, entities, confidence };
    } catch (error) {
      if (error instanceof UnrecognizedIntentError) {
        return { kind: 'unrecognized', intent };
      }
      throw error;
    }
  }
}
