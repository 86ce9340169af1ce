import type { Reply } from '../../domain/entities/reply.js';
import { toError } from '../../domain/errors/dialogue-errors.js';
import { KeyedSerialQueue } from '../../infrastructure/utils/keyed-serial-queue.js';
import type { ChatTransport, InboundChatEvent } from '../ports/driven/chat-transport.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { DialogueEngine } from './dialogue-engine.js';

export interface MessageRouterOptions {
  /** Redelivered events with an id seen inside this window are dropped */
  dedupeWindowSeconds: number;
  now?: () => number;
}

export type RouteResult =
  | { status: 'replied'; reply: Reply; delivered: boolean }
  | { status: 'skipped'; reason: 'duplicate' | 'no_active_session' };

/**
 * MessageRouter
 * Takes inbound chat events, drops redeliveries and hands each message to the dialogue engine.
 *
 * Messages of one thread are processed one at a time across engine and reply delivery,
 * so replies leave in the order the messages arrived.
 */
export class MessageRouter {
  private queue = new KeyedSerialQueue();
  // messageId → expiry (ms); insertion order is expiry order
  private seenMessages: Map<string, number> = new Map();
  private readonly now: () => number;

  constructor(
    private engine: Pick<DialogueEngine, 'handleMessage' | 'hasActiveSession'>,
    private transport: ChatTransport,
    private logger: Logger,
    private options: MessageRouterOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async handleIncomingMessage(event: InboundChatEvent, requestId: string): Promise<RouteResult> {
    if (this.markSeen(event.messageId)) {
      this.logger.info({ requestId, messageId: event.messageId, threadId: event.threadId }, 'Duplicate event ignored');
      return { status: 'skipped', reason: 'duplicate' };
    }

    return this.queue.run(event.threadId, () => this.processMessage(event, requestId));
  }

  private async processMessage(event: InboundChatEvent, requestId: string): Promise<RouteResult> {
    if (event.requiresActiveSession && !(await this.engine.hasActiveSession(event.threadId))) {
      this.logger.debug({ requestId, threadId: event.threadId }, 'Channel message outside a conversation ignored');
      return { status: 'skipped', reason: 'no_active_session' };
    }

    const reply = await this.engine.handleMessage(event.threadId, event.text, event.senderId, requestId);

    let delivered = false;
    try {
      const result = await this.transport.sendReply(event.threadId, reply.text, requestId);
      delivered = result.success;
      if (!result.success) {
        this.logger.error({ requestId, threadId: event.threadId, error: result.error }, 'Reply not delivered');
      }
    } catch (error) {
      this.logger.error({ requestId, threadId: event.threadId, error: toError(error) }, 'Reply not delivered');
    }

    this.logger.info(
      { requestId, threadId: event.threadId, outcome: reply.outcome, state: reply.state, intent: reply.intent, delivered },
      'Message handled'
    );
    return { status: 'replied', reply, delivered };
  }

  /**
   * Records the id and reports whether it was already seen inside the window
   */
  private markSeen(messageId: string): boolean {
    const now = this.now();

    for (const [id, expiresAt] of this.seenMessages) {
      if (expiresAt > now) {
        break;
      }
      this.seenMessages.delete(id);
    }

    if (this.seenMessages.has(messageId)) {
      return true;
    }
    this.seenMessages.set(messageId, now + this.options.dedupeWindowSeconds * 1000);
    return false;
  }
}
