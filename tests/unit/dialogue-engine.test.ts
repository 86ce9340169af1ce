import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DialogueEngine, isCancelCommand, type DialogueEngineOptions } from '../../src/application/services/dialogue-engine.js';
import { createDefaultActionCatalog } from '../../src/application/catalog/default-action-catalog.js';
import { createActionHandlers } from '../../src/application/use-cases/action-handlers.js';
import { InMemorySessionStore } from '../../src/adapters/in-memory/in-memory-session-store.js';
import { InProcessThreadLock } from '../../src/adapters/in-memory/in-process-thread-lock.js';
import { KeywordIntentGateway } from '../../src/adapters/nlu/keyword-intent-gateway.js';
import { success } from '../../src/application/ports/driven/gateway-result.js';
import type { IntentGateway } from '../../src/application/ports/driven/intent-gateway.port.js';
import type { Logger } from '../../src/application/ports/driven/logger-port.js';
import type { SessionStore } from '../../src/application/ports/driven/session-store.port.js';
import { SessionStoreUnavailableError } from '../../src/domain/errors/dialogue-errors.js';
import { buildCorrelationId } from '../../src/domain/helpers/correlation-id.js';
import {
  BACKEND_UNAVAILABLE_REPLY,
  CANCELLED_REPLY,
  CLASSIFIER_UNAVAILABLE_REPLY,
  HANDOFF_REPLY,
  MULTI_TURN_UNAVAILABLE_REPLY,
  NOTHING_TO_CANCEL_REPLY,
} from '../../src/application/services/reply-templates.js';
import {
  createMockKnowledgeBase,
  createMockLogger,
  createMockTicketing,
  fixedIntentGateway,
} from '../helpers/test-doubles.js';

const CAPABILITIES =
  'I can check the status of a ticket, create a support ticket, reset your password, search the knowledge base or request software.';
const TICKET_ID_PROMPT = "I can check the status of your ticket. What's the ticket number (for example INC12345)?";
const SUMMARY_PROMPT = 'I can open a ticket for you. Please briefly describe the issue.';
const CATEGORY_PROMPT = 'Which category fits best: hardware, software, network, access or other?';
const CONFIRMATION_PROMPT =
  "I can help you reset your password. This will generate a temporary password that you'll need to change at first login. Would you like to proceed? (yes/no)";
const USERNAME_PROMPT = 'Please provide your username or employee ID.';

describe('DialogueEngine', () => {
  let now: Date;
  let logger: Logger;
  let store: InMemorySessionStore;
  let ticketing: ReturnType<typeof createMockTicketing>;
  let knowledgeBase: ReturnType<typeof createMockKnowledgeBase>;

  const baseOptions: DialogueEngineOptions = {
    confidenceThreshold: 0.6,
    interruptConfidenceThreshold: 0.8,
    maxTurnsPerIntent: 5,
    sessionTtlSeconds: 900,
    handlerTimeoutMs: 1000,
    classifierTimeoutMs: 1000,
  };

  function createEngine(
    options: Partial<DialogueEngineOptions> = {},
    collaborators: { gateway?: IntentGateway; sessionStore?: SessionStore } = {}
  ): DialogueEngine {
    const catalog = createDefaultActionCatalog(createActionHandlers(ticketing, knowledgeBase, logger));
    return new DialogueEngine(
      collaborators.sessionStore ?? store,
      new InProcessThreadLock(),
      collaborators.gateway ?? new KeywordIntentGateway(logger),
      catalog,
      logger,
      { ...baseOptions, now: () => now, ...options }
    );
  }

  beforeEach(() => {
    now = new Date('2026-01-15T10:00:00.000Z');
    logger = createMockLogger();
    store = new InMemorySessionStore(logger, () => now.getTime());
    ticketing = createMockTicketing();
    knowledgeBase = createMockKnowledgeBase();
  });

  afterEach(() => {
    store.dispose();
  });

  describe('single-turn requests', () => {
    it('answers a ticket status request that names the ticket in one turn', async () => {
      ticketing.getTicket.mockResolvedValue(
        success({
          number: 'INC12345',
          state: 'In Progress',
          priority: '3 - Moderate',
          shortDescription: 'Laptop will not boot',
          updatedAt: '2026-01-14 09:30:00',
        })
      );
      const engine = createEngine();

      const reply = await engine.handleMessage('C1:100.1', 'status of INC12345', 'U1', 'req-1');

      expect(ticketing.getTicket).toHaveBeenCalledTimes(1);
      expect(ticketing.getTicket).toHaveBeenCalledWith('INC12345', 'req-1');
      expect(reply).toEqual({
        text: 'Ticket INC12345:\nStatus: In Progress\nPriority: 3 - Moderate\nDescription: Laptop will not boot\nLast Updated: 2026-01-14 09:30:00',
        outcome: 'completed',
        state: 'IDLE',
        intent: 'ticket_status',
      });
      expect(store.size()).toBe(0);
    });

    it('searches the knowledge base with the whole question', async () => {
      knowledgeBase.search.mockResolvedValue(
        success([{ id: 'KB001', title: 'Connecting to the VPN', summary: 'Install the VPN client.' }])
      );
      const engine = createEngine();

      const reply = await engine.handleMessage('D1', 'how do I connect to the VPN', 'U1', 'req-2');

      expect(knowledgeBase.search).toHaveBeenCalledWith('how do I connect to the VPN', 3, 'req-2');
      expect(reply.outcome).toBe('completed');
      expect(reply.text).toBe(
        'Here\'s what I found for "how do I connect to the VPN":\n1. Connecting to the VPN: Install the VPN client.'
      );
    });
  });

  describe('multi-turn slot filling', () => {
    it('creates a ticket after asking for the summary and then the category', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010001', sysId: 'sys-1' }));
      const engine = createEngine();

      const first = await engine.handleMessage('T1', 'create a ticket', 'U1', 'req-1');
      expect(first).toEqual({
        text: SUMMARY_PROMPT,
        outcome: 'prompt',
        state: 'COLLECTING',
        intent: 'ticket_create',
        pendingSlot: 'summary',
      });
      expect(await engine.peekSession('T1')).toMatchObject({ activeIntent: 'ticket_create', turnCount: 1 });

      const second = await engine.handleMessage('T1', 'broken monitor', 'U1', 'req-2');
      expect(second).toEqual({
        text: CATEGORY_PROMPT,
        outcome: 'prompt',
        state: 'COLLECTING',
        intent: 'ticket_create',
        pendingSlot: 'category',
      });
      expect(await engine.peekSession('T1')).toMatchObject({
        collectedSlots: { summary: 'broken monitor' },
        pendingSlot: 'category',
        turnCount: 2,
      });

      const third = await engine.handleMessage('T1', 'hardware', 'U1', 'req-3');
      expect(third).toEqual({
        text: "Success! I've created ticket INC0010001 for you. The IT team will review it shortly.",
        outcome: 'completed',
        state: 'IDLE',
        intent: 'ticket_create',
      });

      expect(ticketing.createTicket).toHaveBeenCalledTimes(1);
      expect(ticketing.createTicket).toHaveBeenCalledWith(
        {
          shortDescription: 'broken monitor',
          description: 'broken monitor\n\nReported via chat by U1.',
          category: 'hardware',
          urgency: '3',
          callerId: 'U1',
          correlationId: buildCorrelationId('T1', 'ticket_create', { summary: 'broken monitor', category: 'hardware' }),
        },
        'req-3'
      );
      expect(await engine.peekSession('T1')).toBeNull();
    });

    it('prefills slots from entities in the opening message', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010002', sysId: 'sys-2' }));
      const engine = createEngine();

      const first = await engine.handleMessage('T1', 'open a ticket for my broken laptop', 'U1');
      expect(first.pendingSlot).toBe('summary');
      expect(await engine.peekSession('T1')).toMatchObject({ collectedSlots: { category: 'hardware' } });

      const second = await engine.handleMessage('T1', 'Screen flickers constantly', 'U1');
      expect(second.outcome).toBe('completed');
      expect(ticketing.createTicket).toHaveBeenCalledWith(
        expect.objectContaining({ shortDescription: 'Screen flickers constantly', category: 'hardware' }),
        expect.any(String)
      );
    });

    it('asks for slots in catalog order for a password reset', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010003', sysId: 'sys-3' }));
      const engine = createEngine();

      expect((await engine.handleMessage('T1', 'reset my password', 'U1')).text).toBe(CONFIRMATION_PROMPT);
      expect((await engine.handleMessage('T1', 'yes', 'U1')).text).toBe(USERNAME_PROMPT);

      const done = await engine.handleMessage('T1', 'jdoe', 'U1');

      expect(done.text).toBe(
        "I've submitted a password reset for jdoe (ticket INC0010003). You'll receive a temporary password shortly and will need to change it at first login."
      );
      expect(ticketing.createTicket).toHaveBeenCalledWith(
        expect.objectContaining({ shortDescription: 'Password reset for jdoe', category: 'access', urgency: '2' }),
        expect.any(String)
      );
    });

    it('re-prompts with the validation message when a structured answer is invalid', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'check ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'banana', 'U1');

      expect(reply).toEqual({
        text: `That doesn't look like a ticket number. Ticket numbers look like INC12345. ${TICKET_ID_PROMPT}`,
        outcome: 'reprompt',
        state: 'COLLECTING',
        intent: 'ticket_status',
        pendingSlot: 'ticket_id',
      });
      expect(await engine.peekSession('T1')).toMatchObject({ pendingSlot: 'ticket_id', turnCount: 2 });
    });

    it('re-prompts when a free-form answer is too short', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'create a ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'hey', 'U1');

      expect(reply.outcome).toBe('reprompt');
      expect(reply.text).toBe(`Please give me a bit more detail about the issue. ${SUMMARY_PROMPT}`);
    });
  });

  describe('software requests', () => {
    it('asks to confirm the software name before submitting', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010005', sysId: 'sys-5' }));
      const engine = createEngine();

      const first = await engine.handleMessage('T1', 'install Figma', 'U1');
      expect(first).toEqual({
        text: 'Got it. You want to request Figma. Is that correct? (yes/no)',
        outcome: 'prompt',
        state: 'COLLECTING',
        intent: 'software_request',
        pendingSlot: 'confirmation',
      });
      expect(ticketing.createTicket).not.toHaveBeenCalled();

      const done = await engine.handleMessage('T1', 'yes', 'U1', 'req-sw');

      expect(done).toEqual({
        text: "Your request for Figma has been submitted as ticket INC0010005. You'll be notified once it's approved.",
        outcome: 'completed',
        state: 'IDLE',
        intent: 'software_request',
      });
      expect(ticketing.createTicket).toHaveBeenCalledTimes(1);
      expect(ticketing.createTicket).toHaveBeenCalledWith(
        expect.objectContaining({
          shortDescription: 'Software Request: Figma',
          correlationId: buildCorrelationId('T1', 'software_request', { software_name: 'Figma', confirmation: 'yes' }),
        }),
        'req-sw'
      );
    });

    it('asks for the name again when the confirmation is declined', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010007', sysId: 'sys-7' }));
      const engine = createEngine();
      await engine.handleMessage('T1', 'install Figma', 'U1');

      const declined = await engine.handleMessage('T1', 'no', 'U1');

      expect(declined).toEqual({
        text: "I see. Please provide the correct name of the software you'd like to request.",
        outcome: 'reprompt',
        state: 'COLLECTING',
        intent: 'software_request',
        pendingSlot: 'software_name',
      });
      expect(await engine.peekSession('T1')).toMatchObject({ collectedSlots: {}, pendingSlot: 'software_name', turnCount: 2 });

      const renamed = await engine.handleMessage('T1', 'Figma Professional', 'U1');
      expect(renamed.text).toBe('Got it. You want to request Figma Professional. Is that correct? (yes/no)');

      const done = await engine.handleMessage('T1', 'yes', 'U1');
      expect(done.outcome).toBe('completed');
      expect(ticketing.createTicket).toHaveBeenCalledTimes(1);
      expect(ticketing.createTicket).toHaveBeenCalledWith(
        expect.objectContaining({ shortDescription: 'Software Request: Figma Professional' }),
        expect.any(String)
      );
    });
  });

  describe('cancellation', () => {
    it('cancels an open request on an explicit command without calling the backend', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'create a ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'cancel', 'U1');

      expect(reply).toEqual({ text: CANCELLED_REPLY, outcome: 'cancelled', state: 'IDLE' });
      expect(ticketing.createTicket).not.toHaveBeenCalled();
      expect(store.size()).toBe(0);
    });

    it('treats "never mind" as a cancel command even where the slot would accept it', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'create a ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'Never mind!', 'U1');

      expect(reply.outcome).toBe('cancelled');
    });

    it('cancels a password reset when the confirmation is declined', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'reset my password', 'U1');

      const reply = await engine.handleMessage('T1', 'no', 'U1');

      expect(reply.outcome).toBe('cancelled');
      expect(ticketing.createTicket).not.toHaveBeenCalled();
      expect(await engine.peekSession('T1')).toBeNull();
    });

    it('has nothing to cancel when idle', async () => {
      const engine = createEngine();

      const reply = await engine.handleMessage('T1', 'cancel', 'U1');

      expect(reply).toEqual({ text: NOTHING_TO_CANCEL_REPLY, outcome: 'conversational', state: 'IDLE' });
    });
  });

  describe('topic switches', () => {
    it('replaces the active intent when a different request is confident enough', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'check ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'reset my password', 'U1');

      expect(reply).toEqual({
        text: CONFIRMATION_PROMPT,
        outcome: 'prompt',
        state: 'COLLECTING',
        intent: 'password_reset',
        pendingSlot: 'confirmation',
      });
      expect(await engine.peekSession('T1')).toMatchObject({
        activeIntent: 'password_reset',
        collectedSlots: {},
        turnCount: 1,
      });
    });

    it('re-prompts instead of switching when the new intent is below the interrupt threshold', async () => {
      const engine = createEngine({ interruptConfidenceThreshold: 0.9 });
      await engine.handleMessage('T1', 'check ticket', 'U1');

      const reply = await engine.handleMessage('T1', 'install Zoom please', 'U1');

      expect(reply).toMatchObject({ outcome: 'reprompt', intent: 'ticket_status', pendingSlot: 'ticket_id' });
      expect(await engine.peekSession('T1')).toMatchObject({ activeIntent: 'ticket_status', turnCount: 2 });
    });

    it('stores a ticket summary that mentions a password instead of switching', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'create a ticket', 'U1');

      const reply = await engine.handleMessage('T1', "I can't log in to my laptop", 'U1');

      expect(reply).toEqual({
        text: CATEGORY_PROMPT,
        outcome: 'prompt',
        state: 'COLLECTING',
        intent: 'ticket_create',
        pendingSlot: 'category',
      });
      expect(await engine.peekSession('T1')).toMatchObject({
        activeIntent: 'ticket_create',
        collectedSlots: { summary: "I can't log in to my laptop" },
      });
    });

    it('searches the knowledge base for a question that mentions a password', async () => {
      knowledgeBase.search.mockResolvedValue(success([]));
      const engine = createEngine();
      const opened = await engine.handleMessage('T1', 'search the knowledge base', 'U1');
      expect(opened.pendingSlot).toBe('query');

      const reply = await engine.handleMessage('T1', 'how do I change my password', 'U1', 'req-kb');

      expect(knowledgeBase.search).toHaveBeenCalledTimes(1);
      expect(knowledgeBase.search).toHaveBeenCalledWith('how do I change my password', 3, 'req-kb');
      expect(reply).toMatchObject({ outcome: 'completed', state: 'IDLE', intent: 'kb_search' });
      expect(ticketing.createTicket).not.toHaveBeenCalled();
    });
  });

  describe('turn limit', () => {
    it('hands off to a human on the third invalid answer with a limit of three turns', async () => {
      const engine = createEngine({ maxTurnsPerIntent: 3 });
      await engine.handleMessage('T1', 'check ticket', 'U1');

      expect((await engine.handleMessage('T1', 'banana', 'U1')).outcome).toBe('reprompt');
      expect((await engine.handleMessage('T1', 'banana', 'U1')).outcome).toBe('reprompt');
      const third = await engine.handleMessage('T1', 'banana', 'U1');

      expect(third).toEqual({ text: HANDOFF_REPLY, outcome: 'handoff', state: 'IDLE' });
      expect(store.size()).toBe(0);
      expect(ticketing.getTicket).not.toHaveBeenCalled();
    });

    it('hands off instead of executing when the last slot arrives on the turn past the limit', async () => {
      const engine = createEngine({ maxTurnsPerIntent: 3 });
      await engine.handleMessage('T1', 'check ticket', 'U1');
      await engine.handleMessage('T1', 'banana', 'U1');
      await engine.handleMessage('T1', 'banana', 'U1');

      const reply = await engine.handleMessage('T1', 'INC12345', 'U1');

      expect(reply).toEqual({ text: HANDOFF_REPLY, outcome: 'handoff', state: 'IDLE' });
      expect(ticketing.getTicket).not.toHaveBeenCalled();
      expect(store.size()).toBe(0);
    });

    it('executes when the last slot arrives on the final allowed turn', async () => {
      ticketing.getTicket.mockResolvedValue(
        success({ number: 'INC12345', state: 'New', priority: '4 - Low', shortDescription: 'Mouse' })
      );
      const engine = createEngine({ maxTurnsPerIntent: 3 });
      await engine.handleMessage('T1', 'check ticket', 'U1');
      await engine.handleMessage('T1', 'banana', 'U1');

      const reply = await engine.handleMessage('T1', 'INC12345', 'U1');

      expect(reply.outcome).toBe('completed');
      expect(ticketing.getTicket).toHaveBeenCalledTimes(1);
    });
  });

  describe('failures', () => {
    it('replies with a failure and clears the session when the creation times out, attempting it once', async () => {
      ticketing.createTicket.mockReturnValue(new Promise(() => undefined));
      const engine = createEngine({ handlerTimeoutMs: 20 });
      await engine.handleMessage('T1', 'create a ticket', 'U1');
      await engine.handleMessage('T1', 'broken monitor', 'U1');

      const reply = await engine.handleMessage('T1', 'hardware', 'U1');

      expect(reply).toEqual({ text: BACKEND_UNAVAILABLE_REPLY, outcome: 'failed', state: 'IDLE', intent: 'ticket_create' });
      expect(ticketing.createTicket).toHaveBeenCalledTimes(1);
      expect(store.size()).toBe(0);
    });

    it('replies with a failure when a handler throws', async () => {
      ticketing.getTicket.mockRejectedValue(new Error('socket hang up'));
      const engine = createEngine();

      const reply = await engine.handleMessage('T1', 'status of INC12345', 'U1');

      expect(reply.outcome).toBe('failed');
      expect(reply.text).toBe(BACKEND_UNAVAILABLE_REPLY);
    });

    it('reports a ticket that does not exist', async () => {
      ticketing.getTicket.mockResolvedValue({ status: 'failure', reason: 'not_found', error: 'no rows' });
      const engine = createEngine();

      const reply = await engine.handleMessage('T1', 'status of INC99999', 'U1');

      expect(reply).toEqual({
        text: "I couldn't find ticket INC99999. Please check the ticket number and try again.",
        outcome: 'failed',
        state: 'IDLE',
        intent: 'ticket_status',
      });
    });

    it('tells the user when the classifier is unavailable', async () => {
      const gateway = { classify: vi.fn<IntentGateway['classify']>().mockRejectedValue(new Error('ECONNREFUSED')) };
      const engine = createEngine({}, { gateway });

      const reply = await engine.handleMessage('T1', 'my screen is black', 'U1');

      expect(reply).toEqual({ text: CLASSIFIER_UNAVAILABLE_REPLY, outcome: 'failed', state: 'IDLE' });
    });

    it('keeps working without multi-turn state when the session store is down', async () => {
      ticketing.getTicket.mockResolvedValue(
        success({ number: 'INC12345', state: 'New', priority: '4 - Low', shortDescription: 'Mouse' })
      );
      const failingStore: SessionStore = {
        get: vi.fn().mockRejectedValue(new SessionStoreUnavailableError()),
        put: vi.fn().mockResolvedValue(undefined),
        delete: vi.fn().mockResolvedValue(undefined),
      };
      const engine = createEngine({}, { sessionStore: failingStore });

      const single = await engine.handleMessage('T1', 'status of INC12345', 'U1');
      const multi = await engine.handleMessage('T1', 'create a ticket', 'U1');

      expect(single.outcome).toBe('completed');
      expect(multi).toEqual({ text: MULTI_TURN_UNAVAILABLE_REPLY, outcome: 'clarification', state: 'IDLE' });
      expect(failingStore.put).not.toHaveBeenCalled();
    });

    it('removes the stored session when a later write fails', async () => {
      const flakyStore: SessionStore = {
        get: (threadId) => store.get(threadId),
        put: vi
          .fn<SessionStore['put']>()
          .mockImplementationOnce((threadId, session, ttlSeconds) => store.put(threadId, session, ttlSeconds))
          .mockRejectedValue(new SessionStoreUnavailableError()),
        delete: (threadId) => store.delete(threadId),
      };
      const engine = createEngine({}, { sessionStore: flakyStore });
      await engine.handleMessage('T1', 'create a ticket', 'U1');
      expect(store.size()).toBe(1);

      const reply = await engine.handleMessage('T1', 'broken monitor', 'U1');

      expect(reply).toEqual({ text: MULTI_TURN_UNAVAILABLE_REPLY, outcome: 'clarification', state: 'IDLE' });
      expect(store.size()).toBe(0);
      expect(await engine.peekSession('T1')).toBeNull();
    });
  });

  describe('idle replies', () => {
    it('asks for clarification below the confidence threshold without opening a session', async () => {
      const engine = createEngine({}, { gateway: fixedIntentGateway({ intent: 'kb_search', entities: {}, confidence: 0.3 }) });

      const reply = await engine.handleMessage('T1', 'vpn?', 'U1');

      expect(reply).toEqual({
        text: `I'm not sure I understood that. ${CAPABILITIES} Could you rephrase your request?`,
        outcome: 'clarification',
        state: 'IDLE',
      });
      expect(store.size()).toBe(0);
    });

    it('asks for clarification when the classifier returns a label the catalog does not know', async () => {
      const engine = createEngine({}, { gateway: fixedIntentGateway({ intent: 'order_pizza', entities: {}, confidence: 0.99 }) });

      const reply = await engine.handleMessage('T1', 'pizza', 'U1');

      expect(reply.outcome).toBe('clarification');
    });

    it('lists what it can do when nothing matches', async () => {
      const engine = createEngine();

      const reply = await engine.handleMessage('T1', 'banana', 'U1');

      expect(reply).toEqual({ text: `Sorry, I didn't understand that. ${CAPABILITIES}`, outcome: 'help', state: 'IDLE' });
    });

    it('greets without opening a session', async () => {
      const engine = createEngine();

      const reply = await engine.handleMessage('T1', 'hello', 'U1');

      expect(reply).toEqual({
        text: `Hello! I'm your IT support assistant. ${CAPABILITIES} How can I help you today?`,
        outcome: 'conversational',
        state: 'IDLE',
      });
      expect(store.size()).toBe(0);
    });
  });

  describe('session lifetime', () => {
    it('treats a session older than the TTL as absent', async () => {
      const engine = createEngine();
      await engine.handleMessage('T1', 'create a ticket', 'U1');

      now = new Date(now.getTime() + 901 * 1000);
      const reply = await engine.handleMessage('T1', 'hardware', 'U1');

      expect(reply.outcome).toBe('help');
      expect(await engine.hasActiveSession('T1')).toBe(false);
    });

    it('keeps threads independent', async () => {
      const engine = createEngine();

      await engine.handleMessage('T1', 'create a ticket', 'U1');
      await engine.handleMessage('T2', 'reset my password', 'U2');
      const t1 = await engine.handleMessage('T1', 'broken monitor', 'U1');
      const t2 = await engine.handleMessage('T2', 'yes', 'U2');

      expect(t1.pendingSlot).toBe('category');
      expect(t2.pendingSlot).toBe('username');
      expect(await engine.peekSession('T1')).toMatchObject({ activeIntent: 'ticket_create', senderId: 'U1' });
      expect(await engine.peekSession('T2')).toMatchObject({ activeIntent: 'password_reset', senderId: 'U2' });
    });

    it('serializes concurrent messages of the same thread', async () => {
      const engine = createEngine();

      const [first, second] = await Promise.all([
        engine.handleMessage('T1', 'create a ticket', 'U1'),
        engine.handleMessage('T1', 'broken monitor', 'U1'),
      ]);

      expect(first.pendingSlot).toBe('summary');
      expect(second.pendingSlot).toBe('category');
    });

    it('leaves either no session or one with an intent and a pending slot after every message', async () => {
      ticketing.createTicket.mockResolvedValue(success({ number: 'INC0010004', sysId: 'sys-4' }));
      const engine = createEngine();
      const messages = ['hello', 'create a ticket', 'hey', 'printer jams', 'banana', 'network', 'cancel'];

      for (const message of messages) {
        await engine.handleMessage('T1', message, 'U1');
        const session = await engine.peekSession('T1');
        if (session !== null) {
          expect(session.activeIntent).toBe('ticket_create');
          expect(session.pendingSlot).not.toBeNull();
        }
      }
      expect(store.size()).toBe(0);
    });
  });

  describe('isCancelCommand', () => {
    it('matches whole cancel phrases only', () => {
      expect(isCancelCommand('Stop.')).toBe(true);
      expect(isCancelCommand('forget it')).toBe(true);
      expect(isCancelCommand('stop the printer from jamming')).toBe(false);
    });
  });
});
