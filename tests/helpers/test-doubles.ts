import { vi } from 'vitest';
import type { Logger } from '../../src/application/ports/driven/logger-port.js';
import type { IntentClassification, IntentGateway } from '../../src/application/ports/driven/intent-gateway.port.js';
import type { KnowledgeBase } from '../../src/application/ports/driven/knowledge-base.port.js';
import type { TicketingGateway } from '../../src/application/ports/driven/ticketing-gateway.port.js';
import type { Config } from '../../src/infrastructure/config/config.js';

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
}

export function createMockTicketing() {
  return {
    getTicket: vi.fn<TicketingGateway['getTicket']>(),
    createTicket: vi.fn<TicketingGateway['createTicket']>(),
  } satisfies TicketingGateway;
}

export function createMockKnowledgeBase() {
  return {
    search: vi.fn<KnowledgeBase['search']>(),
  } satisfies KnowledgeBase;
}

/**
 * Gateway that answers every message with the same classification
 */
export function fixedIntentGateway(classification: IntentClassification) {
  return {
    classify: vi.fn<IntentGateway['classify']>().mockResolvedValue(classification),
  } satisfies IntentGateway;
}

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    nodeEnv: 'test',
    port: 3000,
    host: '0.0.0.0',
    slackBotToken: 'test-bot-token',
    slackSigningSecret: 'test-secret',
    slackBotUserId: 'UBOT',
    slackApiBaseUrl: 'https://slack.test/api',
    servicenowInstanceUrl: 'https://itsm.example.test',
    servicenowUsername: 'test-user',
    servicenowPassword: 'test-password',
    servicenowAssignmentGroup: undefined,
    backendTimeoutMs: 5000,
    intentGatewayUrl: undefined,
    intentGatewayTimeoutMs: 3000,
    intentConfidenceThreshold: 0.6,
    interruptConfidenceThreshold: 0.8,
    maxTurnsPerIntent: 5,
    sessionTtlSeconds: 900,
    messageDedupeWindowSeconds: 300,
    redisUrl: undefined,
    redisEnabled: false,
    knowledgeBaseSource: 'servicenow',
    knowledgeBaseDir: './knowledge-base',
    logLevel: 'info',
    serviceName: 'itops-chat-assistant',
    devToolsEnabled: false,
    devToolsToken: undefined,
    ...overrides,
  };
}
