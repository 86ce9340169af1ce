import type { IntentClassification, IntentGateway } from '../../application/ports/driven/intent-gateway.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import { TICKET_NUMBER_PATTERN, ticketCategory, ticketUrgency } from '../../application/catalog/slot-validators.js';
import { normalizeText } from '../../infrastructure/utils/text-normalizer.js';

const CANCEL_PHRASES = ['cancel', 'stop', 'abort', 'quit', 'exit', 'never mind', 'nevermind', 'forget it', 'no', 'nope'];
const GREETING_WORDS = ['hi', 'hello', 'hey', 'good morning', 'good afternoon', 'good evening', 'howdy'];
const HELP_PHRASES = ['help', 'menu', 'what can you do', 'options', 'commands'];

const CREATE_PHRASES = [
  'create a ticket',
  'create ticket',
  'open a ticket',
  'open ticket',
  'new ticket',
  'raise a ticket',
  'log a ticket',
  'submit a ticket',
  'file a ticket',
  'report an issue',
  'report a problem',
];
const PASSWORD_PHRASES = ['password', 'locked out', 'locked me out', 'cannot log in', "can't log in"];
const STATUS_PHRASES = ['ticket status', 'status of ticket', 'status of my ticket', 'check ticket', 'check my ticket', 'check on my ticket'];
const SOFTWARE_PHRASES = ['install', 'software', 'license for', 'access to'];
const KB_PHRASES = ['knowledge base', 'kb article', 'find article', 'how do i', 'how to', 'how can i'];

const SOFTWARE_NAME_PATTERN = /\b(?:install|license for|access to)\s+(?:the\s+|a\s+|an\s+)?(.+?)[.!?]*$/i;
const KB_QUERY_PATTERN = /\b(?:knowledge base|kb article|find article)\s+(?:for|about|on)\s+(.+?)[.!?]*$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word phrase match, so "how to" does not fire inside "show totals"
 */
function containsAny(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => new RegExp(`\\b${escapeRegExp(phrase)}\\b`).test(text));
}

function startsWithWord(text: string, words: readonly string[]): boolean {
  return words.some((word) => text === word || text.startsWith(`${word} `) || text.startsWith(`${word},`) || text.startsWith(`${word}!`));
}

function match(intent: string, confidence: number, entities: Record<string, string> = {}): IntentClassification {
  return { intent, confidence, entities };
}

/**
 * Rule-based classifier used when no external NLU service is configured.
 * Rules are tried in order; the first hit wins.
 */
export class KeywordIntentGateway implements IntentGateway {
  constructor(private logger: Logger) {}

  async classify(text: string, requestId: string): Promise<IntentClassification> {
    const classification = this.classifyText(text);
    this.logger.debug(
      { requestId, intent: classification.intent, confidence: classification.confidence },
      'Keyword classification'
    );
    return classification;
  }

  private classifyText(text: string): IntentClassification {
    const normalized = normalizeText(text);
    const bare = normalized.replace(/[.!?]+$/, '');

    if (CANCEL_PHRASES.includes(bare)) {
      return match('cancel', 0.95);
    }

    if (containsAny(normalized, CREATE_PHRASES)) {
      return match('ticket_create', 0.9, this.ticketEntities(text));
    }

    if (containsAny(normalized, PASSWORD_PHRASES)) {
      return match('password_reset', 0.9);
    }

    const ticketNumber = TICKET_NUMBER_PATTERN.exec(text);
    if (ticketNumber) {
      return match('ticket_status', 0.95, { ticket_id: ticketNumber[0].toUpperCase() });
    }

    if (containsAny(normalized, STATUS_PHRASES)) {
      return match('ticket_status', 0.9);
    }

    if (containsAny(normalized, SOFTWARE_PHRASES)) {
      const softwareName = SOFTWARE_NAME_PATTERN.exec(text.trim());
      return match('software_request', 0.85, softwareName ? { software_name: softwareName[1] } : {});
    }

    if (containsAny(normalized, KB_PHRASES)) {
      return match('kb_search', 0.8, this.kbEntities(text));
    }

    if (HELP_PHRASES.includes(bare)) {
      return match('help', 0.9);
    }

    if (startsWithWord(normalized, GREETING_WORDS) && normalized.split(' ').length <= 4) {
      return match('greeting', 0.9);
    }

    return { intent: null, entities: {}, confidence: 0 };
  }

  private ticketEntities(text: string): Record<string, string> {
    const entities: Record<string, string> = {};
    const category = ticketCategory(text);
    if (category.kind === 'accepted') {
      entities.category = category.value;
    }
    const urgency = ticketUrgency(text);
    if (urgency.kind === 'accepted') {
      entities.urgency = urgency.value;
    }
    return entities;
  }

  /**
   * "how do I ..." questions are searched as a whole; "knowledge base for X" searches X
   */
  private kbEntities(text: string): Record<string, string> {
    const explicit = KB_QUERY_PATTERN.exec(text.trim());
    if (explicit) {
      return { query: explicit[1] };
    }
    const normalized = normalizeText(text);
    if (normalized.startsWith('how ')) {
      return { query: text.trim() };
    }
    return {};
  }
}
