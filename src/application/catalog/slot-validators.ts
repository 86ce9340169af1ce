import type { SlotValidation, SlotValidator } from './action-definition.js';
import { normalizeText, tokenize } from '../../infrastructure/utils/text-normalizer.js';

export const TICKET_NUMBER_PATTERN = /\b(?:INC|REQ|TASK|RITM)\d{5,}\b/i;

const USERNAME_PATTERN = /^[A-Za-z0-9._@-]{2,64}$/;

const AFFIRMATIVE = new Set(['yes', 'y', 'yeah', 'yep', 'sure', 'ok', 'okay', 'confirm', 'proceed']);
const NEGATIVE = new Set(['no', 'n', 'nope', 'nah']);

export function accepted(value: string): SlotValidation {
  return { kind: 'accepted', value };
}

export function rejected(message: string): SlotValidation {
  return { kind: 'rejected', message };
}

export const ticketNumber: SlotValidator = (raw) => {
  const match = TICKET_NUMBER_PATTERN.exec(raw);
  if (!match) {
    return rejected("That doesn't look like a ticket number. Ticket numbers look like INC12345.");
  }
  return accepted(match[0].toUpperCase());
};

export function freeText(label: string, minLength: number, maxLength: number): SlotValidator {
  return (raw) => {
    const value = raw.trim().replace(/\s+/g, ' ');
    if (value.length < minLength) {
      return rejected(`Please give me a bit more detail about ${label}.`);
    }
    if (value.length > maxLength) {
      return rejected(`Please keep ${label} under ${maxLength} characters.`);
    }
    return accepted(value);
  };
}

/**
 * Matches the first option (in declaration order) whose name or alias appears in the answer.
 * Multi-word aliases match as a phrase, single words as a token.
 */
export function oneOf(options: Readonly<Record<string, readonly string[]>>, message: string): SlotValidator {
  return (raw) => {
    const normalized = normalizeText(raw);
    const tokens = new Set(tokenize(raw));

    for (const [value, aliases] of Object.entries(options)) {
      const candidates = [value, ...aliases];
      const matched = candidates.some((candidate) =>
        candidate.includes(' ') ? normalized.includes(candidate) : tokens.has(candidate)
      );
      if (matched) {
        return accepted(value);
      }
    }

    return rejected(message);
  };
}

export const confirmation: SlotValidator = (raw) => {
  const normalized = normalizeText(raw);
  const [first = ''] = tokenize(raw);

  if (normalized === 'go ahead' || AFFIRMATIVE.has(first)) {
    return accepted('yes');
  }
  if (normalized.startsWith("don't") || normalized.startsWith('do not') || NEGATIVE.has(first)) {
    return { kind: 'declined' };
  }
  return rejected('Please answer yes or no.');
};

export const username: SlotValidator = (raw) => {
  const value = raw.trim().replace(/^@/, '');
  if (!USERNAME_PATTERN.test(value)) {
    return rejected('Please send just your username or employee ID, for example jdoe or E12345.');
  }
  return accepted(value);
};

export const ticketCategory = oneOf(
  {
    hardware: ['hw', 'laptop', 'monitor', 'computer', 'printer', 'keyboard', 'mouse', 'device'],
    software: ['sw', 'application', 'app', 'program'],
    network: ['wifi', 'wi-fi', 'vpn', 'internet', 'connectivity'],
    access: ['permission', 'permissions', 'account', 'login'],
    other: ['misc', 'something else'],
  },
  'Please pick one of: hardware, software, network, access or other.'
);

export const ticketUrgency = oneOf(
  {
    '1': ['high', 'urgent', 'critical'],
    '2': ['medium', 'normal'],
    '3': ['low'],
  },
  'Please pick an urgency: high, medium or low.'
);
