import { ActionCatalog } from './action-catalog.js';
import type { ActionDefinitions, ActionHandlers } from './action-definition.js';
import {
  confirmation,
  freeText,
  ticketCategory,
  ticketNumber,
  ticketUrgency,
  username,
} from './slot-validators.js';

/**
 * Slot order here is the order users are asked in.
 */
export function createDefaultActionDefinitions(handlers: ActionHandlers): ActionDefinitions {
  return {
    ticket_status: {
      intent: 'ticket_status',
      description: 'check the status of a ticket',
      requiredSlots: [
        {
          name: 'ticket_id',
          prompt: "I can check the status of your ticket. What's the ticket number (for example INC12345)?",
          validate: ticketNumber,
        },
      ],
      optionalSlots: [],
      handler: handlers.ticket_status,
    },
    ticket_create: {
      intent: 'ticket_create',
      description: 'create a support ticket',
      requiredSlots: [
        {
          name: 'summary',
          prompt: 'I can open a ticket for you. Please briefly describe the issue.',
          validate: freeText('the issue', 5, 160),
        },
        {
          name: 'category',
          prompt: 'Which category fits best: hardware, software, network, access or other?',
          validate: ticketCategory,
        },
      ],
      optionalSlots: [
        {
          name: 'urgency',
          prompt: 'How urgent is it: high, medium or low?',
          validate: ticketUrgency,
        },
      ],
      handler: handlers.ticket_create,
    },
    password_reset: {
      intent: 'password_reset',
      description: 'reset your password',
      requiredSlots: [
        {
          name: 'confirmation',
          prompt:
            "I can help you reset your password. This will generate a temporary password that you'll need to change at first login. Would you like to proceed? (yes/no)",
          validate: confirmation,
        },
        {
          name: 'username',
          prompt: 'Please provide your username or employee ID.',
          validate: username,
        },
      ],
      optionalSlots: [],
      handler: handlers.password_reset,
    },
    kb_search: {
      intent: 'kb_search',
      description: 'search the knowledge base',
      requiredSlots: [
        {
          name: 'query',
          prompt: 'What IT-related question would you like me to look up?',
          validate: freeText('your question', 3, 200),
        },
      ],
      optionalSlots: [],
      handler: handlers.kb_search,
    },
    software_request: {
      intent: 'software_request',
      description: 'request software',
      requiredSlots: [
        {
          name: 'software_name',
          prompt: 'Which software would you like to request?',
          validate: freeText('the software name', 2, 80),
        },
        {
          name: 'confirmation',
          prompt: (slots) => `Got it. You want to request ${slots.software_name ?? 'this software'}. Is that correct? (yes/no)`,
          validate: confirmation,
          onDecline: {
            reask: 'software_name',
            prompt: "I see. Please provide the correct name of the software you'd like to request.",
          },
        },
      ],
      optionalSlots: [],
      handler: handlers.software_request,
    },
  };
}

export function createDefaultActionCatalog(handlers: ActionHandlers): ActionCatalog {
  return new ActionCatalog(createDefaultActionDefinitions(handlers));
}
