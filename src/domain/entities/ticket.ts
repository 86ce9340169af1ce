export const TICKET_CATEGORIES = ['hardware', 'software', 'network', 'access', 'other'] as const;

export type TicketCategory = (typeof TICKET_CATEGORIES)[number];

/**
 * ServiceNow urgency codes: 1 = High, 2 = Medium, 3 = Low
 */
export const TICKET_URGENCIES = ['1', '2', '3'] as const;

export type TicketUrgency = (typeof TICKET_URGENCIES)[number];

export function isTicketCategory(value: string): value is TicketCategory {
  return (TICKET_CATEGORIES as readonly string[]).includes(value);
}

export function isTicketUrgency(value: string): value is TicketUrgency {
  return (TICKET_URGENCIES as readonly string[]).includes(value);
}

export interface Ticket {
  number: string;
  state: string;
  priority: string;
  shortDescription: string;
  assignedTo?: string;
  updatedAt?: string;
}

export interface NewTicket {
  shortDescription: string;
  description: string;
  category: TicketCategory;
  urgency: TicketUrgency;
  callerId: string;
  correlationId: string;
}

export interface TicketReceipt {
  number: string;
  sysId: string;
}

export interface KnowledgeArticle {
  id: string;
  title: string;
  summary: string;
  url?: string;
}
