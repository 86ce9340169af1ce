import type { NewTicket, Ticket, TicketReceipt } from '../../../domain/entities/ticket.js';
import type { GatewayResult } from './gateway-result.js';

/**
 * Ticketing backend.
 *
 * getTicket is a read and may be retried by the adapter; createTicket is never retried.
 */
export interface TicketingGateway {
  getTicket(ticketNumber: string, requestId: string): Promise<GatewayResult<Ticket>>;
  createTicket(ticket: NewTicket, requestId: string): Promise<GatewayResult<TicketReceipt>>;
}
