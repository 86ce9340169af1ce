import type { Ticket } from '../../domain/entities/ticket.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { TicketingGateway } from '../ports/driven/ticketing-gateway.port.js';
import {
  requireSlot,
  type ActionHandler,
  type ActionResult,
  type HandlerContext,
  type ResolvedSlots,
} from '../catalog/action-definition.js';
import { BACKEND_UNAVAILABLE_REPLY } from '../services/reply-templates.js';

/**
 * Use Case: look up one ticket and summarize it
 */
export class CheckTicketStatusUseCase implements ActionHandler {
  constructor(
    private ticketing: TicketingGateway,
    private logger: Logger
  ) {}

  async execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult> {
    const ticketNumber = requireSlot(slots, 'ticket_id');
    const result = await this.ticketing.getTicket(ticketNumber, context.requestId);

    if (result.status === 'failure') {
      this.logger.warn(
        { requestId: context.requestId, ticketNumber, reason: result.reason, error: result.error },
        'Ticket lookup failed'
      );

      if (result.reason === 'not_found') {
        return {
          status: 'failure',
          reason: result.reason,
          reply: `I couldn't find ticket ${ticketNumber}. Please check the ticket number and try again.`,
        };
      }
      return { status: 'failure', reason: result.reason, reply: BACKEND_UNAVAILABLE_REPLY };
    }

    this.logger.info({ requestId: context.requestId, ticketNumber, state: result.data.state }, 'Ticket status retrieved');
    return { status: 'success', reply: formatTicket(result.data) };
  }
}

export function formatTicket(ticket: Ticket): string {
  const lines = [
    `Ticket ${ticket.number}:`,
    `Status: ${ticket.state}`,
    `Priority: ${ticket.priority}`,
    `Description: ${ticket.shortDescription}`,
  ];
  if (ticket.assignedTo) {
    lines.push(`Assigned To: ${ticket.assignedTo}`);
  }
  if (ticket.updatedAt) {
    lines.push(`Last Updated: ${ticket.updatedAt}`);
  }
  return lines.join('\n');
}
