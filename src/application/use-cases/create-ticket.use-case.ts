import { isTicketCategory, isTicketUrgency, type TicketUrgency } from '../../domain/entities/ticket.js';
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

const DEFAULT_URGENCY: TicketUrgency = '3';

/**
 * Use Case: open an incident from the collected summary and category.
 * Urgency only arrives as a classifier entity; low otherwise.
 */
export class CreateTicketUseCase implements ActionHandler {
  constructor(
    private ticketing: TicketingGateway,
    private logger: Logger
  ) {}

  async execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult> {
    const summary = requireSlot(slots, 'summary');
    const category = requireSlot(slots, 'category');
    const urgency = slots.urgency;

    if (!isTicketCategory(category)) {
      throw new Error(`Unexpected ticket category "${category}"`);
    }

    const result = await this.ticketing.createTicket(
      {
        shortDescription: summary,
        description: `${summary}\n\nReported via chat by ${context.senderId}.`,
        category,
        urgency: urgency !== undefined && isTicketUrgency(urgency) ? urgency : DEFAULT_URGENCY,
        callerId: context.senderId,
        correlationId: context.correlationId,
      },
      context.requestId
    );

    if (result.status === 'failure') {
      this.logger.error(
        { requestId: context.requestId, reason: result.reason, error: result.error, correlationId: context.correlationId },
        'Ticket creation failed'
      );
      return { status: 'failure', reason: result.reason, reply: BACKEND_UNAVAILABLE_REPLY };
    }

    this.logger.info({ requestId: context.requestId, ticketNumber: result.data.number, category }, 'Ticket created');
    return {
      status: 'success',
      reply: `Success! I've created ticket ${result.data.number} for you. The IT team will review it shortly.`,
    };
  }
}
