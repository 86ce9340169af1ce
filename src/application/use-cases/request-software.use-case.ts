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
 * Only reached once the user has confirmed the software name
 */
export class RequestSoftwareUseCase implements ActionHandler {
  constructor(
    private ticketing: TicketingGateway,
    private logger: Logger
  ) {}

  async execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult> {
    const softwareName = requireSlot(slots, 'software_name');
    requireSlot(slots, 'confirmation');

    const result = await this.ticketing.createTicket(
      {
        shortDescription: `Software Request: ${softwareName}`,
        description: `User ${context.senderId} has requested access to ${softwareName}. Please review and process this request.`,
        category: 'software',
        urgency: '3',
        callerId: context.senderId,
        correlationId: context.correlationId,
      },
      context.requestId
    );

    if (result.status === 'failure') {
      this.logger.error(
        { requestId: context.requestId, softwareName, reason: result.reason, error: result.error },
        'Software request failed'
      );
      return { status: 'failure', reason: result.reason, reply: BACKEND_UNAVAILABLE_REPLY };
    }

    this.logger.info({ requestId: context.requestId, ticketNumber: result.data.number, softwareName }, 'Software requested');
    return {
      status: 'success',
      reply: `Your request for ${softwareName} has been submitted as ticket ${result.data.number}. You'll be notified once it's approved.`,
    };
  }
}
