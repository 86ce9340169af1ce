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
 * Use Case: password reset, submitted to the service desk as an access request.
 * Only reached after an explicit "yes" to the confirmation prompt.
 */
export class ResetPasswordUseCase implements ActionHandler {
  constructor(
    private ticketing: TicketingGateway,
    private logger: Logger
  ) {}

  async execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult> {
    const username = requireSlot(slots, 'username');

    const result = await this.ticketing.createTicket(
      {
        shortDescription: `Password reset for ${username}`,
        description: `Password reset requested via chat by ${context.senderId} for account ${username}.`,
        category: 'access',
        urgency: '2',
        callerId: context.senderId,
        correlationId: context.correlationId,
      },
      context.requestId
    );

    if (result.status === 'failure') {
      this.logger.error(
        { requestId: context.requestId, reason: result.reason, error: result.error },
        'Password reset request failed'
      );
      return { status: 'failure', reason: result.reason, reply: BACKEND_UNAVAILABLE_REPLY };
    }

    this.logger.info({ requestId: context.requestId, ticketNumber: result.data.number }, 'Password reset requested');
    return {
      status: 'success',
      reply:
        `I've submitted a password reset for ${username} (ticket ${result.data.number}). ` +
        "You'll receive a temporary password shortly and will need to change it at first login.",
    };
  }
}
