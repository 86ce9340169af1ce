import type { ActionHandlers } from '../catalog/action-definition.js';
import type { KnowledgeBase } from '../ports/driven/knowledge-base.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import type { TicketingGateway } from '../ports/driven/ticketing-gateway.port.js';
import { CheckTicketStatusUseCase } from './check-ticket-status.use-case.js';
import { CreateTicketUseCase } from './create-ticket.use-case.js';
import { RequestSoftwareUseCase } from './request-software.use-case.js';
import { ResetPasswordUseCase } from './reset-password.use-case.js';
import { SearchKnowledgeBaseUseCase } from './search-knowledge-base.use-case.js';

export function createActionHandlers(
  ticketing: TicketingGateway,
  knowledgeBase: KnowledgeBase,
  logger: Logger
): ActionHandlers {
  return {
    ticket_status: new CheckTicketStatusUseCase(ticketing, logger),
    ticket_create: new CreateTicketUseCase(ticketing, logger),
    password_reset: new ResetPasswordUseCase(ticketing, logger),
    kb_search: new SearchKnowledgeBaseUseCase(knowledgeBase, logger),
    software_request: new RequestSoftwareUseCase(ticketing, logger),
  };
}
