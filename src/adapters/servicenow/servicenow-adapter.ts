import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { KnowledgeArticle, NewTicket, Ticket, TicketReceipt } from '../../domain/entities/ticket.js';
import { failure, success, type GatewayFailureReason, type GatewayResult } from '../../application/ports/driven/gateway-result.js';
import type { KnowledgeBase } from '../../application/ports/driven/knowledge-base.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { TicketingGateway } from '../../application/ports/driven/ticketing-gateway.port.js';
import type { Config } from '../../infrastructure/config/config.js';
import { withRetry } from '../../infrastructure/utils/retry-helper.js';

const SUMMARY_MAX_LENGTH = 200;

// With sysparm_display_value=true reference fields come back as objects
const displayField = z
  .union([z.string(), z.object({ display_value: z.string() })])
  .transform((value) => (typeof value === 'string' ? value : value.display_value));

const incidentSchema = z.object({
  number: z.string(),
  state: displayField,
  priority: displayField,
  short_description: z.string().default(''),
  assigned_to: displayField.optional(),
  sys_updated_on: z.string().optional(),
});

const incidentListSchema = z.object({ result: z.array(incidentSchema) });

const createdIncidentSchema = z.object({
  result: z.object({ number: z.string(), sys_id: z.string() }),
});

const articleListSchema = z.object({
  result: z.array(
    z.object({
      sys_id: z.string(),
      number: z.string(),
      short_description: z.string(),
      text: z.string().default(''),
    })
  ),
});

class InvalidResponseError extends Error {
  constructor(public readonly issues: string[]) {
    super('Unexpected response from ServiceNow');
    this.name = 'InvalidResponseError';
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidResponseError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  return parsed.data;
}

function isTransient(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
}

/**
 * Maps a failed call to the reason the handlers act on
 */
export function mapErrorToReason(error: unknown): GatewayFailureReason {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === 404) {
      return 'not_found';
    }
    if (status === 400 || status === 403 || status === 422) {
      return 'rejected';
    }
  }
  return 'unavailable';
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status === undefined ? error.message : `HTTP ${status}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/\s+/g, ' ')
    .trim();
}

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 3).trimEnd()}...`;
}

/**
 * ServiceNow Table API adapter for incidents and knowledge articles.
 *
 * Reads are retried on transient errors. Creations are sent once, with correlation_id
 * set so a duplicate submission can be recognized on the ServiceNow side.
 */
export class ServiceNowAdapter implements TicketingGateway, KnowledgeBase {
  private api: AxiosInstance;

  constructor(
    private config: Config,
    private logger: Logger
  ) {
    this.api = axios.create({
      baseURL: config.servicenowInstanceUrl,
      timeout: config.backendTimeoutMs,
      auth: {
        username: config.servicenowUsername,
        password: config.servicenowPassword,
      },
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
    });
  }

  async getTicket(ticketNumber: string, requestId: string): Promise<GatewayResult<Ticket>> {
    try {
      const response = await withRetry(
        () =>
          this.api.get<unknown>('/api/now/table/incident', {
            params: {
              sysparm_query: `number=${ticketNumber}`,
              sysparm_display_value: 'true',
              sysparm_limit: 1,
              sysparm_fields: 'number,state,priority,short_description,assigned_to,sys_updated_on',
            },
            headers: { 'X-Request-ID': requestId },
          }),
        { maxRetries: 2, initialDelayMs: 200, maxDelayMs: 1000, shouldRetry: isTransient }
      );

      const [incident] = parseResponse(incidentListSchema, response.data).result;
      if (!incident) {
        return failure('not_found', `Ticket ${ticketNumber} not found`);
      }

      this.logger.debug({ requestId, ticketNumber }, 'Incident fetched from ServiceNow');
      return success({
        number: incident.number,
        state: incident.state,
        priority: incident.priority,
        shortDescription: incident.short_description,
        assignedTo: incident.assigned_to || undefined,
        updatedAt: incident.sys_updated_on,
      });
    } catch (error) {
      return this.toFailure(error, requestId, 'Error fetching incident from ServiceNow');
    }
  }

  async createTicket(ticket: NewTicket, requestId: string): Promise<GatewayResult<TicketReceipt>> {
    try {
      const response = await this.api.post<unknown>(
        '/api/now/table/incident',
        {
          short_description: ticket.shortDescription,
          description: ticket.description,
          category: ticket.category,
          urgency: ticket.urgency,
          caller_id: ticket.callerId,
          contact_type: 'chat',
          correlation_id: ticket.correlationId,
          ...(this.config.servicenowAssignmentGroup
            ? { assignment_group: this.config.servicenowAssignmentGroup }
            : {}),
        },
        { headers: { 'X-Request-ID': requestId } }
      );

      const { result } = parseResponse(createdIncidentSchema, response.data);
      this.logger.info({ requestId, ticketNumber: result.number }, 'Incident created in ServiceNow');
      return success({ number: result.number, sysId: result.sys_id });
    } catch (error) {
      return this.toFailure(error, requestId, 'Error creating incident in ServiceNow');
    }
  }

  async search(query: string, limit: number, requestId: string): Promise<GatewayResult<KnowledgeArticle[]>> {
    try {
      const response = await withRetry(
        () =>
          this.api.get<unknown>('/api/now/table/kb_knowledge', {
            params: {
              sysparm_query: `workflow_state=published^short_descriptionLIKE${query}^ORtextLIKE${query}`,
              sysparm_limit: limit,
              sysparm_fields: 'sys_id,number,short_description,text',
            },
            headers: { 'X-Request-ID': requestId },
          }),
        { maxRetries: 2, initialDelayMs: 200, maxDelayMs: 1000, shouldRetry: isTransient }
      );

      const articles = parseResponse(articleListSchema, response.data).result.map((article) => ({
        id: article.number,
        title: article.short_description,
        summary: truncate(stripHtml(article.text), SUMMARY_MAX_LENGTH),
        url: `${this.config.servicenowInstanceUrl}/kb_view.do?sysparm_article=${article.number}`,
      }));

      this.logger.debug({ requestId, results: articles.length }, 'Knowledge articles fetched from ServiceNow');
      return success(articles);
    } catch (error) {
      return this.toFailure(error, requestId, 'Error searching ServiceNow knowledge base');
    }
  }

  private toFailure<T>(error: unknown, requestId: string, message: string): GatewayResult<T> {
    const reason = mapErrorToReason(error);
    const detail = describeError(error);
    const issues = error instanceof InvalidResponseError ? error.issues : undefined;
    this.logger.error({ requestId, reason, error: detail, issues }, message);
    return failure(reason, detail);
  }
}
