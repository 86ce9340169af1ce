import type { KnowledgeArticle } from '../../domain/entities/ticket.js';
import type { KnowledgeBase } from '../ports/driven/knowledge-base.port.js';
import type { Logger } from '../ports/driven/logger-port.js';
import {
  requireSlot,
  type ActionHandler,
  type ActionResult,
  type HandlerContext,
  type ResolvedSlots,
} from '../catalog/action-definition.js';
import { BACKEND_UNAVAILABLE_REPLY } from '../services/reply-templates.js';

const MAX_ARTICLES = 3;

export class SearchKnowledgeBaseUseCase implements ActionHandler {
  constructor(
    private knowledgeBase: KnowledgeBase,
    private logger: Logger
  ) {}

  async execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult> {
    const query = requireSlot(slots, 'query');
    const result = await this.knowledgeBase.search(query, MAX_ARTICLES, context.requestId);

    if (result.status === 'failure') {
      this.logger.warn(
        { requestId: context.requestId, reason: result.reason, error: result.error },
        'Knowledge base search failed'
      );
      return { status: 'failure', reason: result.reason, reply: BACKEND_UNAVAILABLE_REPLY };
    }

    this.logger.info({ requestId: context.requestId, results: result.data.length }, 'Knowledge base searched');

    if (result.data.length === 0) {
      return {
        status: 'success',
        reply: `I couldn't find any articles about "${query}". If you need help with it, just say "create a ticket".`,
      };
    }

    return { status: 'success', reply: formatArticles(query, result.data) };
  }
}

function formatArticles(query: string, articles: KnowledgeArticle[]): string {
  const lines = articles.map((article, index) => {
    const link = article.url ? ` (${article.url})` : '';
    return `${index + 1}. ${article.title}: ${article.summary}${link}`;
  });
  return [`Here's what I found for "${query}":`, ...lines].join('\n');
}
