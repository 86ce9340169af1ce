import type { KnowledgeArticle } from '../../../domain/entities/ticket.js';
import type { GatewayResult } from './gateway-result.js';

export interface KnowledgeBase {
  search(query: string, limit: number, requestId: string): Promise<GatewayResult<KnowledgeArticle[]>>;
}
