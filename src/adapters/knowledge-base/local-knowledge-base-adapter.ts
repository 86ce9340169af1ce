import { readdir, readFile } from 'fs/promises';
import path from 'path';
import type { KnowledgeArticle } from '../../domain/entities/ticket.js';
import { failure, success, type GatewayResult } from '../../application/ports/driven/gateway-result.js';
import type { KnowledgeBase } from '../../application/ports/driven/knowledge-base.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import { tokenize } from '../../infrastructure/utils/text-normalizer.js';

const ARTICLE_EXTENSIONS = new Set(['.md', '.txt']);
const SUMMARY_MAX_LENGTH = 200;
const STOP_WORDS = new Set(['the', 'and', 'for', 'how', 'can', 'what', 'why', 'does', 'with', 'you', 'your', 'my', 'to', 'do', 'is', 'a', 'an', 'of', 'in', 'on', 'it']);

interface IndexedArticle {
  article: KnowledgeArticle;
  titleTokens: Set<string>;
  bodyTokens: Set<string>;
}

function keywords(text: string): string[] {
  return tokenize(text).filter((token) => token.length >= 2 && !STOP_WORDS.has(token));
}

/**
 * First "# " heading is the title (file name otherwise); the first paragraph after it is the summary
 */
export function parseArticle(fileName: string, content: string): KnowledgeArticle {
  const lines = content.split(/\r?\n/);
  const headingIndex = lines.findIndex((line) => line.startsWith('# '));
  const title = headingIndex >= 0 ? lines[headingIndex].slice(2).trim() : path.parse(fileName).name.replace(/[-_]+/g, ' ');

  const body = lines.slice(headingIndex + 1);
  const start = body.findIndex((line) => line.trim() !== '' && !line.startsWith('#'));
  const paragraph: string[] = [];
  for (const line of start >= 0 ? body.slice(start) : []) {
    if (line.trim() === '' || line.startsWith('#')) {
      break;
    }
    paragraph.push(line.trim());
  }
  const summary = paragraph.join(' ');

  return {
    id: path.parse(fileName).name,
    title,
    summary: summary.length <= SUMMARY_MAX_LENGTH ? summary : `${summary.slice(0, SUMMARY_MAX_LENGTH - 3).trimEnd()}...`,
  };
}

/**
 * KnowledgeBase over a directory of markdown/text articles, ranked by keyword overlap.
 * Files are read once, on the first search.
 */
export class LocalKnowledgeBaseAdapter implements KnowledgeBase {
  private index?: Promise<IndexedArticle[]>;

  constructor(
    private directory: string,
    private logger: Logger
  ) {}

  async search(query: string, limit: number, requestId: string): Promise<GatewayResult<KnowledgeArticle[]>> {
    let articles: IndexedArticle[];
    try {
      articles = await this.loadIndex();
    } catch (error) {
      this.index = undefined;
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error({ requestId, directory: this.directory, error: errorMessage }, 'Could not read knowledge base');
      return failure('unavailable', errorMessage);
    }

    const terms = keywords(query);
    const ranked = articles
      .map((entry) => ({
        entry,
        // title hits count double
        score: terms.reduce(
          (total, term) => total + (entry.titleTokens.has(term) ? 2 : 0) + (entry.bodyTokens.has(term) ? 1 : 0),
          0
        ),
      }))
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score || a.entry.article.title.localeCompare(b.entry.article.title))
      .slice(0, limit)
      .map(({ entry }) => entry.article);

    this.logger.debug({ requestId, terms, results: ranked.length }, 'Local knowledge base searched');
    return success(ranked);
  }

  private loadIndex(): Promise<IndexedArticle[]> {
    if (!this.index) {
      this.index = this.readArticles();
    }
    return this.index;
  }

  private async readArticles(): Promise<IndexedArticle[]> {
    const fileNames = (await readdir(this.directory))
      .filter((name) => ARTICLE_EXTENSIONS.has(path.extname(name).toLowerCase()))
      .sort();

    const indexed = await Promise.all(
      fileNames.map(async (fileName) => {
        const content = await readFile(path.join(this.directory, fileName), 'utf8');
        const article = parseArticle(fileName, content);
        return {
          article,
          titleTokens: new Set(keywords(article.title)),
          bodyTokens: new Set(keywords(content)),
        };
      })
    );

    this.logger.info({ directory: this.directory, articles: indexed.length }, 'Knowledge base loaded');
    return indexed;
  }
}
