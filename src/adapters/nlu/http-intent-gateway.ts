import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IntentClassification, IntentGateway } from '../../application/ports/driven/intent-gateway.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import { withRetry } from '../../infrastructure/utils/retry-helper.js';

const classificationSchema = z.object({
  intent: z.string().min(1).nullable(),
  entities: z.record(z.string()).default({}),
  confidence: z.number().min(0).max(1),
});

/**
 * Network errors and 5xx are retried once; 4xx are not
 */
function isTransient(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status >= 500;
}

/**
 * IntentGateway backed by an external NLU service: POST {text} → {intent, entities, confidence}
 */
export class HttpIntentGateway implements IntentGateway {
  private api: AxiosInstance;

  constructor(
    url: string,
    timeoutMs: number,
    private logger: Logger
  ) {
    this.api = axios.create({
      baseURL: url,
      timeout: timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async classify(text: string, requestId: string): Promise<IntentClassification> {
    const response = await withRetry(
      () => this.api.post<unknown>('', { text }, { headers: { 'X-Request-ID': requestId } }),
      { maxRetries: 1, initialDelayMs: 100, maxDelayMs: 500, shouldRetry: isTransient }
    ).catch((error: unknown) => {
      const errorMessage = error instanceof Error ? error.message : 'Intent service request failed';
      this.logger.error({ requestId, error: errorMessage }, 'Intent service request failed');
      throw error;
    });

    const parsed = classificationSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error(
        { requestId, issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`) },
        'Intent service returned an invalid classification'
      );
      throw new Error('Invalid classification from intent service');
    }

    return parsed.data;
  }
}
