import axios, { type AxiosInstance } from 'axios';
import crypto from 'crypto';
import { z } from 'zod';
import type { ChatTransport, InboundChatEvent, SendReplyResult } from '../../application/ports/driven/chat-transport.port.js';
import type { Logger } from '../../application/ports/driven/logger-port.js';
import type { Config } from '../../infrastructure/config/config.js';
import { withRetry } from '../../infrastructure/utils/retry-helper.js';

const SIGNATURE_VERSION = 'v0';
const MAX_REQUEST_AGE_SECONDS = 5 * 60;
const ANY_MENTION = /<@[A-Z0-9]+(?:\|[^>]*)?>/g;

const slackEventSchema = z.object({
  type: z.string(),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  subtype: z.string().optional(),
  text: z.string().optional(),
  channel: z.string().optional(),
  channel_type: z.string().optional(),
  ts: z.string().optional(),
  thread_ts: z.string().optional(),
});

const slackPayloadSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('url_verification'), challenge: z.string() }),
  z.object({ type: z.literal('event_callback'), event_id: z.string().optional(), event: slackEventSchema }),
]);

const postMessageResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.string().optional(),
  error: z.string().optional(),
});

export type SlackWebhookPayload =
  | { kind: 'url_verification'; challenge: string }
  | { kind: 'message'; event: InboundChatEvent }
  | { kind: 'ignored'; reason: string };

export interface SignatureHeaders {
  timestamp: string | undefined;
  signature: string | undefined;
}

/**
 * Channel messages are threaded under the first message; DMs are one conversation per channel
 */
export function buildThreadId(channel: string, ts: string, threadTs: string | undefined, isDirectMessage: boolean): string {
  return isDirectMessage ? channel : `${channel}:${threadTs ?? ts}`;
}

export function parseThreadId(threadId: string): { channel: string; threadTs?: string } {
  const separator = threadId.indexOf(':');
  if (separator < 0) {
    return { channel: threadId };
  }
  return { channel: threadId.slice(0, separator), threadTs: threadId.slice(separator + 1) };
}

export function stripMentions(text: string): string {
  return text.replace(ANY_MENTION, ' ').replace(/\s+/g, ' ').trim();
}

function isRateLimited(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 429;
}

/**
 * Slack Events API webhook parsing and Web API replies
 */
export class SlackWebApiAdapter implements ChatTransport {
  private api: AxiosInstance;

  constructor(
    private config: Config,
    private logger: Logger,
    private now: () => number = Date.now
  ) {
    this.api = axios.create({
      baseURL: config.slackApiBaseUrl,
      timeout: config.backendTimeoutMs,
      headers: {
        Authorization: `Bearer ${config.slackBotToken}`,
        'Content-Type': 'application/json; charset=utf-8',
      },
    });
  }

  async sendReply(threadId: string, text: string, requestId: string): Promise<SendReplyResult> {
    const { channel, threadTs } = parseThreadId(threadId);

    return withRetry(
      async (): Promise<SendReplyResult> => {
        const response = await this.api.post<unknown>(
          '/chat.postMessage',
          { channel, text, ...(threadTs ? { thread_ts: threadTs } : {}) },
          { headers: { 'X-Request-ID': requestId } }
        );

        const body = postMessageResponseSchema.parse(response.data);
        if (!body.ok) {
          this.logger.error({ requestId, channel, error: body.error }, 'Slack rejected the message');
          return { success: false, error: body.error ?? 'unknown_error' };
        }

        this.logger.debug({ requestId, channel, messageId: body.ts }, 'Slack message sent');
        return { success: true, messageId: body.ts };
      },
      { maxRetries: 3, initialDelayMs: 500, maxDelayMs: 4000, shouldRetry: isRateLimited }
    ).catch((error: unknown): SendReplyResult => {
      const errorMessage = error instanceof Error ? error.message : 'Error sending Slack message';
      this.logger.error({ requestId, channel, error: errorMessage }, 'Error sending Slack message');
      return { success: false, error: errorMessage };
    });
  }

  /**
   * Verifies the v0 request signature over the raw body, rejecting requests older than five minutes
   */
  validateSignature(rawBody: string, headers: SignatureHeaders, requestId: string): boolean {
    const { timestamp, signature } = headers;
    if (!timestamp || !signature) {
      this.logger.warn({ requestId }, 'Slack signature headers missing');
      return false;
    }

    const requestTime = Number(timestamp);
    if (!Number.isFinite(requestTime) || Math.abs(this.now() / 1000 - requestTime) > MAX_REQUEST_AGE_SECONDS) {
      this.logger.warn({ requestId, timestamp }, 'Slack request timestamp outside the allowed window');
      return false;
    }

    const expected = `${SIGNATURE_VERSION}=${crypto
      .createHmac('sha256', this.config.slackSigningSecret)
      .update(`${SIGNATURE_VERSION}:${timestamp}:${rawBody}`)
      .digest('hex')}`;

    const expectedBuffer = Buffer.from(expected);
    const actualBuffer = Buffer.from(signature);
    const isValid = expectedBuffer.length === actualBuffer.length && crypto.timingSafeEqual(expectedBuffer, actualBuffer);

    if (!isValid) {
      this.logger.warn({ requestId }, 'Invalid Slack signature');
    }
    return isValid;
  }

  parseWebhook(payload: unknown, requestId: string): SlackWebhookPayload {
    const parsed = slackPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.debug({ requestId }, 'Unsupported Slack payload');
      return { kind: 'ignored', reason: 'unsupported_payload' };
    }

    if (parsed.data.type === 'url_verification') {
      return { kind: 'url_verification', challenge: parsed.data.challenge };
    }

    const { event } = parsed.data;
    if (event.type !== 'message' && event.type !== 'app_mention') {
      return { kind: 'ignored', reason: `event_type:${event.type}` };
    }
    if (event.bot_id || event.subtype) {
      return { kind: 'ignored', reason: event.subtype ?? 'bot_message' };
    }
    if (!event.user || !event.channel || !event.ts || event.text === undefined) {
      return { kind: 'ignored', reason: 'incomplete_event' };
    }

    const isDirectMessage = event.channel_type === 'im';
    if (event.type === 'message' && !isDirectMessage && this.mentionsBot(event.text)) {
      // the matching app_mention event carries this message
      return { kind: 'ignored', reason: 'mention_in_channel_message' };
    }

    return {
      kind: 'message',
      event: {
        threadId: buildThreadId(event.channel, event.ts, event.thread_ts, isDirectMessage),
        senderId: event.user,
        text: stripMentions(event.text),
        isDirectMessage,
        messageId: `${event.channel}:${event.ts}`,
        requiresActiveSession: event.type === 'message' && !isDirectMessage,
      },
    };
  }

  /**
   * Without a configured bot user id any user mention counts
   */
  private mentionsBot(text: string): boolean {
    if (this.config.slackBotUserId) {
      return text.includes(`<@${this.config.slackBotUserId}>`) || text.includes(`<@${this.config.slackBotUserId}|`);
    }
    return new RegExp(ANY_MENTION.source).test(text);
  }
}
