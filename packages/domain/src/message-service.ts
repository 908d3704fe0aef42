import {
  MESSAGE_PAGE_LIMIT,
  MessageCreateBodySchema,
  MessageHistoryQuerySchema,
  type MessageCreateBody,
} from '@relaycord/proto';
import {
  AppError,
  ErrorCode,
  compareSnowflakes,
  timeSnowflake,
} from '@relaycord/shared';
import { type Message } from './entities';
import { type EntityStore } from './entity-store';
import { messageFromPayload } from './mappers';
import { type HistoryPageQuery, type MessageRestPort } from './ports';

export type HistoryBound = string | Date;

export interface HistoryOptions {
  /** Maximum number of messages to yield; null walks the whole history. */
  limit?: number | null;
  before?: HistoryBound;
  after?: HistoryBound;
  around?: HistoryBound;
  /** Defaults to true when `after` is set. */
  oldestFirst?: boolean;
}

export interface SendOptions {
  /** Id of a message in the same channel to reply to. */
  replyTo?: string;
  /** Whether a reply pings the author of the referenced message. */
  mentionAuthor?: boolean;
}

export interface MessageServiceDeps {
  rest: MessageRestPort;
  generateNonce: () => string;
  /** When given, sends into a cached archived thread are refused before any request. */
  store?: EntityStore;
}

const OLDEST_ID = '0';

function toSnowflake(bound: HistoryBound | undefined, high: boolean): string | undefined {
  if (bound === undefined) return undefined;
  return typeof bound === 'string' ? bound : timeSnowflake(bound, high);
}

export class MessageService {
  constructor(private readonly deps: MessageServiceDeps) {}

  async send(channelId: string, content: string, options: SendOptions = {}): Promise<Message> {
    if (this.deps.store?.get('thread', channelId)?.archived) {
      throw new AppError(ErrorCode.INVALID_STATE, 'Thread is archived', { channelId });
    }
    const input: MessageCreateBody = { content, nonce: this.deps.generateNonce() };
    if (options.replyTo !== undefined) {
      input.message_reference = { message_id: options.replyTo, channel_id: channelId };
      input.allowed_mentions = { replied_user: options.mentionAuthor ?? true };
    }
    const body = MessageCreateBodySchema.safeParse(input);
    if (!body.success) {
      throw new AppError(ErrorCode.VALIDATION, body.error.issues[0]?.message ?? 'Invalid message', {
        channelId,
      });
    }
    const payload = await this.deps.rest.createMessage(channelId, body.data);
    return messageFromPayload(payload);
  }

  reply(message: Message, content: string, mentionAuthor = true): Promise<Message> {
    return this.send(message.channelId, content, { replyTo: message.id, mentionAuthor });
  }

  async delete(channelId: string, messageId: string): Promise<void> {
    await this.deps.rest.deleteMessage(channelId, messageId);
  }

  /**
   * Pages through a channel's history. `before` walks newest first, `after`
   * (or `oldestFirst`) oldest first, and `around` returns a single page.
   */
  async *history(channelId: string, options: HistoryOptions = {}): AsyncGenerator<Message> {
    const limit = options.limit === undefined ? MESSAGE_PAGE_LIMIT : options.limit;
    const before = toSnowflake(options.before, false);
    let after = toSnowflake(options.after, true);
    const around = toSnowflake(options.around, false);

    if (around !== undefined) {
      if (before !== undefined || after !== undefined) {
        throw new AppError(ErrorCode.VALIDATION, 'around cannot be combined with before or after', {
          channelId,
        });
      }
      const size = Math.min(limit ?? MESSAGE_PAGE_LIMIT, MESSAGE_PAGE_LIMIT);
      const page = await this.fetchPage(channelId, { limit: size, around });
      for (const message of page) yield message;
      return;
    }

    const oldestFirst = options.oldestFirst ?? after !== undefined;
    if (oldestFirst && after === undefined) after = OLDEST_ID;

    let remaining = limit ?? Number.POSITIVE_INFINITY;
    let cursor = oldestFirst ? after : before;

    while (remaining > 0) {
      const size = Math.min(remaining, MESSAGE_PAGE_LIMIT);
      const query: HistoryPageQuery = oldestFirst
        ? { limit: size, after: cursor }
        : { limit: size, before: cursor };
      const page = await this.fetchPage(channelId, query);
      if (page.length === 0) return;

      page.sort((a, b) => (oldestFirst ? 1 : -1) * compareSnowflakes(a.id, b.id));
      const last = page[page.length - 1];
      if (last) cursor = last.id;

      for (const message of page) {
        // The opposite bound only filters; the cursor walks toward it.
        if (oldestFirst && before !== undefined && compareSnowflakes(message.id, before) >= 0) return;
        if (!oldestFirst && after !== undefined && compareSnowflakes(message.id, after) <= 0) return;
        yield message;
        remaining -= 1;
        if (remaining === 0) return;
      }

      if (page.length < size) return;
    }
  }

  private async fetchPage(channelId: string, query: HistoryPageQuery): Promise<Message[]> {
    const parsed = MessageHistoryQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new AppError(ErrorCode.VALIDATION, parsed.error.issues[0]?.message ?? 'Invalid history query', {
        channelId,
      });
    }
    const payloads = await this.deps.rest.listMessages(channelId, parsed.data);
    return payloads.map(messageFromPayload);
  }
}
