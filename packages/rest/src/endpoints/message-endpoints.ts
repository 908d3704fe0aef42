import { z } from 'zod';
import { type HistoryPageQuery, type MessageRestPort } from '@relaycord/domain';
import { MessagePayloadSchema, type MessageCreateBody, type MessagePayload } from '@relaycord/proto';
import { type RestClient } from '../client';
import { route } from '../routes';

const MessagePageSchema = z.array(MessagePayloadSchema);

export class MessageEndpoints implements MessageRestPort {
  constructor(private readonly client: RestClient) {}

  async createMessage(channelId: string, body: MessageCreateBody): Promise<MessagePayload> {
    return this.client.requestJson(
      route('POST', '/channels/{channel_id}/messages', { channel_id: channelId }),
      MessagePayloadSchema,
      { body },
    );
  }

  async listMessages(channelId: string, query: HistoryPageQuery): Promise<MessagePayload[]> {
    return this.client.requestJson(
      route('GET', '/channels/{channel_id}/messages', { channel_id: channelId }),
      MessagePageSchema,
      { query: { limit: query.limit, before: query.before, after: query.after, around: query.around } },
    );
  }

  async deleteMessage(channelId: string, messageId: string): Promise<void> {
    await this.client.requestVoid(
      route('DELETE', '/channels/{channel_id}/messages/{message_id}', {
        channel_id: channelId,
        message_id: messageId,
      }),
    );
  }
}
