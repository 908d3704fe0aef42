import { type ThreadRestPort } from '@relaycord/domain';
import { ChannelPayloadSchema, type ChannelPayload, type ThreadEditBody } from '@relaycord/proto';
import { type RestClient } from '../client';
import { route } from '../routes';

export class ThreadEndpoints implements ThreadRestPort {
  constructor(private readonly client: RestClient) {}

  async joinThread(threadId: string): Promise<void> {
    await this.client.requestVoid(
      route('PUT', '/channels/{channel_id}/thread-members/@me', { channel_id: threadId }),
    );
  }

  async leaveThread(threadId: string): Promise<void> {
    await this.client.requestVoid(
      route('DELETE', '/channels/{channel_id}/thread-members/@me', { channel_id: threadId }),
    );
  }

  async addThreadMember(threadId: string, userId: string): Promise<void> {
    await this.client.requestVoid(
      route('PUT', '/channels/{channel_id}/thread-members/{user_id}', {
        channel_id: threadId,
        user_id: userId,
      }),
    );
  }

  async removeThreadMember(threadId: string, userId: string): Promise<void> {
    await this.client.requestVoid(
      route('DELETE', '/channels/{channel_id}/thread-members/{user_id}', {
        channel_id: threadId,
        user_id: userId,
      }),
    );
  }

  async deleteChannel(channelId: string): Promise<void> {
    await this.client.requestVoid(route('DELETE', '/channels/{channel_id}', { channel_id: channelId }));
  }

  async editThread(threadId: string, body: ThreadEditBody, reason?: string): Promise<ChannelPayload> {
    return this.client.requestJson(
      route('PATCH', '/channels/{channel_id}', { channel_id: threadId }),
      ChannelPayloadSchema,
      { body, reason },
    );
  }
}
