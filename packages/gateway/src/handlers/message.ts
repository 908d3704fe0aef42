import { MESSAGE_CREATE, MessagePayloadSchema } from '@relaycord/proto';
import { notifyDiff, userFromPayload } from '@relaycord/domain';
import { defineHandler, type EventHandler } from '../dispatcher';

export const messageHandlers: Record<string, EventHandler> = {
  // Messages are not cached. The author is refreshed only when a member or the
  // local session already holds it, so chat traffic never grows the user table.
  [MESSAGE_CREATE]: defineHandler(MessagePayloadSchema, (payload, { store, sink, event }) => {
    if (store.isUserReferenced(payload.author.id)) {
      store.upsert('user', payload.author.id, userFromPayload(payload.author));
    }
    const channelId = payload.channel_id;
    if (store.get('thread', channelId)) {
      notifyDiff(sink, event, 'thread', channelId, store.upsert('thread', channelId, { lastMessageId: payload.id }));
    } else if (store.get('channel', channelId)) {
      notifyDiff(sink, event, 'channel', channelId, store.upsert('channel', channelId, { lastMessageId: payload.id }));
    }
  }),
};
