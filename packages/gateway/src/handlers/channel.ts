import {
  CHANNEL_CREATE,
  CHANNEL_DELETE,
  CHANNEL_UPDATE,
  ChannelPayloadSchema,
  isThreadPayload,
  type ChannelPayload,
} from '@relaycord/proto';
import { channelFromPayload, notifyDiff, notifyRemoval } from '@relaycord/domain';
import { defineHandler, type EventHandler, type HandlerContext } from '../dispatcher';
import { upsertThreadPayload } from './thread';

// Thread channels arrive through the channel events too; they go to the thread table.
function upsertChannel(payload: ChannelPayload, { store, sink, event }: HandlerContext): void {
  if (isThreadPayload(payload)) {
    upsertThreadPayload(store, sink, event, payload);
    return;
  }
  notifyDiff(sink, event, 'channel', payload.id, store.upsert('channel', payload.id, channelFromPayload(payload)));
}

export const channelHandlers: Record<string, EventHandler> = {
  [CHANNEL_CREATE]: defineHandler(ChannelPayloadSchema, upsertChannel),
  [CHANNEL_UPDATE]: defineHandler(ChannelPayloadSchema, upsertChannel),
  [CHANNEL_DELETE]: defineHandler(ChannelPayloadSchema, (payload, { store, sink, event }) => {
    const kind = isThreadPayload(payload) ? 'thread' : 'channel';
    notifyRemoval(sink, event, kind, payload.id, store.remove(kind, payload.id));
  }),
};
