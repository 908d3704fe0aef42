import { type HandlerTable } from '../dispatcher';
import { channelHandlers } from './channel';
import { guildHandlers } from './guild';
import { messageHandlers } from './message';
import { threadHandlers } from './thread';

export function createDefaultHandlers(): HandlerTable {
  return {
    ...guildHandlers,
    ...channelHandlers,
    ...threadHandlers,
    ...messageHandlers,
  };
}

export { applyGuildPayload } from './guild';
export { upsertThreadPayload } from './thread';
