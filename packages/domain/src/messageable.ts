import { type Message } from './entities';
import { type HistoryOptions, type MessageService } from './message-service';

export interface Sendable {
  readonly channelId: string;
  send(content: string): Promise<Message>;
}

export interface HistoryReadable {
  readonly channelId: string;
  history(options?: HistoryOptions): AsyncGenerator<Message>;
}

export type Messageable = Sendable & HistoryReadable;

/** Text channels, DMs and threads all share the same message capability. */
export function messageableFor(channelId: string, messages: MessageService): Messageable {
  return {
    channelId,
    send: (content) => messages.send(channelId, content),
    history: (options) => messages.history(channelId, options),
  };
}
