import {
  type ChannelPayload,
  type MessageCreateBody,
  type MessagePayload,
  type ThreadEditBody,
  type ThreadMemberListUpdate,
} from '@relaycord/proto';
import { type EntityKind, type EntityMap, type ThreadMember } from './entities';

export interface ThreadRestPort {
  joinThread(threadId: string): Promise<void>;
  leaveThread(threadId: string): Promise<void>;
  addThreadMember(threadId: string, userId: string): Promise<void>;
  removeThreadMember(threadId: string, userId: string): Promise<void>;
  deleteChannel(channelId: string): Promise<void>;
  editThread(threadId: string, body: ThreadEditBody, reason?: string): Promise<ChannelPayload>;
}

export interface HistoryPageQuery {
  limit: number;
  before?: string;
  after?: string;
  around?: string;
}

export interface MessageRestPort {
  createMessage(channelId: string, body: MessageCreateBody): Promise<MessagePayload>;
  listMessages(channelId: string, query: HistoryPageQuery): Promise<MessagePayload[]>;
  deleteMessage(channelId: string, messageId: string): Promise<void>;
}

/**
 * Gateway side of the lazy member list: sends the subscription and resolves
 * with the correlated update, or rejects with a protocol timeout.
 */
export interface MemberListRequester {
  requestThreadMemberList(
    guildId: string,
    threadId: string,
    timeoutMs: number,
  ): Promise<ThreadMemberListUpdate>;
}

export type NotificationKind = EntityKind | 'threadMember';

export type EntitySnapshot = EntityMap[EntityKind] | ThreadMember;

export interface EntityNotification {
  event: string;
  kind: NotificationKind;
  id: string;
  before: EntitySnapshot | null;
  after: EntitySnapshot | null;
}

export interface NotificationSink {
  notify(notification: EntityNotification): void;
}
