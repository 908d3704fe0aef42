import {
  ChannelPayloadSchema,
  THREAD_CREATE,
  THREAD_DELETE,
  THREAD_LIST_SYNC,
  THREAD_MEMBERS_UPDATE,
  THREAD_MEMBER_LIST_UPDATE,
  THREAD_MEMBER_UPDATE,
  THREAD_UPDATE,
  ThreadDeletePayload,
  ThreadListSyncPayload,
  ThreadMemberListUpdatePayload,
  ThreadMemberUpdatePayload,
  ThreadMembersUpdatePayload,
  type ChannelPayload,
  type ThreadMemberPayload,
} from '@relaycord/proto';
import {
  type EntityStore,
  type NotificationSink,
  type ThreadMember,
  applyThreadMemberList,
  memberFromPayload,
  memberKey,
  notifyDiff,
  notifyRemoval,
  threadFromPayload,
  threadMemberFromPayload,
  userFromPayload,
} from '@relaycord/domain';
import { defineHandler, type EventHandler } from '../dispatcher';

function threadMemberId(member: ThreadMember): string {
  return `${member.threadId}:${member.userId}`;
}

function notifyThreadMember(
  sink: NotificationSink,
  event: string,
  before: ThreadMember | null,
  after: ThreadMember | null,
): void {
  const member = after ?? before;
  if (!member) return;
  sink.notify({ event, kind: 'threadMember', id: threadMemberId(member), before, after });
}

/** Upserts a thread; an embedded `member` is always the local user's membership. */
export function upsertThreadPayload(
  store: EntityStore,
  sink: NotificationSink,
  event: string,
  payload: ChannelPayload,
  guildId?: string,
): void {
  const diff = store.upsert('thread', payload.id, threadFromPayload(payload, guildId));
  notifyDiff(sink, event, 'thread', payload.id, diff);
  if (payload.member) {
    setSelfMembership(store, sink, event, payload.id, payload.member);
  }
}

function setSelfMembership(
  store: EntityStore,
  sink: NotificationSink,
  event: string,
  threadId: string,
  payload: ThreadMemberPayload,
): void {
  const selfUserId = store.selfUserId;
  if (selfUserId === null) return;
  const member = threadMemberFromPayload(payload, { threadId, selfUserId });
  if (!member || member.userId !== selfUserId) return;
  const before = store.threadMembers.me(member.threadId);
  store.threadMembers.setSelf(member);
  notifyThreadMember(sink, event, before, store.threadMembers.me(member.threadId));
}

export const threadHandlers: Record<string, EventHandler> = {
  [THREAD_CREATE]: defineHandler(ChannelPayloadSchema, (payload, { store, sink, event }) => {
    upsertThreadPayload(store, sink, event, payload);
  }),

  [THREAD_UPDATE]: defineHandler(ChannelPayloadSchema, (payload, { store, sink, event }) => {
    upsertThreadPayload(store, sink, event, payload);
  }),

  [THREAD_DELETE]: defineHandler(ThreadDeletePayload, (payload, { store, sink, event }) => {
    notifyRemoval(sink, event, 'thread', payload.id, store.remove('thread', payload.id));
  }),

  // Active threads for the listed channels (or the whole guild). Cached
  // threads of those channels that are missing from the list are gone.
  [THREAD_LIST_SYNC]: defineHandler(ThreadListSyncPayload, (payload, { store, sink, event }) => {
    const synced = new Set(payload.threads.map((thread) => thread.id));
    const channels = payload.channel_ids ? new Set(payload.channel_ids) : null;
    for (const cached of store.guildChildren(payload.guild_id, 'thread')) {
      if (synced.has(cached.id)) continue;
      if (channels && (cached.parentId === null || !channels.has(cached.parentId))) continue;
      notifyRemoval(sink, event, 'thread', cached.id, store.remove('thread', cached.id));
    }
    for (const thread of payload.threads) {
      upsertThreadPayload(store, sink, event, thread, payload.guild_id);
    }
    for (const member of payload.members) {
      if (member.id === undefined) continue;
      setSelfMembership(store, sink, event, member.id, member);
    }
  }),

  [THREAD_MEMBER_UPDATE]: defineHandler(ThreadMemberUpdatePayload, (payload, { store, sink, event }) => {
    if (payload.id === undefined) return;
    setSelfMembership(store, sink, event, payload.id, payload);
  }),

  [THREAD_MEMBERS_UPDATE]: defineHandler(ThreadMembersUpdatePayload, (payload, { store, sink, event }) => {
    const threadId = payload.id;
    if (payload.member_count !== undefined && store.get('thread', threadId)) {
      notifyDiff(sink, event, 'thread', threadId, store.upsert('thread', threadId, { memberCount: payload.member_count }));
    }

    const selfUserId = store.selfUserId;
    for (const added of payload.added_members ?? []) {
      const member = threadMemberFromPayload(added, { threadId, selfUserId });
      if (!member) continue;
      const partial = added.member ? memberFromPayload(payload.guild_id, added.member) : null;
      if (partial && added.member?.user) {
        store.upsert('user', added.member.user.id, userFromPayload(added.member.user));
        store.upsert('member', memberKey(payload.guild_id, added.member.user.id), partial);
      }
      if (member.userId === selfUserId) {
        const before = store.threadMembers.me(threadId);
        store.threadMembers.setSelf(member);
        notifyThreadMember(sink, event, before, store.threadMembers.me(threadId));
        continue;
      }
      const before = store.threadMembers.get(threadId, member.userId);
      store.threadMembers.addMember(member);
      notifyThreadMember(sink, event, before, store.threadMembers.get(threadId, member.userId));
    }

    for (const userId of payload.removed_member_ids ?? []) {
      const removed = store.threadMembers.removeMember(threadId, userId);
      if (removed) notifyThreadMember(sink, event, removed, null);
    }
  }),

  [THREAD_MEMBER_LIST_UPDATE]: defineHandler(ThreadMemberListUpdatePayload, (payload, { store }) => {
    applyThreadMemberList(store, payload);
  }),
};
