import {
  GUILD_CREATE,
  GUILD_DELETE,
  GUILD_MEMBER_ADD,
  GUILD_MEMBER_REMOVE,
  GUILD_MEMBER_UPDATE,
  GUILD_ROLE_CREATE,
  GUILD_ROLE_DELETE,
  GUILD_ROLE_UPDATE,
  GUILD_UPDATE,
  GuildDeletePayload,
  GuildMemberRemovePayload,
  GuildMemberUpsertPayload,
  GuildPayloadSchema,
  GuildRoleDeletePayload,
  GuildRoleUpsertPayload,
  READY,
  RESUMED,
  ReadyPayload,
  isThreadPayload,
  type GuildPayload,
} from '@relaycord/proto';
import {
  type EntityStore,
  type NotificationSink,
  channelFromPayload,
  guildFromPayload,
  memberFromPayload,
  memberKey,
  notifyDiff,
  notifyRemoval,
  roleFromPayload,
  userFromPayload,
} from '@relaycord/domain';
import { z } from 'zod';
import { SILENT_SINK, defineHandler, type EventHandler, type HandlerContext } from '../dispatcher';
import { upsertThreadPayload } from './thread';

/** Stores a full guild payload with its channels, threads, roles and members. */
export function applyGuildPayload(
  store: EntityStore,
  sink: NotificationSink,
  event: string,
  payload: GuildPayload,
): void {
  const guildId = payload.id;
  notifyDiff(sink, event, 'guild', guildId, store.upsert('guild', guildId, guildFromPayload(payload)));

  for (const role of payload.roles ?? []) {
    notifyDiff(sink, event, 'role', role.id, store.upsert('role', role.id, roleFromPayload(guildId, role)));
  }
  for (const channel of payload.channels ?? []) {
    if (isThreadPayload(channel)) {
      upsertThreadPayload(store, sink, event, channel, guildId);
      continue;
    }
    notifyDiff(
      sink,
      event,
      'channel',
      channel.id,
      store.upsert('channel', channel.id, channelFromPayload(channel, guildId)),
    );
  }
  for (const thread of payload.threads ?? []) {
    upsertThreadPayload(store, sink, event, thread, guildId);
  }
  for (const member of payload.members ?? []) {
    const partial = memberFromPayload(guildId, member);
    if (!partial || !member.user) continue;
    store.upsert('user', member.user.id, userFromPayload(member.user));
    const key = memberKey(guildId, member.user.id);
    notifyDiff(sink, event, 'member', key, store.upsert('member', key, partial));
  }
}

export const guildHandlers: Record<string, EventHandler> = {
  // READY replaces the whole cache; nothing from a previous session survives.
  [READY]: defineHandler(ReadyPayload, (payload, { store, event }) => {
    store.clear();
    store.setSelfUserId(payload.user.id);
    store.upsert('user', payload.user.id, userFromPayload(payload.user));
    for (const guild of payload.guilds) {
      applyGuildPayload(store, SILENT_SINK, event, guild);
    }
  }),

  [RESUMED]: defineHandler(z.unknown(), () => undefined),

  [GUILD_CREATE]: defineHandler(GuildPayloadSchema, (payload, { store, sink, event }) => {
    applyGuildPayload(store, sink, event, payload);
  }),

  [GUILD_UPDATE]: defineHandler(GuildPayloadSchema, (payload, { store, sink, event }) => {
    notifyDiff(sink, event, 'guild', payload.id, store.upsert('guild', payload.id, guildFromPayload(payload)));
  }),

  [GUILD_DELETE]: defineHandler(GuildDeletePayload, (payload, { store, sink, event }) => {
    if (payload.unavailable) {
      notifyDiff(sink, event, 'guild', payload.id, store.upsert('guild', payload.id, { unavailable: true }));
      return;
    }
    notifyRemoval(sink, event, 'guild', payload.id, store.remove('guild', payload.id));
  }),

  [GUILD_ROLE_CREATE]: defineHandler(GuildRoleUpsertPayload, upsertRole),
  [GUILD_ROLE_UPDATE]: defineHandler(GuildRoleUpsertPayload, upsertRole),

  [GUILD_ROLE_DELETE]: defineHandler(GuildRoleDeletePayload, (payload, { store, sink, event }) => {
    notifyRemoval(sink, event, 'role', payload.role_id, store.remove('role', payload.role_id));
  }),

  [GUILD_MEMBER_ADD]: defineHandler(GuildMemberUpsertPayload, upsertMember),
  [GUILD_MEMBER_UPDATE]: defineHandler(GuildMemberUpsertPayload, upsertMember),

  [GUILD_MEMBER_REMOVE]: defineHandler(GuildMemberRemovePayload, (payload, { store, sink, event }) => {
    const key = memberKey(payload.guild_id, payload.user.id);
    notifyRemoval(sink, event, 'member', key, store.remove('member', key));
  }),
};

function upsertRole(
  payload: z.output<typeof GuildRoleUpsertPayload>,
  { store, sink, event }: HandlerContext,
): void {
  const { role, guild_id: guildId } = payload;
  notifyDiff(sink, event, 'role', role.id, store.upsert('role', role.id, roleFromPayload(guildId, role)));
}

function upsertMember(
  payload: z.output<typeof GuildMemberUpsertPayload>,
  { store, sink, event }: HandlerContext,
): void {
  const partial = memberFromPayload(payload.guild_id, payload);
  if (!partial) return;
  notifyDiff(sink, event, 'user', payload.user.id, store.upsert('user', payload.user.id, userFromPayload(payload.user)));
  const key = memberKey(payload.guild_id, payload.user.id);
  notifyDiff(sink, event, 'member', key, store.upsert('member', key, partial));
}
