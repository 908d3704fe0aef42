import {
  type ChannelPayload,
  type GuildPayload,
  type MemberPayload,
  type MessagePayload,
  type RolePayload,
  type ThreadMemberPayload,
  type UserPayload,
} from '@relaycord/proto';
import {
  type Channel,
  type Guild,
  type Member,
  type Message,
  type Role,
  type Thread,
  type ThreadMember,
  type User,
} from './entities';

// Mappers return partials: a field the payload left out stays undefined so
// that the store keeps whatever it already holds.

export function guildFromPayload(p: GuildPayload): Partial<Guild> {
  return {
    id: p.id,
    name: p.name,
    ownerId: p.owner_id,
    icon: p.icon,
    memberCount: p.member_count,
    unavailable: p.unavailable,
  };
}

export function channelFromPayload(p: ChannelPayload, guildId?: string): Partial<Channel> {
  return {
    id: p.id,
    guildId: p.guild_id ?? guildId,
    type: p.type,
    name: p.name,
    position: p.position,
    parentId: p.parent_id,
    topic: p.topic,
    nsfw: p.nsfw,
    lastMessageId: p.last_message_id,
    slowmodeDelay: p.rate_limit_per_user,
  };
}

export function threadFromPayload(p: ChannelPayload, guildId?: string): Partial<Thread> {
  const meta = p.thread_metadata;
  return {
    id: p.id,
    guildId: p.guild_id ?? guildId,
    parentId: p.parent_id,
    ownerId: p.owner_id,
    name: p.name ?? undefined,
    type: p.type,
    lastMessageId: p.last_message_id,
    slowmodeDelay: p.rate_limit_per_user,
    messageCount: p.message_count,
    memberCount: p.member_count,
    memberIdsPreview: p.member_ids_preview,
    archived: meta?.archived,
    locked: meta?.locked,
    invitable: meta?.invitable,
    autoArchiveDuration: meta?.auto_archive_duration,
    archiveTimestamp: meta?.archive_timestamp,
    createdAt: meta?.create_timestamp,
  };
}

/**
 * A thread member payload without `user_id` describes the local user, and
 * one without `id` belongs to the thread it was delivered for.
 */
export function threadMemberFromPayload(
  p: ThreadMemberPayload,
  context: { threadId: string; selfUserId: string | null },
): ThreadMember | null {
  const userId = p.user_id ?? p.member?.user?.id ?? context.selfUserId;
  if (userId === null) return null;
  return {
    userId,
    threadId: p.id ?? context.threadId,
    joinedAt: p.join_timestamp ?? null,
    flags: p.flags ?? null,
  };
}

export function memberFromPayload(guildId: string, p: MemberPayload): Partial<Member> | null {
  if (!p.user) return null;
  return {
    guildId,
    userId: p.user.id,
    nick: p.nick,
    roles: p.roles,
    joinedAt: p.joined_at,
  };
}

export function roleFromPayload(guildId: string, p: RolePayload): Partial<Role> {
  return {
    id: p.id,
    guildId,
    name: p.name,
    color: p.color,
    position: p.position,
    permissions: p.permissions,
    hoist: p.hoist,
    mentionable: p.mentionable,
  };
}

export function userFromPayload(p: UserPayload): Partial<User> {
  return {
    id: p.id,
    username: p.username,
    discriminator: p.discriminator,
    avatar: p.avatar,
    bot: p.bot,
  };
}

export function messageFromPayload(p: MessagePayload): Message {
  return {
    id: p.id,
    channelId: p.channel_id,
    guildId: p.guild_id ?? null,
    authorId: p.author.id,
    content: p.content,
    createdAt: p.timestamp ?? null,
    editedAt: p.edited_timestamp ?? null,
  };
}
