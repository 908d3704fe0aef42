export interface Guild {
  readonly id: string;
  readonly name: string;
  readonly ownerId: string | null;
  readonly icon: string | null;
  readonly memberCount: number | null;
  readonly unavailable: boolean;
}

export interface Channel {
  readonly id: string;
  readonly guildId: string | null;
  readonly type: number;
  readonly name: string | null;
  readonly position: number;
  readonly parentId: string | null;
  readonly topic: string | null;
  readonly nsfw: boolean;
  readonly lastMessageId: string | null;
  readonly slowmodeDelay: number;
}

export interface Thread {
  readonly id: string;
  readonly guildId: string | null;
  readonly parentId: string | null;
  readonly ownerId: string | null;
  readonly name: string;
  readonly type: number;
  readonly lastMessageId: string | null;
  readonly slowmodeDelay: number;
  /** Approximate, capped by the server. */
  readonly messageCount: number;
  /** Approximate, capped by the server. */
  readonly memberCount: number;
  readonly memberIdsPreview: readonly string[];
  readonly archived: boolean;
  readonly locked: boolean;
  readonly invitable: boolean;
  readonly autoArchiveDuration: number;
  readonly archiveTimestamp: string | null;
  readonly createdAt: string | null;
}

export interface ThreadMember {
  readonly userId: string;
  readonly threadId: string;
  /** Only reliable for the local user or members who joined while subscribed. */
  readonly joinedAt: string | null;
  readonly flags: number | null;
}

export interface Member {
  readonly guildId: string;
  readonly userId: string;
  readonly nick: string | null;
  readonly roles: readonly string[];
  readonly joinedAt: string | null;
}

export interface Role {
  readonly id: string;
  readonly guildId: string;
  readonly name: string;
  readonly color: number;
  readonly position: number;
  readonly permissions: string;
  readonly hoist: boolean;
  readonly mentionable: boolean;
}

export interface User {
  readonly id: string;
  readonly username: string;
  readonly discriminator: string;
  readonly avatar: string | null;
  readonly bot: boolean;
}

export interface Message {
  readonly id: string;
  readonly channelId: string;
  readonly guildId: string | null;
  readonly authorId: string;
  readonly content: string;
  readonly createdAt: string | null;
  readonly editedAt: string | null;
}

export interface EntityMap {
  guild: Guild;
  channel: Channel;
  thread: Thread;
  member: Member;
  role: Role;
  user: User;
}

export type EntityKind = keyof EntityMap;

export type GuildChildKind = 'channel' | 'thread' | 'member' | 'role';

export const GUILD_CHILD_KINDS: readonly GuildChildKind[] = ['channel', 'thread', 'member', 'role'];

export function memberKey(guildId: string, userId: string): string {
  return `${guildId}:${userId}`;
}
