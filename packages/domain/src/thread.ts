import { snowflakeTime } from '@relaycord/shared';
import { type Channel, type Member, type Thread, type ThreadMember, memberKey } from './entities';
import { type EntityStore } from './entity-store';
import { isChannelType, tryChannelType } from './enums';
import { memberPermissions } from './permissions';

export function threadParent(store: EntityStore, thread: Thread): Channel | null {
  return thread.parentId ? store.get('channel', thread.parentId) : null;
}

/** The category holding the thread's parent channel. */
export function threadCategoryId(store: EntityStore, thread: Thread): string | null {
  return threadParent(store, thread)?.parentId ?? null;
}

export function threadCategory(store: EntityStore, thread: Thread): Channel | null {
  const categoryId = threadCategoryId(store, thread);
  return categoryId ? store.get('channel', categoryId) : null;
}

/** Threads take the age restriction of their parent; unknown parents count as safe. */
export function isNsfwThread(store: EntityStore, thread: Thread): boolean {
  return threadParent(store, thread)?.nsfw ?? false;
}

function threadGuildId(store: EntityStore, thread: Thread): string | null {
  return thread.guildId ?? threadParent(store, thread)?.guildId ?? null;
}

/** Guild-level permissions of a user in the thread's guild. */
export function threadPermissionsFor(store: EntityStore, thread: Thread, userId: string): bigint | null {
  const guildId = threadGuildId(store, thread);
  return guildId ? memberPermissions(store, guildId, userId) : null;
}

/** The guild member behind a thread member, when both the thread and the member are cached. */
export function threadMemberGuildMember(store: EntityStore, member: ThreadMember): Member | null {
  const thread = store.get('thread', member.threadId);
  const guildId = thread ? threadGuildId(store, thread) : null;
  return guildId ? store.get('member', memberKey(guildId, member.userId)) : null;
}

export function threadOwner(store: EntityStore, thread: Thread): Member | null {
  if (!thread.guildId || !thread.ownerId) return null;
  return store.get('member', memberKey(thread.guildId, thread.ownerId));
}

/** Threads created before the server recorded creation times fall back to the id's timestamp. */
export function threadCreatedAt(thread: Thread): Date {
  return thread.createdAt ? new Date(thread.createdAt) : snowflakeTime(thread.id);
}

export function threadMention(thread: Pick<Thread, 'id'>): string {
  return `<#${thread.id}>`;
}

export function isPrivateThread(thread: Thread): boolean {
  return isChannelType(tryChannelType(thread.type), 'private_thread');
}

export function isNewsThread(thread: Thread): boolean {
  return isChannelType(tryChannelType(thread.type), 'news_thread');
}
