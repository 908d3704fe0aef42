import { memberKey } from './entities';
import { type EntityStore } from './entity-store';

export const Permission = {
  CREATE_INSTANT_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  MANAGE_MESSAGES: 1n << 13n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_THREADS: 1n << 34n,
  CREATE_PUBLIC_THREADS: 1n << 35n,
  CREATE_PRIVATE_THREADS: 1n << 36n,
  SEND_MESSAGES_IN_THREADS: 1n << 38n,
} as const;

export type PermissionName = keyof typeof Permission;

/** Every bit set; owners and administrators hold this. */
export const ALL_PERMISSIONS = (1n << 64n) - 1n;

export function parsePermissions(value: string): bigint {
  return /^\d+$/.test(value) ? BigInt(value) : 0n;
}

export function hasPermission(permissions: bigint, name: PermissionName): boolean {
  const flag = Permission[name];
  return (permissions & flag) === flag;
}

/**
 * Guild-level permissions of a cached member: the @everyone role (same id as
 * the guild) combined with the member's roles. Null when the member is not
 * cached. Channel overwrites are not part of the cache and are not applied.
 */
export function memberPermissions(store: EntityStore, guildId: string, userId: string): bigint | null {
  if (store.get('guild', guildId)?.ownerId === userId) return ALL_PERMISSIONS;
  const member = store.get('member', memberKey(guildId, userId));
  if (!member) return null;

  let permissions = 0n;
  for (const roleId of [guildId, ...member.roles]) {
    const role = store.get('role', roleId);
    if (role) permissions |= parsePermissions(role.permissions);
  }
  return (permissions & Permission.ADMINISTRATOR) !== 0n ? ALL_PERMISSIONS : permissions;
}
