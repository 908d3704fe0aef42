import { z } from 'zod';
import { ChannelPayloadSchema } from './channel';
import { MemberPayloadSchema } from './member';
import { UserPayloadSchema } from './user';

export const GUILD_CREATE = 'GUILD_CREATE' as const;
export const GUILD_UPDATE = 'GUILD_UPDATE' as const;
export const GUILD_DELETE = 'GUILD_DELETE' as const;
export const GUILD_ROLE_CREATE = 'GUILD_ROLE_CREATE' as const;
export const GUILD_ROLE_UPDATE = 'GUILD_ROLE_UPDATE' as const;
export const GUILD_ROLE_DELETE = 'GUILD_ROLE_DELETE' as const;
export const GUILD_MEMBER_ADD = 'GUILD_MEMBER_ADD' as const;
export const GUILD_MEMBER_UPDATE = 'GUILD_MEMBER_UPDATE' as const;
export const GUILD_MEMBER_REMOVE = 'GUILD_MEMBER_REMOVE' as const;

export const RolePayloadSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  color: z.number().int().optional(),
  position: z.number().int().optional(),
  permissions: z.string().optional(),
  hoist: z.boolean().optional(),
  mentionable: z.boolean().optional(),
});

export const GuildPayloadSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  owner_id: z.string().optional(),
  icon: z.string().nullable().optional(),
  member_count: z.number().int().optional(),
  unavailable: z.boolean().optional(),
  channels: z.array(ChannelPayloadSchema).optional(),
  threads: z.array(ChannelPayloadSchema).optional(),
  members: z.array(MemberPayloadSchema).optional(),
  roles: z.array(RolePayloadSchema).optional(),
});

export const GuildDeletePayload = z.object({
  id: z.string(),
  unavailable: z.boolean().optional(),
});

export const GuildRoleUpsertPayload = z.object({
  guild_id: z.string(),
  role: RolePayloadSchema,
});

export const GuildRoleDeletePayload = z.object({
  guild_id: z.string(),
  role_id: z.string(),
});

export const GuildMemberUpsertPayload = MemberPayloadSchema.extend({
  guild_id: z.string(),
  user: UserPayloadSchema,
});

export const GuildMemberRemovePayload = z.object({
  guild_id: z.string(),
  user: UserPayloadSchema,
});

export type RolePayload = z.infer<typeof RolePayloadSchema>;
export type GuildPayload = z.infer<typeof GuildPayloadSchema>;
export type GuildDelete = z.infer<typeof GuildDeletePayload>;
export type GuildRoleUpsert = z.infer<typeof GuildRoleUpsertPayload>;
export type GuildRoleDelete = z.infer<typeof GuildRoleDeletePayload>;
export type GuildMemberUpsert = z.infer<typeof GuildMemberUpsertPayload>;
export type GuildMemberRemove = z.infer<typeof GuildMemberRemovePayload>;
