import { z } from 'zod';
import { MemberPayloadSchema } from './member';

export const CHANNEL_CREATE = 'CHANNEL_CREATE' as const;
export const CHANNEL_UPDATE = 'CHANNEL_UPDATE' as const;
export const CHANNEL_DELETE = 'CHANNEL_DELETE' as const;
export const THREAD_CREATE = 'THREAD_CREATE' as const;
export const THREAD_UPDATE = 'THREAD_UPDATE' as const;
export const THREAD_DELETE = 'THREAD_DELETE' as const;
export const THREAD_LIST_SYNC = 'THREAD_LIST_SYNC' as const;
export const THREAD_MEMBER_UPDATE = 'THREAD_MEMBER_UPDATE' as const;
export const THREAD_MEMBERS_UPDATE = 'THREAD_MEMBERS_UPDATE' as const;
export const THREAD_MEMBER_LIST_UPDATE = 'THREAD_MEMBER_LIST_UPDATE' as const;

/** Raw channel type numbers that denote a thread. */
export const THREAD_CHANNEL_TYPES: ReadonlySet<number> = new Set([10, 11, 12]);

export const ThreadMetadataSchema = z.object({
  archived: z.boolean().optional(),
  auto_archive_duration: z.number().int().optional(),
  archive_timestamp: z.string().optional(),
  locked: z.boolean().optional(),
  invitable: z.boolean().optional(),
  create_timestamp: z.string().nullable().optional(),
});

export const ThreadMemberPayloadSchema = z.object({
  id: z.string().optional(),
  user_id: z.string().optional(),
  join_timestamp: z.string().nullable().optional(),
  flags: z.number().int().nullable().optional(),
  member: MemberPayloadSchema.optional(),
});

/** Channels and threads share one payload shape; threads add the lifecycle fields. */
export const ChannelPayloadSchema = z.object({
  id: z.string(),
  type: z.number().int().optional(),
  guild_id: z.string().optional(),
  name: z.string().nullable().optional(),
  position: z.number().int().optional(),
  parent_id: z.string().nullable().optional(),
  topic: z.string().nullable().optional(),
  nsfw: z.boolean().optional(),
  last_message_id: z.string().nullable().optional(),
  rate_limit_per_user: z.number().int().optional(),
  owner_id: z.string().optional(),
  message_count: z.number().int().optional(),
  member_count: z.number().int().optional(),
  member_ids_preview: z.array(z.string()).optional(),
  thread_metadata: ThreadMetadataSchema.optional(),
  member: ThreadMemberPayloadSchema.optional(),
});

export const ThreadDeletePayload = z.object({
  id: z.string(),
  guild_id: z.string().optional(),
  parent_id: z.string().nullable().optional(),
  type: z.number().int().optional(),
});

export const ThreadListSyncPayload = z.object({
  guild_id: z.string(),
  channel_ids: z.array(z.string()).optional(),
  threads: z.array(ChannelPayloadSchema).default([]),
  members: z.array(ThreadMemberPayloadSchema).default([]),
});

export const ThreadMemberUpdatePayload = ThreadMemberPayloadSchema.extend({
  guild_id: z.string().optional(),
});

export const ThreadMembersUpdatePayload = z.object({
  id: z.string(),
  guild_id: z.string(),
  member_count: z.number().int().optional(),
  added_members: z.array(ThreadMemberPayloadSchema).optional(),
  removed_member_ids: z.array(z.string()).optional(),
});

export const ThreadMemberListUpdatePayload = z.object({
  guild_id: z.string(),
  thread_id: z.string(),
  members: z.array(ThreadMemberPayloadSchema).default([]),
});

export function isThreadPayload(payload: { type?: number }): boolean {
  return payload.type !== undefined && THREAD_CHANNEL_TYPES.has(payload.type);
}

export type ThreadMetadata = z.infer<typeof ThreadMetadataSchema>;
export type ThreadMemberPayload = z.infer<typeof ThreadMemberPayloadSchema>;
export type ChannelPayload = z.infer<typeof ChannelPayloadSchema>;
export type ThreadDelete = z.infer<typeof ThreadDeletePayload>;
export type ThreadListSync = z.infer<typeof ThreadListSyncPayload>;
export type ThreadMemberUpdate = z.infer<typeof ThreadMemberUpdatePayload>;
export type ThreadMembersUpdate = z.infer<typeof ThreadMembersUpdatePayload>;
export type ThreadMemberListUpdate = z.infer<typeof ThreadMemberListUpdatePayload>;
