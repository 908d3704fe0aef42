import { z } from 'zod';
import { GuildPayloadSchema } from './guild';
import { UserPayloadSchema } from './user';

export const READY = 'READY' as const;
export const RESUMED = 'RESUMED' as const;

export const HelloPayload = z.object({
  heartbeat_interval: z.number().int().positive(),
});

export const InvalidSessionPayload = z.boolean().catch(false);

export const ReadyPayload = z.object({
  session_id: z.string().min(1),
  resume_gateway_url: z.string().url().optional(),
  user: UserPayloadSchema,
  guilds: z.array(GuildPayloadSchema).default([]),
});

export interface IdentifyProperties {
  os: string;
  browser: string;
  device: string;
}

export interface IdentifyPayload {
  token: string;
  capabilities: number;
  properties: IdentifyProperties;
  presence: { status: string; since: number; activities: unknown[]; afk: boolean };
  compress: boolean;
}

export interface ResumePayload {
  token: string;
  session_id: string;
  seq: number | null;
}

/** Lazy guild subscription; the only way a user account can list thread members. */
export interface GuildSubscribePayload {
  guild_id: string;
  thread_member_lists?: string[];
  typing?: boolean;
  threads?: boolean;
  activities?: boolean;
}

export function buildIdentify(token: string, properties: IdentifyProperties): IdentifyPayload {
  return {
    token,
    capabilities: 0,
    properties,
    presence: { status: 'online', since: 0, activities: [], afk: false },
    compress: false,
  };
}
