import { z } from 'zod';
import { UserPayloadSchema } from './user';

export const MESSAGE_CREATE = 'MESSAGE_CREATE' as const;

export const MessagePayloadSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  guild_id: z.string().optional(),
  author: UserPayloadSchema,
  content: z.string().default(''),
  timestamp: z.string().optional(),
  edited_timestamp: z.string().nullable().optional(),
});

export type MessagePayload = z.infer<typeof MessagePayloadSchema>;
