import { z } from 'zod';
import { UserPayloadSchema } from './user';

export const MemberPayloadSchema = z.object({
  user: UserPayloadSchema.optional(),
  nick: z.string().nullable().optional(),
  roles: z.array(z.string()).optional(),
  joined_at: z.string().nullable().optional(),
});

export type MemberPayload = z.infer<typeof MemberPayloadSchema>;
