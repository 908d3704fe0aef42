import { z } from 'zod';

export const UserPayloadSchema = z.object({
  id: z.string(),
  username: z.string(),
  discriminator: z.string().optional(),
  avatar: z.string().nullable().optional(),
  bot: z.boolean().optional(),
});

export type UserPayload = z.infer<typeof UserPayloadSchema>;
