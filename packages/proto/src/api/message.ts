import { z } from 'zod';

export const MESSAGE_PAGE_LIMIT = 100;
export const MAX_MESSAGE_LENGTH = 2000;

export const MessageReferenceSchema = z.object({
  message_id: z.string(),
  channel_id: z.string().optional(),
  guild_id: z.string().optional(),
  fail_if_not_exists: z.boolean().optional(),
});

export const AllowedMentionsSchema = z.object({
  parse: z.array(z.enum(['roles', 'users', 'everyone'])).optional(),
  replied_user: z.boolean().optional(),
});

export const MessageCreateBodySchema = z.object({
  content: z.string().min(1).max(MAX_MESSAGE_LENGTH),
  nonce: z.string().optional(),
  tts: z.boolean().default(false),
  message_reference: MessageReferenceSchema.optional(),
  allowed_mentions: AllowedMentionsSchema.optional(),
});

export const MessageHistoryQuerySchema = z
  .object({
    limit: z.number().int().min(1).max(MESSAGE_PAGE_LIMIT).default(50),
    before: z.string().optional(),
    after: z.string().optional(),
    around: z.string().optional(),
  })
  .refine(
    (q) => [q.before, q.after, q.around].filter((bound) => bound !== undefined).length <= 1,
    { message: 'Only one of before, after or around may be set' },
  );

export type MessageReference = z.infer<typeof MessageReferenceSchema>;
export type AllowedMentions = z.infer<typeof AllowedMentionsSchema>;
export type MessageCreateBody = z.input<typeof MessageCreateBodySchema>;
export type MessageHistoryQuery = z.input<typeof MessageHistoryQuerySchema>;
