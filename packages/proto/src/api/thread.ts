import { z } from 'zod';

export const THREAD_ARCHIVE_DURATIONS = [60, 1440, 4320, 10080] as const;
export const MAX_SLOWMODE_SECONDS = 21600;

export const ThreadArchiveDurationSchema = z.union([
  z.literal(60),
  z.literal(1440),
  z.literal(4320),
  z.literal(10080),
]);

export const ThreadEditSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    archived: z.boolean().optional(),
    locked: z.boolean().optional(),
    invitable: z.boolean().optional(),
    slowmodeDelay: z.number().int().min(0).max(MAX_SLOWMODE_SECONDS).optional(),
    autoArchiveDuration: ThreadArchiveDurationSchema.optional(),
  })
  .strict();

export type ThreadArchiveDuration = z.infer<typeof ThreadArchiveDurationSchema>;
export type ThreadEdit = z.infer<typeof ThreadEditSchema>;

export interface ThreadEditBody {
  name?: string;
  archived?: boolean;
  locked?: boolean;
  invitable?: boolean;
  rate_limit_per_user?: number;
  auto_archive_duration?: ThreadArchiveDuration;
}

/** Maps a validated edit onto the wire body, leaving out untouched fields. */
export function toThreadEditBody(edit: ThreadEdit): ThreadEditBody {
  const body: ThreadEditBody = {};
  if (edit.name !== undefined) body.name = edit.name;
  if (edit.archived !== undefined) body.archived = edit.archived;
  if (edit.locked !== undefined) body.locked = edit.locked;
  if (edit.invitable !== undefined) body.invitable = edit.invitable;
  if (edit.slowmodeDelay !== undefined) body.rate_limit_per_user = edit.slowmodeDelay;
  if (edit.autoArchiveDuration !== undefined) body.auto_archive_duration = edit.autoArchiveDuration;
  return body;
}
