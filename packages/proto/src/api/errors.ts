import { z } from 'zod';

/** Body of a non-2xx response. */
export const ApiErrorBodySchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
});

/** Body of a 429. `retry_after` is in seconds and may be fractional. */
export const RateLimitBodySchema = z.object({
  message: z.string().optional(),
  retry_after: z.number().nonnegative(),
  global: z.boolean().default(false),
});

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
export type RateLimitBody = z.infer<typeof RateLimitBodySchema>;
