import { z } from 'zod';

const booleanFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const GatewayConfigSchema = z.object({
  GATEWAY_URL: z.string().url().default('wss://gateway.discord.gg/?v=9&encoding=json'),
  GATEWAY_RECONNECT_BASE_MS: z.coerce.number().int().positive().default(1000),
  GATEWAY_RECONNECT_MAX_MS: z.coerce.number().int().positive().default(60000),
  GATEWAY_SEND_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
  MEMBER_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  CLIENT_OS: z.string().default('Linux'),
  CLIENT_BROWSER: z.string().default('Chrome'),
});

export const RestConfigSchema = z.object({
  API_BASE_URL: z.string().url().default('https://discord.com/api/v9'),
  REST_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  REST_AUTO_RETRY: booleanFromEnv.default(true),
});

export const ClientConfigSchema = BaseConfigSchema.merge(GatewayConfigSchema)
  .merge(RestConfigSchema)
  .extend({
    DISCORD_TOKEN: z.string().min(1),
  })
  .refine((config) => config.GATEWAY_RECONNECT_BASE_MS <= config.GATEWAY_RECONNECT_MAX_MS, {
    message: 'must not exceed GATEWAY_RECONNECT_MAX_MS',
    path: ['GATEWAY_RECONNECT_BASE_MS'],
  });

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export const BotConfigSchema = BaseConfigSchema.merge(GatewayConfigSchema)
  .merge(RestConfigSchema)
  .extend({
    DISCORD_TOKEN: z.string().min(1),
    COMMAND_PREFIX: z.string().min(1).max(5).default('!'),
    HEALTHCHECK_PATH: z.string().default('/tmp/.relaycord-bot-healthy'),
    HEALTHCHECK_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  });

export type BotConfig = z.infer<typeof BotConfigSchema>;

export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
