export { createLogger, sanitize, errMessage, type SafeLogger } from './logger';
export {
  AppError,
  ErrorCode,
  TransportError,
  ProtocolTimeoutError,
  InvalidSessionError,
  RateLimitedError,
  HttpError,
  ForbiddenError,
  NotFoundError,
  isAppError,
} from './errors';
export {
  loadConfig,
  BaseConfigSchema,
  GatewayConfigSchema,
  RestConfigSchema,
  ClientConfigSchema,
  BotConfigSchema,
  type BaseConfig,
  type ClientConfig,
  type BotConfig,
} from './config';
export {
  DISCORD_EPOCH,
  SnowflakeGenerator,
  isSnowflake,
  snowflakeTime,
  snowflakeTimestamp,
  timeSnowflake,
  compareSnowflakes,
} from './id';
export { touchHealthFile, startHealthBeat, type HealthBeatOptions } from './healthcheck';
export { sleep } from './sleep';
