import pino from 'pino';

const SECRET_KEYS = new Set([
  'token',
  'authorization',
  'password',
  'secret',
  'email',
  'phone',
  'sessionid',
  'resumeurl',
  'cookie',
  'content',
  'messagecontent',
  'body',
  'nonce',
]);

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSecretKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? sanitize(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta, msg) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}

/** Stringifies an unknown thrown value for the `err` log field. */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
