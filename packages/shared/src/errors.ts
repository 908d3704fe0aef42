export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  VALIDATION = 'VALIDATION',
  INVALID_STATE = 'INVALID_STATE',
  TRANSPORT = 'TRANSPORT',
  PROTOCOL_TIMEOUT = 'PROTOCOL_TIMEOUT',
  INVALID_SESSION = 'INVALID_SESSION',
  RATE_LIMITED = 'RATE_LIMITED',
  FORBIDDEN = 'FORBIDDEN',
  NOT_FOUND = 'NOT_FOUND',
  HTTP = 'HTTP',
}

const RETRYABLE: ReadonlySet<ErrorCode> = new Set([ErrorCode.RATE_LIMITED]);

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.retryable = RETRYABLE.has(code);
    this.safeMeta = safeMeta;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...this.safeMeta,
    };
  }
}

/** Connection drop, DNS failure or a socket that never opened. */
export class TransportError extends AppError {
  constructor(message: string, safeMeta: Record<string, unknown> = {}) {
    super(ErrorCode.TRANSPORT, message, safeMeta);
    this.name = 'TransportError';
  }
}

/** A correlated gateway response did not arrive before its deadline. */
export class ProtocolTimeoutError extends AppError {
  constructor(message: string, safeMeta: Record<string, unknown> = {}) {
    super(ErrorCode.PROTOCOL_TIMEOUT, message, safeMeta);
    this.name = 'ProtocolTimeoutError';
  }
}

export class InvalidSessionError extends AppError {
  constructor(message: string, safeMeta: Record<string, unknown> = {}) {
    super(ErrorCode.INVALID_SESSION, message, safeMeta);
    this.name = 'InvalidSessionError';
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfterMs: number;
  public readonly global: boolean;

  constructor(retryAfterMs: number, global: boolean, safeMeta: Record<string, unknown> = {}) {
    super(ErrorCode.RATE_LIMITED, `Rate limited for ${retryAfterMs}ms`, {
      ...safeMeta,
      retryAfterMs,
      global,
    });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
    this.global = global;
  }
}

export class HttpError extends AppError {
  public readonly status: number;
  /** JSON error code from the response body, when the server sent one. */
  public readonly apiCode: number | null;

  constructor(
    status: number,
    message: string,
    apiCode: number | null = null,
    code: ErrorCode = ErrorCode.HTTP,
  ) {
    super(code, message, { status, apiCode });
    this.name = 'HttpError';
    this.status = status;
    this.apiCode = apiCode;
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string, apiCode: number | null = null) {
    super(403, message, apiCode, ErrorCode.FORBIDDEN);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string, apiCode: number | null = null) {
    super(404, message, apiCode, ErrorCode.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}
