import { type z } from 'zod';
import { ApiErrorBodySchema, RateLimitBodySchema } from '@relaycord/proto';
import {
  AppError,
  ErrorCode,
  ForbiddenError,
  HttpError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  createLogger,
  errMessage,
  isAppError,
} from '@relaycord/shared';
import { type BucketManager } from './bucket-manager';
import { type RateLimitHeaders, parseRateLimitHeaders } from './headers';
import { type Route } from './routes';
import { type RestResponse, type RestTransport } from './transport';

const logger = createLogger({ name: 'rest:client' });

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, QueryValue>;
  /** Sent as the audit log reason for moderation actions. */
  reason?: string;
}

export interface RestClientOptions {
  token: string;
  baseUrl: string;
  transport: RestTransport;
  buckets: BucketManager;
  /** Retries of a rate-limited request before RateLimitedError surfaces. */
  maxRetries: number;
  autoRetry: boolean;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

function toHttpError(response: RestResponse): HttpError {
  const parsed = ApiErrorBodySchema.safeParse(response.body);
  const apiCode = parsed.success ? (parsed.data.code ?? null) : null;
  const message = (parsed.success ? parsed.data.message : undefined) ?? `HTTP ${response.status}`;
  switch (response.status) {
    case 403:
      return new ForbiddenError(message, apiCode);
    case 404:
      return new NotFoundError(message, apiCode);
    default:
      return new HttpError(response.status, message, apiCode);
  }
}

function retryAfter(response: RestResponse, headers: RateLimitHeaders): { retryAfterMs: number; global: boolean } {
  const parsed = RateLimitBodySchema.safeParse(response.body);
  if (parsed.success) {
    return {
      retryAfterMs: Math.ceil(parsed.data.retry_after * 1000),
      global: parsed.data.global || headers.global,
    };
  }
  return { retryAfterMs: headers.retryAfterMs ?? headers.resetAfterMs ?? 1000, global: headers.global };
}

/**
 * Sends requests through the bucket manager. Only 429s are retried; every
 * other failure surfaces to the caller as the matching error.
 */
export class RestClient {
  constructor(private readonly options: RestClientOptions) {}

  async request(route: Route, options: RequestOptions = {}): Promise<unknown> {
    const { transport, buckets, maxRetries, autoRetry } = this.options;
    const url = this.url(route, options.query);
    const headers = this.headers(options);
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);

    for (let attempt = 0; ; attempt++) {
      const permit = await buckets.acquire(route.bucketKey);
      let response: RestResponse;
      try {
        response = await transport.send({ method: route.method, url, headers, body });
      } catch (err) {
        permit.release();
        if (isAppError(err)) throw err;
        throw new TransportError(errMessage(err), { route: route.bucketKey });
      }

      const limits = parseRateLimitHeaders(response.headers);
      if (response.status === 429) {
        const limited = retryAfter(response, limits);
        permit.release({ headers: limits, rateLimited: limited });
        if (!autoRetry || attempt >= maxRetries) {
          throw new RateLimitedError(limited.retryAfterMs, limited.global, { route: route.bucketKey });
        }
        logger.info({ route: route.bucketKey, attempt: attempt + 1, retryAfterMs: limited.retryAfterMs }, 'Retrying rate-limited request');
        continue;
      }

      permit.release({ headers: limits });
      if (response.status >= 200 && response.status < 300) {
        return response.body;
      }
      const error = toHttpError(response);
      logger.debug({ route: route.bucketKey, status: response.status, apiCode: error.apiCode }, 'Request failed');
      throw error;
    }
  }

  async requestJson<T extends z.ZodTypeAny>(
    route: Route,
    schema: T,
    options: RequestOptions = {},
  ): Promise<z.output<T>> {
    const body = await this.request(route, options);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AppError(ErrorCode.INTERNAL, 'Unexpected response shape', {
        route: route.bucketKey,
        issue: parsed.error.issues[0]?.message,
      });
    }
    return parsed.data;
  }

  async requestVoid(route: Route, options: RequestOptions = {}): Promise<void> {
    await this.request(route, options);
  }

  private url(route: Route, query: Record<string, QueryValue> | undefined): string {
    const base = `${this.options.baseUrl.replace(/\/+$/, '')}${route.path}`;
    if (!query) return base;
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) search.append(key, String(value));
    }
    const qs = search.toString();
    return qs === '' ? base : `${base}?${qs}`;
  }

  private headers(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: this.options.token,
      'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
    };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';
    if (options.reason !== undefined) headers['X-Audit-Log-Reason'] = encodeURIComponent(options.reason);
    return headers;
  }
}
