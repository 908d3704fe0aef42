export interface HeaderReader {
  get(name: string): string | null;
}

export interface RateLimitHeaders {
  limit?: number;
  remaining?: number;
  resetAfterMs?: number;
  bucket?: string;
  scope?: string;
  global: boolean;
  retryAfterMs?: number;
}

function numberHeader(headers: HeaderReader, name: string): number | undefined {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function secondsHeader(headers: HeaderReader, name: string): number | undefined {
  const seconds = numberHeader(headers, name);
  return seconds === undefined ? undefined : Math.ceil(seconds * 1000);
}

export function parseRateLimitHeaders(headers: HeaderReader): RateLimitHeaders {
  return {
    limit: numberHeader(headers, 'x-ratelimit-limit'),
    remaining: numberHeader(headers, 'x-ratelimit-remaining'),
    resetAfterMs: secondsHeader(headers, 'x-ratelimit-reset-after'),
    bucket: headers.get('x-ratelimit-bucket') ?? undefined,
    scope: headers.get('x-ratelimit-scope') ?? undefined,
    global: headers.get('x-ratelimit-global')?.toLowerCase() === 'true',
    retryAfterMs: secondsHeader(headers, 'retry-after'),
  };
}
