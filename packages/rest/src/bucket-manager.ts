import { createLogger, sleep } from '@relaycord/shared';
import { type RateLimitHeaders } from './headers';

const logger = createLogger({ name: 'rest:buckets' });

/** Quota assumed for a bucket until the first response reports the real one. */
export const DEFAULT_BUCKET_LIMIT = 50;

/** How often idle buckets whose window has passed are forgotten. */
export const BUCKET_SWEEP_INTERVAL_MS = 60_000;

export interface RateLimitedUpdate {
  retryAfterMs: number;
  global: boolean;
}

export interface PermitRelease {
  headers?: RateLimitHeaders;
  rateLimited?: RateLimitedUpdate;
}

export interface RateLimitPermit {
  readonly key: string;
  /** Applies what the response said about the bucket and lets the next holder in. */
  release(update?: PermitRelease): void;
}

interface Bucket {
  limit: number;
  remaining: number;
  resetAt: number | null;
  hash: string | null;
  /** Callers that acquired and have not released yet, waiting ones included. */
  holders: number;
  tail: Promise<void>;
}

export interface BucketManagerOptions {
  defaultLimit?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

function createGate(): { opened: Promise<void>; open: () => void } {
  let open = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

/**
 * Tracks quota per route bucket. Holders of a bucket run one at a time in
 * arrival order, and a holder keeps the bucket until it releases its permit
 * with the response's rate-limit headers.
 */
export class BucketManager {
  private readonly buckets = new Map<string, Bucket>();
  private readonly defaultLimit: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private globalResetAt = 0;
  private lastSweepAt: number;

  constructor(options: BucketManagerOptions = {}) {
    this.defaultLimit = options.defaultLimit ?? DEFAULT_BUCKET_LIMIT;
    this.sweepIntervalMs = options.sweepIntervalMs ?? BUCKET_SWEEP_INTERVAL_MS;
    this.now = options.now ?? (() => Date.now());
    this.lastSweepAt = this.now();
  }

  get size(): number {
    return this.buckets.size;
  }

  async acquire(key: string): Promise<RateLimitPermit> {
    this.maybeSweep();
    const bucket = this.bucket(key);
    bucket.holders += 1;
    const previous = bucket.tail;
    const gate = createGate();
    bucket.tail = previous.then(() => gate.opened);

    await previous;
    await this.waitForQuota(key, bucket);
    bucket.remaining -= 1;

    let released = false;
    return {
      key,
      release: (update) => {
        if (released) return;
        released = true;
        bucket.holders -= 1;
        this.apply(key, bucket, update);
        gate.open();
      },
    };
  }

  /** Milliseconds until the global cooldown ends, or 0. */
  globalCooldownMs(): number {
    return Math.max(0, this.globalResetAt - this.now());
  }

  snapshot(key: string): { limit: number; remaining: number; resetAt: number | null } | null {
    const bucket = this.buckets.get(key);
    return bucket ? { limit: bucket.limit, remaining: bucket.remaining, resetAt: bucket.resetAt } : null;
  }

  private bucket(key: string): Bucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = {
        limit: this.defaultLimit,
        remaining: this.defaultLimit,
        resetAt: null,
        hash: null,
        holders: 0,
        tail: Promise.resolve(),
      };
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  /** Forgets buckets nobody holds whose reset has passed; the next use starts a fresh one. */
  private maybeSweep(): void {
    const now = this.now();
    if (now - this.lastSweepAt < this.sweepIntervalMs) return;
    this.lastSweepAt = now;
    let dropped = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.holders > 0) continue;
      if (bucket.resetAt !== null && bucket.resetAt > now) continue;
      this.buckets.delete(key);
      dropped += 1;
    }
    if (dropped > 0) logger.debug({ dropped, kept: this.buckets.size }, 'Swept idle buckets');
  }

  private async waitForQuota(key: string, bucket: Bucket): Promise<void> {
    for (;;) {
      const now = this.now();
      if (this.globalResetAt > now) {
        logger.debug({ key, waitMs: this.globalResetAt - now }, 'Waiting for global cooldown');
        await sleep(this.globalResetAt - now);
        continue;
      }
      if (bucket.resetAt !== null && bucket.resetAt <= now) {
        bucket.remaining = bucket.limit;
        bucket.resetAt = null;
      }
      if (bucket.remaining > 0) return;
      if (bucket.resetAt === null) {
        // Exhausted with no known reset: the next response will correct it.
        bucket.remaining = Math.max(1, bucket.limit);
        return;
      }
      logger.debug({ key, bucket: bucket.hash, waitMs: bucket.resetAt - now }, 'Bucket exhausted, waiting');
      await sleep(bucket.resetAt - now);
    }
  }

  private apply(key: string, bucket: Bucket, update: PermitRelease | undefined): void {
    const now = this.now();
    const headers = update?.headers;
    if (headers) {
      if (headers.limit !== undefined) bucket.limit = headers.limit;
      if (headers.remaining !== undefined) bucket.remaining = headers.remaining;
      if (headers.resetAfterMs !== undefined) bucket.resetAt = now + headers.resetAfterMs;
      if (headers.bucket !== undefined) bucket.hash = headers.bucket;
    }

    const limited = update?.rateLimited;
    if (limited) {
      if (limited.global) {
        this.globalResetAt = Math.max(this.globalResetAt, now + limited.retryAfterMs);
      } else {
        bucket.remaining = 0;
        bucket.resetAt = now + limited.retryAfterMs;
      }
      logger.warn(
        { key, bucket: bucket.hash, retryAfterMs: limited.retryAfterMs, global: limited.global },
        'Rate limited',
      );
    }
  }
}
