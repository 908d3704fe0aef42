import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BucketManager, type RateLimitPermit } from '../bucket-manager';

const KEY = 'GET /channels/{channel_id}/messages:200';

describe('BucketManager', () => {
  let manager: BucketManager;

  beforeEach(() => {
    vi.useFakeTimers();
    manager = new BucketManager();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts new buckets with the default quota', async () => {
    const permit = await manager.acquire(KEY);

    expect(manager.snapshot(KEY)).toEqual({ limit: 50, remaining: 49, resetAt: null });
    permit.release();
  });

  it('lets one of two callers through and holds the other until the reset', async () => {
    const setup = await manager.acquire(KEY);
    setup.release({ headers: { limit: 5, remaining: 1, resetAfterMs: 1000, global: false } });
    const start = Date.now();

    let secondAt: number | null = null;
    const first = manager.acquire(KEY);
    const second = manager.acquire(KEY).then((permit) => {
      secondAt = Date.now();
      return permit;
    });

    const firstPermit = await first;
    expect(Date.now()).toBe(start);
    firstPermit.release();

    await vi.advanceTimersByTimeAsync(999);
    expect(secondAt).toBeNull();

    await vi.advanceTimersByTimeAsync(1);
    const secondPermit = await second;
    expect(secondAt).toBe(start + 1000);
    secondPermit.release();
  });

  it('serializes holders of the same bucket in arrival order', async () => {
    const order: string[] = [];
    const permits: RateLimitPermit[] = [];
    const track = (name: string) => (permit: RateLimitPermit) => {
      order.push(name);
      permits.push(permit);
    };

    const a = manager.acquire(KEY).then(track('a'));
    const b = manager.acquire(KEY).then(track('b'));
    await a;
    await vi.advanceTimersByTimeAsync(0);
    expect(order).toEqual(['a']);

    permits[0]?.release();
    await b;
    expect(order).toEqual(['a', 'b']);
    permits[1]?.release();
  });

  it('does not hold other buckets', async () => {
    const held = await manager.acquire(KEY);
    const other = await manager.acquire('GET /channels/{channel_id}/messages:201');

    expect(other.key).toBe('GET /channels/{channel_id}/messages:201');
    other.release();
    held.release();
  });

  it('refills an exhausted bucket once its reset has passed', async () => {
    const permit = await manager.acquire(KEY);
    permit.release({ headers: { limit: 3, remaining: 0, resetAfterMs: 500, global: false } });

    await vi.advanceTimersByTimeAsync(600);
    const start = Date.now();
    const next = await manager.acquire(KEY);

    expect(Date.now()).toBe(start);
    expect(manager.snapshot(KEY)?.remaining).toBe(2);
    next.release();
  });

  it('applies a bucket 429 to that bucket only', async () => {
    const permit = await manager.acquire(KEY);
    permit.release({ rateLimited: { retryAfterMs: 2000, global: false } });

    expect(manager.snapshot(KEY)?.remaining).toBe(0);
    expect(manager.globalCooldownMs()).toBe(0);
  });

  it('applies a global 429 to every bucket', async () => {
    const permit = await manager.acquire(KEY);
    permit.release({ rateLimited: { retryAfterMs: 2000, global: true } });
    const start = Date.now();

    let acquiredAt: number | null = null;
    const other = manager.acquire('POST /channels/{channel_id}/messages:999').then((p) => {
      acquiredAt = Date.now();
      return p;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(acquiredAt).toBeNull();
    await vi.advanceTimersByTimeAsync(1);
    (await other).release();
    expect(acquiredAt).toBe(start + 2000);
  });

  it('forgets idle buckets once their reset has passed', async () => {
    const idle = await manager.acquire(KEY);
    idle.release({ headers: { limit: 5, remaining: 4, resetAfterMs: 1000, global: false } });
    const cooling = await manager.acquire('GET /channels/{channel_id}/messages:201');
    cooling.release({ headers: { limit: 5, remaining: 0, resetAfterMs: 120_000, global: false } });
    const held = await manager.acquire('GET /channels/{channel_id}/messages:202');

    await vi.advanceTimersByTimeAsync(60_000);
    const next = await manager.acquire('GET /channels/{channel_id}/messages:203');

    expect(manager.snapshot(KEY)).toBeNull();
    expect(manager.snapshot('GET /channels/{channel_id}/messages:201')).toMatchObject({ remaining: 0 });
    expect(manager.snapshot('GET /channels/{channel_id}/messages:202')).not.toBeNull();
    expect(manager.size).toBe(3);
    held.release();
    next.release();
  });

  it('ignores a second release', async () => {
    const permit = await manager.acquire(KEY);
    permit.release({ headers: { remaining: 7, global: false } });
    permit.release({ headers: { remaining: 1, global: false } });

    expect(manager.snapshot(KEY)?.remaining).toBe(7);
  });
});
