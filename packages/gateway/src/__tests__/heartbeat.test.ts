import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Heartbeat } from '../heartbeat';

describe('Heartbeat', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('jitters the first beat and then beats on the interval', () => {
    const send = vi.fn();
    const heartbeat = new Heartbeat({ intervalMs: 1000, send, onZombie: vi.fn(), random: () => 0.25 });
    heartbeat.start();

    vi.advanceTimersByTime(249);
    expect(send).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(send).toHaveBeenCalledTimes(1);

    heartbeat.ack();
    vi.advanceTimersByTime(1000);
    expect(send).toHaveBeenCalledTimes(2);
    heartbeat.stop();
  });

  it('reports a zombie after the configured number of missed acks', () => {
    const send = vi.fn();
    const onZombie = vi.fn();
    const heartbeat = new Heartbeat({ intervalMs: 100, send, onZombie, random: () => 0, maxMissedAcks: 3 });
    heartbeat.start();

    vi.advanceTimersByTime(0);
    vi.advanceTimersByTime(200);
    expect(heartbeat.missedAcks).toBe(2);
    expect(onZombie).not.toHaveBeenCalled();

    vi.advanceTimersByTime(100);
    expect(onZombie).toHaveBeenCalledOnce();
    expect(send).toHaveBeenCalledTimes(3);

    vi.advanceTimersByTime(1000);
    expect(send).toHaveBeenCalledTimes(3);
  });

  it('resets the miss count on ack', () => {
    const heartbeat = new Heartbeat({ intervalMs: 100, send: vi.fn(), onZombie: vi.fn(), random: () => 0 });
    heartbeat.start();
    vi.advanceTimersByTime(100);
    expect(heartbeat.missedAcks).toBe(1);
    heartbeat.ack();
    expect(heartbeat.missedAcks).toBe(0);
    heartbeat.stop();
  });
});
