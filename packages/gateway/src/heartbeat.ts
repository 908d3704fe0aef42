export interface HeartbeatOptions {
  intervalMs: number;
  send: () => void;
  /** Called once the server has missed `maxMissedAcks` acks in a row. */
  onZombie: () => void;
  maxMissedAcks?: number;
  random?: () => number;
  now?: () => number;
}

/**
 * Periodic heartbeat with ack tracking. A beat that fires while the previous
 * one is still unacknowledged counts as a missed ack.
 */
export class Heartbeat {
  private jitterTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private acked = true;
  private missed = 0;
  private sentAt: number | null = null;
  private lastLatency: number | null = null;
  private readonly maxMissedAcks: number;
  private readonly now: () => number;

  constructor(private readonly options: HeartbeatOptions) {
    this.maxMissedAcks = options.maxMissedAcks ?? 2;
    this.now = options.now ?? (() => Date.now());
  }

  /** The first beat lands at a random point within the interval. */
  start(): void {
    this.stop();
    this.running = true;
    this.acked = true;
    this.missed = 0;
    const random = this.options.random ?? Math.random;
    this.jitterTimer = setTimeout(() => {
      this.jitterTimer = null;
      this.tick();
      if (this.running) {
        this.intervalTimer = setInterval(() => this.tick(), this.options.intervalMs);
      }
    }, Math.floor(this.options.intervalMs * random()));
  }

  stop(): void {
    this.running = false;
    if (this.jitterTimer) {
      clearTimeout(this.jitterTimer);
      this.jitterTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
  }

  /** Server asked for a beat out of schedule. */
  beatNow(): void {
    this.send();
  }

  ack(): void {
    this.acked = true;
    this.missed = 0;
    if (this.sentAt !== null) {
      this.lastLatency = this.now() - this.sentAt;
    }
  }

  get latency(): number | null {
    return this.lastLatency;
  }

  get missedAcks(): number {
    return this.missed;
  }

  private tick(): void {
    if (!this.acked) {
      this.missed += 1;
      if (this.missed >= this.maxMissedAcks) {
        this.stop();
        this.options.onZombie();
        return;
      }
    }
    this.acked = false;
    this.send();
  }

  private send(): void {
    this.sentAt = this.now();
    this.options.send();
  }
}
