/**
 * Fixed-window limiter for outbound gateway frames. Frames over the budget
 * wait in order for the next window instead of being dropped.
 */
export class SendLimiter {
  private count = 0;
  private windowStart: number;
  private readonly queue: Array<() => void> = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number = 60_000,
    private readonly now: () => number = () => Date.now(),
  ) {
    this.windowStart = this.now();
  }

  allow(): boolean {
    const now = this.now();
    if (now - this.windowStart >= this.windowMs) {
      this.count = 0;
      this.windowStart = now;
    }
    if (this.count >= this.maxPerWindow) return false;
    this.count++;
    return true;
  }

  run(task: () => void): void {
    if (this.queue.length === 0 && this.allow()) {
      task();
      return;
    }
    this.queue.push(task);
    this.scheduleFlush();
  }

  get pending(): number {
    return this.queue.length;
  }

  clear(): void {
    this.queue.length = 0;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private scheduleFlush(): void {
    if (this.timer) return;
    const wait = Math.max(0, this.windowStart + this.windowMs - this.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, wait);
  }

  private flush(): void {
    while (this.queue.length > 0 && this.allow()) {
      const task = this.queue.shift();
      if (task) task();
    }
    if (this.queue.length > 0) this.scheduleFlush();
  }
}
