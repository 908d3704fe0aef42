export const DISCORD_EPOCH = 1420070400000n; // 2015-01-01T00:00:00Z

const WORKER_ID_BITS = 5n;
const PROCESS_ID_BITS = 5n;
const INCREMENT_BITS = 12n;
const MAX_WORKER_ID = (1n << WORKER_ID_BITS) - 1n;
const MAX_PROCESS_ID = (1n << PROCESS_ID_BITS) - 1n;
const MAX_INCREMENT = (1n << INCREMENT_BITS) - 1n;

const TIMESTAMP_SHIFT = WORKER_ID_BITS + PROCESS_ID_BITS + INCREMENT_BITS; // 22n
const WORKER_ID_SHIFT = PROCESS_ID_BITS + INCREMENT_BITS; // 17n
const PROCESS_ID_SHIFT = INCREMENT_BITS; // 12n
const LOW_BITS_MASK = (1n << TIMESTAMP_SHIFT) - 1n;
const MAX_SNOWFLAKE = (1n << 64n) - 1n;

const SNOWFLAKE_PATTERN = /^\d{1,20}$/;

export function isSnowflake(value: unknown): value is string {
  return typeof value === 'string' && SNOWFLAKE_PATTERN.test(value) && BigInt(value) <= MAX_SNOWFLAKE;
}

/** Milliseconds since the Unix epoch at which the id was minted. */
export function snowflakeTimestamp(id: string): number {
  return Number((BigInt(id) >> TIMESTAMP_SHIFT) + DISCORD_EPOCH);
}

export function snowflakeTime(id: string): Date {
  return new Date(snowflakeTimestamp(id));
}

/**
 * Returns the lowest snowflake for the given time, or the highest one when
 * `high` is set. Useful as an exclusive `before`/`after` bound.
 */
export function timeSnowflake(time: Date | number, high = false): string {
  const ms = BigInt(typeof time === 'number' ? Math.floor(time) : time.getTime());
  const elapsed = ms - DISCORD_EPOCH;
  if (elapsed < 0n) {
    throw new Error('Time precedes the snowflake epoch');
  }
  const id = (elapsed << TIMESTAMP_SHIFT) | (high ? LOW_BITS_MASK : 0n);
  return id.toString();
}

export function compareSnowflakes(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export class SnowflakeGenerator {
  private readonly workerId: bigint;
  private readonly processId: bigint;
  private increment = 0n;
  private lastTimestamp = -1n;

  constructor(workerId = 0, processId = 0, private readonly now: () => number = Date.now) {
    const worker = BigInt(workerId);
    const proc = BigInt(processId);
    if (worker < 0n || worker > MAX_WORKER_ID) {
      throw new Error(`workerId must be between 0 and ${MAX_WORKER_ID}`);
    }
    if (proc < 0n || proc > MAX_PROCESS_ID) {
      throw new Error(`processId must be between 0 and ${MAX_PROCESS_ID}`);
    }
    this.workerId = worker;
    this.processId = proc;
  }

  generate(): string {
    let timestamp = BigInt(this.now()) - DISCORD_EPOCH;

    if (timestamp < this.lastTimestamp) {
      throw new Error(
        `Clock moved backwards. Refusing to generate ID for ${this.lastTimestamp - timestamp}ms`,
      );
    }

    if (timestamp === this.lastTimestamp) {
      this.increment = (this.increment + 1n) & MAX_INCREMENT;
      if (this.increment === 0n) {
        while (timestamp <= this.lastTimestamp) {
          timestamp = BigInt(this.now()) - DISCORD_EPOCH;
        }
      }
    } else {
      this.increment = 0n;
    }

    this.lastTimestamp = timestamp;

    const id =
      (timestamp << TIMESTAMP_SHIFT) |
      (this.workerId << WORKER_ID_SHIFT) |
      (this.processId << PROCESS_ID_SHIFT) |
      this.increment;

    return id.toString();
  }

  static parse(id: string): { timestamp: Date; workerId: number; processId: number; increment: number } {
    const value = BigInt(id);
    return {
      timestamp: snowflakeTime(id),
      workerId: Number((value >> WORKER_ID_SHIFT) & MAX_WORKER_ID),
      processId: Number((value >> PROCESS_ID_SHIFT) & MAX_PROCESS_ID),
      increment: Number(value & MAX_INCREMENT),
    };
  }
}
