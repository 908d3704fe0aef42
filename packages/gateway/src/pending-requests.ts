import { type z } from 'zod';
import { ProtocolTimeoutError } from '@relaycord/shared';

interface PendingEntry {
  event: string;
  /** Settles the waiter and returns true when the payload is the one it awaits. */
  offer(payload: unknown): boolean;
  reject(err: Error): void;
}

/**
 * Requests whose answer arrives later as a dispatch event, matched by a
 * predicate on the payload. Each waiter has its own deadline.
 */
export class PendingRequests {
  private readonly entries = new Set<PendingEntry>();

  wait<S extends z.ZodTypeAny>(
    event: string,
    schema: S,
    match: (payload: z.output<S>) => boolean,
    timeoutMs: number,
  ): Promise<z.output<S>> {
    return new Promise<z.output<S>>((resolve, reject) => {
      const entry: PendingEntry = {
        event,
        offer: (payload) => {
          const parsed = schema.safeParse(payload);
          if (!parsed.success || !match(parsed.data)) return false;
          settle();
          resolve(parsed.data);
          return true;
        },
        reject: (err) => {
          settle();
          reject(err);
        },
      };
      const timer = setTimeout(() => {
        entry.reject(new ProtocolTimeoutError(`Timed out waiting for ${event}`, { event, timeoutMs }));
      }, timeoutMs);
      const settle = () => {
        clearTimeout(timer);
        this.entries.delete(entry);
      };
      this.entries.add(entry);
    });
  }

  /** Offers a dispatched payload to every waiter for the event; returns how many it settled. */
  resolve(event: string, payload: unknown): number {
    let settled = 0;
    for (const entry of [...this.entries]) {
      if (entry.event === event && entry.offer(payload)) settled += 1;
    }
    return settled;
  }

  rejectAll(err: Error): void {
    for (const entry of [...this.entries]) {
      entry.reject(err);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
