import { type z } from 'zod';
import { createLogger, errMessage } from '@relaycord/shared';
import { type EntityStore, type NotificationSink } from '@relaycord/domain';
import { type PendingRequests } from './pending-requests';

const logger = createLogger({ name: 'gateway:dispatcher' });

export interface HandlerContext {
  event: string;
  store: EntityStore;
  sink: NotificationSink;
}

export interface EventHandler {
  /** Returns false when the payload failed validation and nothing was applied. */
  apply(payload: unknown, ctx: HandlerContext): boolean;
}

export type HandlerTable = Readonly<Record<string, EventHandler>>;

export function defineHandler<S extends z.ZodTypeAny>(
  schema: S,
  apply: (payload: z.output<S>, ctx: HandlerContext) => void,
): EventHandler {
  return {
    apply(raw, ctx) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(
          { event: ctx.event, issues: parsed.error.issues.map((issue) => issue.path.join('.')) },
          'Dropping malformed dispatch payload',
        );
        return false;
      }
      apply(parsed.data, ctx);
      return true;
    },
  };
}

export const SILENT_SINK: NotificationSink = { notify: () => undefined };

export interface DroppedDispatch {
  event: string;
  sequence: number;
  lastSequence: number;
}

export type DispatchListener = (payload: unknown, sequence: number | null) => void;

export interface DispatcherDeps {
  store: EntityStore;
  handlers: HandlerTable;
  pending: PendingRequests;
  sink?: NotificationSink;
  onDrop?: (dropped: DroppedDispatch) => void;
}

/**
 * Routes dispatch frames to their handler in sequence order. Each event runs
 * its store handler first, then settles pending gateway requests, then calls
 * raw listeners.
 */
export class Dispatcher {
  private lastSequence: number | null = null;
  private readonly listeners = new Map<string, Set<DispatchListener>>();
  private readonly sink: NotificationSink;

  constructor(private readonly deps: DispatcherDeps) {
    this.sink = deps.sink ?? SILENT_SINK;
  }

  get sequence(): number | null {
    return this.lastSequence;
  }

  /** Forgets the last sequence; a fresh IDENTIFY restarts numbering. */
  reset(): void {
    this.lastSequence = null;
  }

  on(event: string, listener: DispatchListener): () => void {
    const set = this.listeners.get(event) ?? new Set<DispatchListener>();
    this.listeners.set(event, set);
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  /** Returns false when the event was dropped as out of order. */
  dispatch(event: string, sequence: number | null, payload: unknown): boolean {
    if (sequence !== null) {
      if (this.lastSequence !== null && sequence < this.lastSequence) {
        const dropped = { event, sequence, lastSequence: this.lastSequence };
        logger.warn(dropped, 'Dropping out-of-order dispatch');
        this.deps.onDrop?.(dropped);
        return false;
      }
      this.lastSequence = sequence;
    }

    const handler = this.deps.handlers[event];
    if (handler) {
      try {
        handler.apply(payload, { event, store: this.deps.store, sink: this.sink });
      } catch (err) {
        logger.error({ event, sequence, err: errMessage(err) }, 'Dispatch handler failed');
      }
    } else {
      logger.debug({ event }, 'No handler for dispatch');
    }

    this.deps.pending.resolve(event, payload);

    const listeners = this.listeners.get(event);
    if (listeners) {
      for (const listener of [...listeners]) {
        try {
          listener(payload, sequence);
        } catch (err) {
          logger.error({ event, err: errMessage(err) }, 'Dispatch listener failed');
        }
      }
    }
    return true;
  }
}
