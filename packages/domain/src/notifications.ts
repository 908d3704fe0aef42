import { type EntityKind, type EntityMap } from './entities';
import { type Diff } from './entity-store';
import { type NotificationSink } from './ports';

/** Forwards a diff to the sink unless the merge changed nothing observable. */
export function notifyDiff<K extends EntityKind>(
  sink: NotificationSink,
  event: string,
  kind: K,
  id: string,
  diff: Diff<EntityMap[K]>,
): boolean {
  switch (diff.type) {
    case 'created':
      sink.notify({ event, kind, id, before: null, after: diff.after });
      return true;
    case 'updated':
      sink.notify({ event, kind, id, before: diff.before, after: diff.after });
      return true;
    case 'unchanged':
      return false;
  }
}

export function notifyRemoval<K extends EntityKind>(
  sink: NotificationSink,
  event: string,
  kind: K,
  id: string,
  removed: EntityMap[K] | null,
): boolean {
  if (!removed) return false;
  sink.notify({ event, kind, id, before: removed, after: null });
  return true;
}
