import {
  type EntityKind,
  type EntityMap,
  type GuildChildKind,
  GUILD_CHILD_KINDS,
} from './entities';
import { ThreadMemberStore } from './thread-members';

export type Diff<T> =
  | { type: 'created'; after: T }
  | { type: 'updated'; before: T; after: T; fields: string[] }
  | { type: 'unchanged'; after: T };

type Tables = { [K in EntityKind]: Map<string, EntityMap[K]> };

const BLANK: { [K in EntityKind]: (id: string) => EntityMap[K] } = {
  guild: (id) => ({
    id,
    name: '',
    ownerId: null,
    icon: null,
    memberCount: null,
    unavailable: false,
  }),
  channel: (id) => ({
    id,
    guildId: null,
    type: 0,
    name: null,
    position: 0,
    parentId: null,
    topic: null,
    nsfw: false,
    lastMessageId: null,
    slowmodeDelay: 0,
  }),
  thread: (id) => ({
    id,
    guildId: null,
    parentId: null,
    ownerId: null,
    name: '',
    type: 11,
    lastMessageId: null,
    slowmodeDelay: 0,
    messageCount: 0,
    memberCount: 0,
    memberIdsPreview: [],
    archived: false,
    locked: false,
    invitable: true,
    autoArchiveDuration: 1440,
    archiveTimestamp: null,
    createdAt: null,
  }),
  member: (id) => {
    const [guildId = '', userId = ''] = id.split(':');
    return { guildId, userId, nick: null, roles: [], joinedAt: null };
  },
  role: (id) => ({
    id,
    guildId: '',
    name: '',
    color: 0,
    position: 0,
    permissions: '0',
    hoist: false,
    mentionable: false,
  }),
  user: (id) => ({ id, username: '', discriminator: '0', avatar: null, bot: false }),
};

// Approximate counters the server caps and refreshes on its own schedule.
// They are merged but never count as a change.
const VOLATILE_FIELDS: Partial<Record<EntityKind, ReadonlySet<string>>> = {
  thread: new Set(['messageCount', 'memberCount', 'memberIdsPreview']),
};

const NO_FIELDS: ReadonlySet<string> = new Set();

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => Object.is(item, b[i]));
  }
  return Object.is(a, b);
}

function mergeFields<T extends object>(
  base: T,
  partial: Partial<T>,
  volatile: ReadonlySet<string>,
): { next: T; changed: string[] } {
  const next: T = { ...base };
  const changed: string[] = [];
  for (const key in partial) {
    const value = partial[key];
    if (value === undefined) continue;
    if (!volatile.has(key) && !sameValue(base[key], value)) {
      changed.push(key);
    }
    next[key] = value;
  }
  return { next, changed };
}

function isGuildChild(kind: EntityKind): kind is GuildChildKind {
  return kind === 'channel' || kind === 'thread' || kind === 'member' || kind === 'role';
}

function memberUserId(entity: object): string | null {
  return 'userId' in entity && typeof entity.userId === 'string' && entity.userId !== ''
    ? entity.userId
    : null;
}

function parentGuildId(entity: object): string | null {
  return 'guildId' in entity && typeof entity.guildId === 'string' && entity.guildId !== ''
    ? entity.guildId
    : null;
}

/**
 * In-memory entity graph. Entities are frozen snapshots replaced wholesale on
 * every merge, so a reader holding a reference sees either the old or the new
 * version. Cross-entity references are ids resolved through `get`.
 *
 * Users are held only while a guild member or the local session refers to
 * them; removing the last member of a user drops the user too.
 */
export class EntityStore {
  readonly threadMembers: ThreadMemberStore;

  private selfId: string | null = null;
  private readonly tables: Tables = {
    guild: new Map(),
    channel: new Map(),
    thread: new Map(),
    member: new Map(),
    role: new Map(),
    user: new Map(),
  };
  private readonly children = new Map<string, Record<GuildChildKind, Set<string>>>();
  private readonly userRefs = new Map<string, number>();

  constructor() {
    this.threadMembers = new ThreadMemberStore(() => this.selfId);
  }

  get selfUserId(): string | null {
    return this.selfId;
  }

  setSelfUserId(id: string | null): void {
    this.selfId = id;
  }

  upsert<K extends EntityKind>(
    kind: K,
    id: string,
    partial: Partial<EntityMap[K]>,
  ): Diff<EntityMap[K]> {
    const table: Map<string, EntityMap[K]> = this.tables[kind];
    const blank: (id: string) => EntityMap[K] = BLANK[kind];
    const existing = table.get(id);
    const base = existing ?? blank(id);
    const { next, changed } = mergeFields(base, partial, VOLATILE_FIELDS[kind] ?? NO_FIELDS);
    Object.freeze(next);
    table.set(id, next);

    if (isGuildChild(kind)) {
      const previousGuild = existing ? parentGuildId(existing) : null;
      const guildId = parentGuildId(next);
      if (previousGuild !== guildId) {
        if (previousGuild) this.unindex(previousGuild, kind, id);
        if (guildId) this.index(guildId, kind, id);
      }
    }

    if (!existing && kind === 'member') {
      const userId = memberUserId(next);
      if (userId) this.retainUser(userId);
    }

    if (!existing) return { type: 'created', after: next };
    if (changed.length === 0) return { type: 'unchanged', after: next };
    return { type: 'updated', before: existing, after: next, fields: changed };
  }

  get<K extends EntityKind>(kind: K, id: string): EntityMap[K] | null {
    const table: Map<string, EntityMap[K]> = this.tables[kind];
    return table.get(id) ?? null;
  }

  /** Idempotent: removing an unknown id returns null. Removing a guild removes its children. */
  remove<K extends EntityKind>(kind: K, id: string): EntityMap[K] | null {
    const table: Map<string, EntityMap[K]> = this.tables[kind];
    const existing = table.get(id);
    if (!existing) return null;
    table.delete(id);

    if (isGuildChild(kind)) {
      const guildId = parentGuildId(existing);
      if (guildId) this.unindex(guildId, kind, id);
    }
    if (kind === 'thread') {
      this.threadMembers.dropThread(id);
    }
    if (kind === 'member') {
      const userId = memberUserId(existing);
      if (userId) this.releaseUser(userId);
    }
    if (kind === 'guild') {
      const owned = this.children.get(id);
      if (owned) {
        for (const childKind of GUILD_CHILD_KINDS) {
          for (const childId of [...owned[childKind]]) {
            this.remove(childKind, childId);
          }
        }
      }
      this.children.delete(id);
    }
    return existing;
  }

  all<K extends EntityKind>(kind: K): Array<EntityMap[K]> {
    const table: Map<string, EntityMap[K]> = this.tables[kind];
    return [...table.values()];
  }

  guildChildren<K extends GuildChildKind>(guildId: string, kind: K): Array<EntityMap[K]> {
    const ids = this.children.get(guildId)?.[kind];
    if (!ids) return [];
    const table: Map<string, EntityMap[K]> = this.tables[kind];
    const result: Array<EntityMap[K]> = [];
    for (const id of ids) {
      const entity = table.get(id);
      if (entity) result.push(entity);
    }
    return result;
  }

  size(kind: EntityKind): number {
    return this.tables[kind].size;
  }

  /** Drops every cached entity; the next READY repopulates the store. */
  clear(): void {
    for (const table of Object.values(this.tables)) {
      table.clear();
    }
    this.children.clear();
    this.userRefs.clear();
    this.threadMembers.clear();
    this.selfId = null;
  }

  /** True when a cached member or the local session refers to the user. */
  isUserReferenced(userId: string): boolean {
    return userId === this.selfId || (this.userRefs.get(userId) ?? 0) > 0;
  }

  private retainUser(userId: string): void {
    this.userRefs.set(userId, (this.userRefs.get(userId) ?? 0) + 1);
  }

  private releaseUser(userId: string): void {
    const count = (this.userRefs.get(userId) ?? 0) - 1;
    if (count > 0) {
      this.userRefs.set(userId, count);
      return;
    }
    this.userRefs.delete(userId);
    if (userId !== this.selfId) this.tables.user.delete(userId);
  }

  private index(guildId: string, kind: GuildChildKind, id: string): void {
    let owned = this.children.get(guildId);
    if (!owned) {
      owned = { channel: new Set(), thread: new Set(), member: new Set(), role: new Set() };
      this.children.set(guildId, owned);
    }
    owned[kind].add(id);
  }

  private unindex(guildId: string, kind: GuildChildKind, id: string): void {
    this.children.get(guildId)?.[kind].delete(id);
  }
}
