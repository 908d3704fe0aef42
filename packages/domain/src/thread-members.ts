import { type ThreadMember } from './entities';

/**
 * Per-thread member maps plus a separate slot for the local user's own
 * membership. The generic add path never writes the local user, so a member
 * list refresh cannot evict or overwrite it.
 */
export class ThreadMemberStore {
  private readonly members = new Map<string, Map<string, ThreadMember>>();
  private readonly selves = new Map<string, ThreadMember>();

  constructor(private readonly selfUserId: () => string | null) {}

  /** Returns false when the member is the local user and was not stored. */
  addMember(member: ThreadMember): boolean {
    if (member.userId === this.selfUserId()) return false;
    let threadMembers = this.members.get(member.threadId);
    if (!threadMembers) {
      threadMembers = new Map();
      this.members.set(member.threadId, threadMembers);
    }
    threadMembers.set(member.userId, Object.freeze({ ...member }));
    return true;
  }

  removeMember(threadId: string, userId: string): ThreadMember | null {
    if (userId === this.selfUserId()) {
      return this.clearSelf(threadId);
    }
    const threadMembers = this.members.get(threadId);
    const existing = threadMembers?.get(userId) ?? null;
    threadMembers?.delete(userId);
    return existing;
  }

  setSelf(member: ThreadMember): void {
    this.selves.set(member.threadId, Object.freeze({ ...member }));
  }

  clearSelf(threadId: string): ThreadMember | null {
    const existing = this.selves.get(threadId) ?? null;
    this.selves.delete(threadId);
    return existing;
  }

  me(threadId: string): ThreadMember | null {
    return this.selves.get(threadId) ?? null;
  }

  get(threadId: string, userId: string): ThreadMember | null {
    if (userId === this.selfUserId()) return this.me(threadId);
    return this.members.get(threadId)?.get(userId) ?? null;
  }

  /** Known members of the thread, the local user last. */
  list(threadId: string): ThreadMember[] {
    const others = [...(this.members.get(threadId)?.values() ?? [])];
    const self = this.selves.get(threadId);
    return self ? [...others, self] : others;
  }

  dropThread(threadId: string): void {
    this.members.delete(threadId);
    this.selves.delete(threadId);
  }

  clear(): void {
    this.members.clear();
    this.selves.clear();
  }
}
