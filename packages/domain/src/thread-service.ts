import {
  THREAD_UPDATE,
  type ThreadMemberListUpdate,
  ThreadEditSchema,
  toThreadEditBody,
} from '@relaycord/proto';
import {
  AppError,
  ErrorCode,
  ProtocolTimeoutError,
  createLogger,
  isAppError,
} from '@relaycord/shared';
import { type Message, type Thread, type ThreadMember } from './entities';
import { type EntityStore } from './entity-store';
import { threadFromPayload } from './mappers';
import { applyThreadMemberList } from './member-lists';
import { type HistoryOptions, type MessageService } from './message-service';
import { notifyDiff } from './notifications';
import { type MemberListRequester, type NotificationSink, type ThreadRestPort } from './ports';

const logger = createLogger({ name: 'domain:threads' });

export const PURGE_CHUNK_SIZE = 50;

export interface PurgeOptions extends HistoryOptions {
  check?: (message: Message) => boolean;
}

export interface ThreadServiceDeps {
  store: EntityStore;
  rest: ThreadRestPort;
  messages: MessageService;
  memberLists: MemberListRequester;
  memberFetchTimeoutMs: number;
  /** Receives the store change an edit makes, as a THREAD_UPDATE would. */
  sink?: NotificationSink;
}

export class ThreadService {
  constructor(private readonly deps: ThreadServiceDeps) {}

  /**
   * Requests the full member list over the gateway and waits for the
   * matching update. On timeout the cached member map is left as it was.
   */
  async fetchMembers(threadId: string): Promise<ThreadMember[]> {
    const { store, memberLists, memberFetchTimeoutMs } = this.deps;
    const thread = this.requireThread(threadId);
    const guildId = thread.guildId ?? this.parentGuildId(thread);
    if (!guildId) {
      throw new AppError(ErrorCode.INVALID_STATE, 'Thread has no known guild', { threadId });
    }

    let update: ThreadMemberListUpdate;
    try {
      update = await memberLists.requestThreadMemberList(guildId, threadId, memberFetchTimeoutMs);
    } catch (err) {
      if (isAppError(err, ErrorCode.PROTOCOL_TIMEOUT)) {
        throw new ProtocolTimeoutError('Server did not respond with members', { threadId });
      }
      throw err;
    }

    const stored = applyThreadMemberList(store, update);
    logger.debug({ threadId, received: update.members.length, stored: stored.length }, 'Thread members fetched');
    return store.threadMembers.list(threadId);
  }

  async join(threadId: string): Promise<void> {
    await this.deps.rest.joinThread(threadId);
  }

  async leave(threadId: string): Promise<void> {
    await this.deps.rest.leaveThread(threadId);
  }

  async addUser(threadId: string, userId: string): Promise<void> {
    await this.deps.rest.addThreadMember(threadId, userId);
  }

  async removeUser(threadId: string, userId: string): Promise<void> {
    await this.deps.rest.removeThreadMember(threadId, userId);
  }

  async delete(threadId: string): Promise<void> {
    await this.deps.rest.deleteChannel(threadId);
  }

  /**
   * An archived thread only accepts an edit that unarchives it. The check
   * runs against the cache before anything is sent.
   */
  async edit(threadId: string, changes: unknown, reason?: string): Promise<Thread> {
    const { store, rest } = this.deps;
    const parsed = ThreadEditSchema.safeParse(changes);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new AppError(ErrorCode.VALIDATION, issue?.message ?? 'Invalid thread edit', {
        threadId,
        field: issue?.path.join('.'),
      });
    }

    const cached = store.get('thread', threadId);
    if (cached?.archived && parsed.data.archived !== false) {
      throw new AppError(ErrorCode.INVALID_STATE, 'Thread is archived', { threadId });
    }

    const payload = await rest.editThread(threadId, toThreadEditBody(parsed.data), reason);
    const diff = store.upsert('thread', payload.id, threadFromPayload(payload, cached?.guildId ?? undefined));
    // The gateway echo of this edit merges as unchanged, so the change is reported here.
    if (this.deps.sink) notifyDiff(this.deps.sink, THREAD_UPDATE, 'thread', payload.id, diff);
    return diff.after;
  }

  /**
   * Walks the history and deletes every message passing `check`, in chunks
   * of fifty while the walk continues. Returns the deleted messages.
   */
  async purge(threadId: string, options: PurgeOptions = {}): Promise<Message[]> {
    const { check = () => true, ...history } = options;
    const deleted: Message[] = [];
    let pending: string[] = [];

    for await (const message of this.deps.messages.history(threadId, history)) {
      if (pending.length === PURGE_CHUNK_SIZE) {
        await this.deleteMessages(threadId, pending);
        pending = [];
      }
      if (!check(message)) continue;
      pending.push(message.id);
      deleted.push(message);
    }

    await this.deleteMessages(threadId, pending);
    logger.info({ threadId, count: deleted.length }, 'Thread purged');
    return deleted;
  }

  /** User accounts have no bulk delete, so messages go one request at a time. */
  async deleteMessages(threadId: string, messageIds: Iterable<string>): Promise<void> {
    for (const messageId of messageIds) {
      await this.deps.messages.delete(threadId, messageId);
    }
  }

  members(threadId: string): ThreadMember[] {
    return this.deps.store.threadMembers.list(threadId);
  }

  me(threadId: string): ThreadMember | null {
    return this.deps.store.threadMembers.me(threadId);
  }

  private requireThread(threadId: string): Thread {
    const thread = this.deps.store.get('thread', threadId);
    if (!thread) {
      throw new AppError(ErrorCode.NOT_FOUND, 'Unknown thread', { threadId });
    }
    return thread;
  }

  private parentGuildId(thread: Thread): string | null {
    if (!thread.parentId) return null;
    return this.deps.store.get('channel', thread.parentId)?.guildId ?? null;
  }
}
