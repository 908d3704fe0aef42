import { describe, it, expect, beforeEach, vi } from 'vitest';
import { type ChannelPayload, type MessagePayload, type ThreadMemberListUpdate } from '@relaycord/proto';
import { ErrorCode, ProtocolTimeoutError } from '@relaycord/shared';
import { EntityStore } from '../entity-store';
import { MessageService } from '../message-service';
import { ThreadService, type ThreadServiceDeps } from '../thread-service';
import { type MemberListRequester, type MessageRestPort, type ThreadRestPort } from '../ports';

function makeMessagePayload(id: number): MessagePayload {
  return {
    id: String(id),
    channel_id: '300',
    author: { id: id % 2 === 0 ? '1' : '2', username: 'someone' },
    content: `message ${id}`,
  };
}

/** Serves ids 1..count newest first, honouring `before` like the real endpoint. */
function createHistoryRest(count: number, onPage: () => void = () => {}): MessageRestPort {
  return {
    createMessage: vi.fn(async () => makeMessagePayload(1)),
    listMessages: vi.fn(async (_channelId, query) => {
      onPage();
      const before = query.before === undefined ? count + 1 : Number(query.before);
      const ids: number[] = [];
      for (let id = before - 1; id >= 1 && ids.length < query.limit; id--) ids.push(id);
      return ids.map(makeMessagePayload);
    }),
    deleteMessage: vi.fn(async () => {}),
  };
}

function createThreadRest(): ThreadRestPort {
  return {
    joinThread: vi.fn(async () => {}),
    leaveThread: vi.fn(async () => {}),
    addThreadMember: vi.fn(async () => {}),
    removeThreadMember: vi.fn(async () => {}),
    deleteChannel: vi.fn(async () => {}),
    editThread: vi.fn(
      async (threadId: string): Promise<ChannelPayload> => ({
        id: threadId,
        type: 11,
        name: 'bugs',
        thread_metadata: { archived: false },
      }),
    ),
  };
}

function createMockDeps(overrides: Partial<ThreadServiceDeps> = {}): ThreadServiceDeps {
  const store = new EntityStore();
  store.setSelfUserId('1');
  store.upsert('thread', '300', { guildId: '10', parentId: '200', name: 'bugs' });
  return {
    store,
    rest: createThreadRest(),
    messages: new MessageService({ rest: createHistoryRest(0), generateNonce: () => '42' }),
    memberLists: { requestThreadMemberList: vi.fn(async () => ({ guild_id: '10', thread_id: '300', members: [] })) },
    memberFetchTimeoutMs: 15000,
    ...overrides,
  };
}

describe('ThreadService', () => {
  let deps: ThreadServiceDeps;
  let service: ThreadService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new ThreadService(deps);
  });

  describe('fetchMembers', () => {
    it('merges the returned list and includes the local user last', async () => {
      const update: ThreadMemberListUpdate = {
        guild_id: '10',
        thread_id: '300',
        members: [
          { user_id: '2', join_timestamp: null, member: { user: { id: '2', username: 'two' }, roles: ['7'] } },
          { user_id: '3' },
          { user_id: '1' },
        ],
      };
      const memberLists: MemberListRequester = { requestThreadMemberList: vi.fn(async () => update) };
      deps = createMockDeps({ memberLists });
      deps.store.threadMembers.setSelf({ userId: '1', threadId: '300', joinedAt: '2024-01-01T00:00:00.000Z', flags: 1 });
      service = new ThreadService(deps);

      const members = await service.fetchMembers('300');

      expect(memberLists.requestThreadMemberList).toHaveBeenCalledWith('10', '300', 15000);
      expect(members.map((m) => m.userId)).toEqual(['2', '3', '1']);
      expect(members[2]?.joinedAt).toBe('2024-01-01T00:00:00.000Z');
      expect(deps.store.get('member', '10:2')).toMatchObject({ userId: '2', roles: ['7'] });
      expect(deps.store.get('user', '2')?.username).toBe('two');
    });

    it('fails with a protocol timeout and leaves the member map unchanged', async () => {
      deps = createMockDeps({
        memberLists: {
          requestThreadMemberList: vi.fn(async () => {
            throw new ProtocolTimeoutError('Timed out waiting for THREAD_MEMBER_LIST_UPDATE');
          }),
        },
      });
      deps.store.threadMembers.addMember({ userId: '5', threadId: '300', joinedAt: null, flags: null });
      service = new ThreadService(deps);

      await expect(service.fetchMembers('300')).rejects.toMatchObject({
        code: ErrorCode.PROTOCOL_TIMEOUT,
        message: 'Server did not respond with members',
      });
      expect(deps.store.threadMembers.list('300').map((m) => m.userId)).toEqual(['5']);
    });

    it('passes other failures through', async () => {
      deps = createMockDeps({
        memberLists: {
          requestThreadMemberList: vi.fn(async () => {
            throw new Error('Session closed');
          }),
        },
      });
      service = new ThreadService(deps);

      await expect(service.fetchMembers('300')).rejects.toThrow('Session closed');
    });

    it('resolves the guild through the parent channel', async () => {
      deps.store.upsert('thread', '301', { parentId: '200' });
      deps.store.upsert('channel', '200', { guildId: '10' });

      await service.fetchMembers('301');

      expect(deps.memberLists.requestThreadMemberList).toHaveBeenCalledWith('10', '301', 15000);
    });

    it('rejects unknown threads', async () => {
      await expect(service.fetchMembers('999')).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });
  });

  describe('edit', () => {
    it('rejects edits to an archived thread before any request', async () => {
      deps.store.upsert('thread', '300', { archived: true });

      await expect(service.edit('300', { name: 'renamed' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_STATE,
      });
      await expect(service.edit('300', { archived: true })).rejects.toMatchObject({
        code: ErrorCode.INVALID_STATE,
      });
      expect(deps.rest.editThread).not.toHaveBeenCalled();
    });

    it('allows unarchiving and applies the response to the store', async () => {
      deps.store.upsert('thread', '300', { archived: true });

      const thread = await service.edit('300', { archived: false }, 'reopening');

      expect(deps.rest.editThread).toHaveBeenCalledWith('300', { archived: false }, 'reopening');
      expect(thread).toMatchObject({ id: '300', archived: false, guildId: '10' });
      expect(deps.store.get('thread', '300')).toBe(thread);
    });

    it('reports the applied change to the notification sink', async () => {
      const notify = vi.fn();
      deps = createMockDeps({ sink: { notify } });
      service = new ThreadService(deps);

      await service.edit('300', { name: 'bugs' });
      expect(notify).not.toHaveBeenCalled();

      deps.store.upsert('thread', '300', { name: 'old' });
      await service.edit('300', { name: 'bugs' });
      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(
        expect.objectContaining({
          event: 'THREAD_UPDATE',
          kind: 'thread',
          id: '300',
          before: expect.objectContaining({ name: 'old' }),
          after: expect.objectContaining({ name: 'bugs' }),
        }),
      );
    });

    it('sends wire field names', async () => {
      await service.edit('300', { slowmodeDelay: 30, autoArchiveDuration: 4320 });

      expect(deps.rest.editThread).toHaveBeenCalledWith(
        '300',
        { rate_limit_per_user: 30, auto_archive_duration: 4320 },
        undefined,
      );
    });

    it('rejects invalid changes', async () => {
      await expect(service.edit('300', { autoArchiveDuration: 30 })).rejects.toMatchObject({
        code: ErrorCode.VALIDATION,
        safeMeta: { threadId: '300', field: 'autoArchiveDuration' },
      });
      expect(deps.rest.editThread).not.toHaveBeenCalled();
    });
  });

  describe('membership and deletion', () => {
    it('delegates to the REST port', async () => {
      await service.join('300');
      await service.leave('300');
      await service.addUser('300', '2');
      await service.removeUser('300', '2');
      await service.delete('300');

      expect(deps.rest.joinThread).toHaveBeenCalledWith('300');
      expect(deps.rest.leaveThread).toHaveBeenCalledWith('300');
      expect(deps.rest.addThreadMember).toHaveBeenCalledWith('300', '2');
      expect(deps.rest.removeThreadMember).toHaveBeenCalledWith('300', '2');
      expect(deps.rest.deleteChannel).toHaveBeenCalledWith('300');
    });
  });

  describe('purge', () => {
    it('deletes in chunks of fifty while walking the history', async () => {
      const deletesAtPage: number[] = [];
      const rest: MessageRestPort = createHistoryRest(120, () => {
        deletesAtPage.push(vi.mocked(rest.deleteMessage).mock.calls.length);
      });
      deps = createMockDeps({ messages: new MessageService({ rest, generateNonce: () => '42' }) });
      service = new ThreadService(deps);

      const deleted = await service.purge('300', { limit: 120 });

      expect(deleted).toHaveLength(120);
      expect(deleted[0]?.id).toBe('120');
      expect(deletesAtPage).toEqual([0, 50]);
      expect(rest.deleteMessage).toHaveBeenCalledTimes(120);
      expect(rest.deleteMessage).toHaveBeenNthCalledWith(1, '300', '120');
    });

    it('only deletes messages passing the check', async () => {
      const rest = createHistoryRest(10);
      deps = createMockDeps({ messages: new MessageService({ rest, generateNonce: () => '42' }) });
      service = new ThreadService(deps);

      const deleted = await service.purge('300', { check: (m) => m.authorId === '1' });

      expect(deleted.map((m) => m.id)).toEqual(['10', '8', '6', '4', '2']);
      expect(rest.deleteMessage).toHaveBeenCalledTimes(5);
    });
  });

  describe('deleteMessages', () => {
    it('deletes one message at a time and does nothing for an empty list', async () => {
      const rest = createHistoryRest(0);
      deps = createMockDeps({ messages: new MessageService({ rest, generateNonce: () => '42' }) });
      service = new ThreadService(deps);

      await service.deleteMessages('300', []);
      expect(rest.deleteMessage).not.toHaveBeenCalled();

      await service.deleteMessages('300', ['5', '6']);
      expect(vi.mocked(rest.deleteMessage).mock.calls).toEqual([
        ['300', '5'],
        ['300', '6'],
      ]);
    });
  });
});
