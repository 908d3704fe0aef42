import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MessageService, ThreadService, type ThreadRestPort } from '@relaycord/domain';
import { type ChannelPayload } from '@relaycord/proto';
import { ProtocolTimeoutError } from '@relaycord/shared';
import { connectReady, createHarness, readyPayload } from './helpers';

function createThreadService(
  harness: ReturnType<typeof createHarness>,
  edited: (threadId: string) => ChannelPayload = (threadId) => ({ id: threadId }),
): ThreadService {
  const rest: ThreadRestPort = {
    joinThread: vi.fn(async () => {}),
    leaveThread: vi.fn(async () => {}),
    addThreadMember: vi.fn(async () => {}),
    removeThreadMember: vi.fn(async () => {}),
    deleteChannel: vi.fn(async () => {}),
    editThread: vi.fn(async (threadId: string) => edited(threadId)),
  };
  const messages = new MessageService({
    rest: {
      createMessage: vi.fn(async () => ({ id: '1', channel_id: '20', author: { id: '100', username: 'self' }, content: '' })),
      listMessages: vi.fn(async () => []),
      deleteMessage: vi.fn(async () => {}),
    },
    generateNonce: () => '1',
  });
  return new ThreadService({
    store: harness.store,
    rest,
    messages,
    memberLists: harness.session,
    memberFetchTimeoutMs: 15000,
    sink: { notify: (notification) => harness.notifications.push(notification) },
  });
}

describe('GatewaySession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('identify', () => {
    it('identifies after HELLO and becomes ready on READY', () => {
      const h = createHarness();
      const socket = connectReady(h);

      expect(socket.url).toBe('wss://gateway.test');
      expect(socket.sent[0]).toMatchObject({
        op: 2,
        d: { token: 'test-token', properties: { os: 'Linux', browser: 'Chrome', device: '' } },
      });
      expect(h.states).toEqual(['connecting', 'identifying', 'ready']);
      expect(h.store.selfUserId).toBe('100');
      expect(h.store.get('guild', '1')?.name).toBe('Guild');
      expect(h.store.get('thread', '20')?.parentId).toBe('10');
    });

    it('ignores a second connect while already connected', () => {
      const h = createHarness();
      connectReady(h);
      h.session.connect();
      expect(h.sockets).toHaveLength(1);
    });
  });

  describe('reconnect', () => {
    it('resumes after a transport drop and leaves the store untouched', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      const channel = h.store.get('channel', '10');
      const thread = h.store.get('thread', '20');

      socket.serverClose(1006, 'abnormal closure');
      expect(h.session.state).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(749);
      expect(h.sockets).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);

      const next = h.latest();
      expect(next.url).toBe('wss://resume.test');
      next.hello();
      expect(next.sent[0]).toEqual({
        op: 6,
        d: { token: 'test-token', session_id: 'session-1', seq: 1 },
      });
      expect(h.session.state).toBe('resuming');

      next.dispatch('GUILD_UPDATE', 2, { id: '1', name: 'Renamed' });
      next.dispatch('RESUMED', 3, null);

      expect(h.states).toEqual(['connecting', 'identifying', 'ready', 'reconnecting', 'resuming', 'ready']);
      expect(h.store.get('channel', '10')).toBe(channel);
      expect(h.store.get('thread', '20')).toBe(thread);
      expect(h.store.get('guild', '1')?.name).toBe('Renamed');
    });

    it('clears the store and re-identifies when the resume is rejected', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      socket.serverClose(1006);
      await vi.advanceTimersByTimeAsync(750);
      const next = h.latest();
      next.hello();

      next.receive(9, false);
      expect(h.session.state).toBe('identifying');
      expect(h.store.size('guild')).toBe(0);
      expect(h.store.get('thread', '20')).toBeNull();
      expect(h.dispatcher.sequence).toBeNull();

      await vi.advanceTimersByTimeAsync(2999);
      expect(next.ops()).toEqual([6]);
      await vi.advanceTimersByTimeAsync(1);
      expect(next.ops()).toEqual([6, 2]);

      next.dispatch('READY', 1, readyPayload('session-2'));
      expect(h.session.state).toBe('ready');
      expect(h.store.get('guild', '1')?.name).toBe('Guild');
      expect(h.store.get('thread', '20')?.name).toBe('bugs');
    });

    it('reconnects to the configured URL once the session is invalidated', async () => {
      const h = createHarness();
      connectReady(h).serverClose(1006);
      await vi.advanceTimersByTimeAsync(750);
      const resumed = h.latest();
      expect(resumed.url).toBe('wss://resume.test');
      resumed.hello();
      resumed.receive(9, false);

      resumed.serverClose(1006);
      await vi.advanceTimersByTimeAsync(1500);

      expect(h.sockets).toHaveLength(3);
      expect(h.latest().url).toBe('wss://gateway.test');
    });

    it('re-sends RESUME when the invalidated session is resumable', () => {
      const h = createHarness();
      const socket = connectReady(h);
      socket.receive(9, true);
      expect(socket.lastSent()).toEqual({
        op: 6,
        d: { token: 'test-token', session_id: 'session-1', seq: 1 },
      });
      expect(h.session.state).toBe('resuming');
    });

    it('identifies on the next connection after a session-invalidating close code', async () => {
      const h = createHarness();
      connectReady(h).serverClose(4009, 'Session timed out');
      await vi.advanceTimersByTimeAsync(750);
      const next = h.latest();
      expect(next.url).toBe('wss://gateway.test');
      next.hello();
      expect(next.ops()).toEqual([2]);
      expect(h.session.state).toBe('identifying');
    });

    it('reconnects when the server sends RECONNECT and ignores the old socket afterwards', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      socket.receive(7);
      expect(socket.closed).toEqual({ code: 4000, reason: 'Reconnect requested' });
      expect(h.session.state).toBe('reconnecting');

      socket.serverClose(4000);
      await vi.advanceTimersByTimeAsync(750);
      expect(h.sockets).toHaveLength(2);
      expect(h.session.state).toBe('reconnecting');
    });

    it('backs off exponentially between failed attempts', async () => {
      const h = createHarness();
      h.session.connect();
      h.latest().serverClose(1006);
      await vi.advanceTimersByTimeAsync(750);
      expect(h.sockets).toHaveLength(2);
      expect(h.latest().url).toBe('wss://gateway.test');

      h.latest().serverClose(1006);
      await vi.advanceTimersByTimeAsync(1499);
      expect(h.sockets).toHaveLength(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(h.sockets).toHaveLength(3);
    });

    it('stops for good on a fatal close code and rejects pending requests', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      const waiting = h.session.requestThreadMemberList('1', '20', 15000);
      const assertion = expect(waiting).rejects.toMatchObject({ code: 'TRANSPORT' });

      socket.serverClose(4004, 'Authentication failed');
      await assertion;
      expect(h.session.state).toBe('disconnected');

      await vi.advanceTimersByTimeAsync(120000);
      expect(h.sockets).toHaveLength(1);
    });
  });

  describe('heartbeat', () => {
    it('sends the last sequence and measures latency from the ack', async () => {
      const h = createHarness();
      const socket = connectReady(h, 1000);

      await vi.advanceTimersByTimeAsync(500);
      expect(socket.lastSent()).toEqual({ op: 1, d: 1 });

      await vi.advanceTimersByTimeAsync(40);
      socket.receive(11);
      expect(h.session.latency).toBe(40);
    });

    it('beats immediately when the server asks for one', () => {
      const h = createHarness();
      const socket = connectReady(h);
      socket.receive(1);
      expect(socket.ops()).toEqual([2, 1]);
    });

    it('treats two missed acks as a dead connection', async () => {
      const h = createHarness();
      const socket = connectReady(h, 1000);

      await vi.advanceTimersByTimeAsync(500);
      await vi.advanceTimersByTimeAsync(1000);
      expect(socket.ops()).toEqual([2, 1, 1]);
      expect(socket.closed).toBeNull();

      await vi.advanceTimersByTimeAsync(1000);
      expect(socket.closed).toEqual({ code: 4000, reason: 'Zombie connection' });
      expect(h.session.state).toBe('reconnecting');
    });
  });

  describe('thread member lists', () => {
    it('fails with a protocol timeout and leaves the member map unchanged', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      socket.dispatch('THREAD_MEMBERS_UPDATE', 2, {
        id: '20',
        guild_id: '1',
        member_count: 1,
        added_members: [{ id: '20', user_id: '300' }],
      });
      const before = h.store.threadMembers.list('20');
      const threads = createThreadService(h);

      const result = threads.fetchMembers('20');
      const assertion = expect(result).rejects.toMatchObject({
        code: 'PROTOCOL_TIMEOUT',
        message: 'Server did not respond with members',
      });
      expect(socket.lastSent()).toEqual({ op: 14, d: { guild_id: '1', thread_member_lists: ['20'] } });

      await vi.advanceTimersByTimeAsync(15000);
      await assertion;
      await expect(result).rejects.toBeInstanceOf(ProtocolTimeoutError);
      expect(h.store.threadMembers.list('20')).toEqual(before);
      expect(before).toEqual([{ userId: '300', threadId: '20', joinedAt: null, flags: null }]);
      expect(h.pending.size).toBe(0);
    });

    it('resolves with the members from the matching list update', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      const threads = createThreadService(h);

      const result = threads.fetchMembers('20');
      socket.dispatch('THREAD_MEMBER_LIST_UPDATE', 2, {
        guild_id: '1',
        thread_id: '20',
        members: [
          { user_id: '300' },
          { user_id: '301', member: { user: { id: '301', username: 'other' }, nick: 'o' } },
          { user_id: '100' },
        ],
      });

      await expect(result).resolves.toEqual([
        { userId: '300', threadId: '20', joinedAt: null, flags: null },
        { userId: '301', threadId: '20', joinedAt: null, flags: null },
      ]);
      expect(h.store.get('member', '1:301')?.nick).toBe('o');
    });
  });

  describe('thread edits', () => {
    it('reports an edit once when the gateway echoes it back', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      const renamed: ChannelPayload = {
        id: '20',
        type: 11,
        guild_id: '1',
        parent_id: '10',
        name: 'renamed',
        thread_metadata: { archived: false },
      };
      const threads = createThreadService(h, () => renamed);

      await threads.edit('20', { name: 'renamed' });
      socket.dispatch('THREAD_UPDATE', 2, renamed);

      const threadNotifications = h.notifications.filter((n) => n.kind === 'thread');
      expect(threadNotifications).toHaveLength(1);
      expect(threadNotifications[0]).toMatchObject({
        event: 'THREAD_UPDATE',
        id: '20',
        before: { name: 'bugs' },
        after: { name: 'renamed' },
      });
      expect(h.store.get('thread', '20')?.name).toBe('renamed');
    });
  });

  describe('send limiter', () => {
    it('queues frames over the budget but never heartbeats', async () => {
      const h = createHarness({ sendLimitPerMinute: 1 });
      const socket = connectReady(h);
      const waiting = h.session.requestThreadMemberList('1', '20', 120000);
      expect(socket.ops()).toEqual([2]);

      await vi.advanceTimersByTimeAsync(20625);
      expect(socket.ops()).toEqual([2, 1]);

      await vi.advanceTimersByTimeAsync(60000 - 20625);
      expect(socket.ops()).toEqual([2, 1, 14]);

      socket.dispatch('THREAD_MEMBER_LIST_UPDATE', 2, { guild_id: '1', thread_id: '20', members: [] });
      await expect(waiting).resolves.toMatchObject({ thread_id: '20' });
    });
  });

  describe('close', () => {
    it('closes the socket and rejects pending requests', async () => {
      const h = createHarness();
      const socket = connectReady(h);
      const waiting = h.session.requestThreadMemberList('1', '20', 15000);
      const assertion = expect(waiting).rejects.toMatchObject({ code: 'TRANSPORT', message: 'Session closed' });

      h.session.close();
      await assertion;
      expect(socket.closed).toEqual({ code: 1000, reason: 'Client closing' });
      expect(h.session.state).toBe('disconnected');
    });
  });
});
