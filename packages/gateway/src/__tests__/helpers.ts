import { EntityStore, type EntityNotification } from '@relaycord/domain';
import { decodeFrame, type GatewayFrame } from '@relaycord/proto';
import { Dispatcher, type DroppedDispatch } from '../dispatcher';
import { createDefaultHandlers } from '../handlers';
import { PendingRequests } from '../pending-requests';
import { GatewaySession, type GatewaySessionOptions, type SessionState } from '../session';
import { type GatewaySocket, type SocketConnector, type SocketHandlers } from '../transport';

/** In-process stand-in for a gateway connection; the test plays the server. */
export class FakeSocket implements GatewaySocket {
  readonly sent: GatewayFrame[] = [];
  closed: { code: number; reason?: string } | null = null;

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers,
  ) {}

  send(data: string): void {
    const frame = decodeFrame(data);
    if (frame) this.sent.push(frame);
  }

  close(code: number, reason?: string): void {
    this.closed = { code, reason };
  }

  ops(): number[] {
    return this.sent.map((frame) => frame.op);
  }

  lastSent(): GatewayFrame | undefined {
    return this.sent[this.sent.length - 1];
  }

  receive(op: number, d: unknown = null): void {
    this.handlers.onMessage(JSON.stringify({ op, d }));
  }

  hello(heartbeatInterval = 41250): void {
    this.receive(10, { heartbeat_interval: heartbeatInterval });
  }

  dispatch(t: string, s: number, d: unknown): void {
    this.handlers.onMessage(JSON.stringify({ op: 0, t, s, d }));
  }

  serverClose(code: number, reason = ''): void {
    this.handlers.onClose(code, reason);
  }
}

export function createFakeConnector() {
  const sockets: FakeSocket[] = [];
  const connector: SocketConnector = (url, handlers) => {
    const socket = new FakeSocket(url, handlers);
    sockets.push(socket);
    return socket;
  };
  const latest = (): FakeSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('No socket opened yet');
    return socket;
  };
  return { sockets, connector, latest };
}

export const SELF_ID = '100';

export function readyPayload(sessionId = 'session-1') {
  return {
    session_id: sessionId,
    resume_gateway_url: 'wss://resume.test',
    user: { id: SELF_ID, username: 'self' },
    guilds: [
      {
        id: '1',
        name: 'Guild',
        channels: [{ id: '10', type: 0, name: 'general' }],
        threads: [
          {
            id: '20',
            type: 11,
            guild_id: '1',
            parent_id: '10',
            name: 'bugs',
            thread_metadata: { archived: false },
          },
        ],
      },
    ],
  };
}

export function createHarness(overrides: Partial<GatewaySessionOptions> = {}) {
  const store = new EntityStore();
  const pending = new PendingRequests();
  const drops: DroppedDispatch[] = [];
  const notifications: EntityNotification[] = [];
  const dispatcher = new Dispatcher({
    store,
    pending,
    handlers: createDefaultHandlers(),
    sink: { notify: (n) => notifications.push(n) },
    onDrop: (dropped) => drops.push(dropped),
  });
  const fake = createFakeConnector();
  const session = new GatewaySession({
    url: 'wss://gateway.test',
    token: 'test-token',
    properties: { os: 'Linux', browser: 'Chrome', device: '' },
    store,
    dispatcher,
    pending,
    connector: fake.connector,
    reconnectBaseMs: 1000,
    reconnectMaxMs: 60000,
    random: () => 0.5,
    ...overrides,
  });
  const states: SessionState[] = [];
  session.onStateChange((next) => states.push(next));
  return { store, pending, dispatcher, session, drops, notifications, states, ...fake };
}

/** Connects and completes HELLO, IDENTIFY and READY on the first socket. */
export function connectReady(harness: ReturnType<typeof createHarness>, heartbeatInterval = 41250): FakeSocket {
  harness.session.connect();
  const socket = harness.latest();
  socket.hello(heartbeatInterval);
  socket.dispatch('READY', 1, readyPayload());
  return socket;
}

