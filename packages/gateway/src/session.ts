import {
  FATAL_CLOSE_CODES,
  GatewayCloseCode,
  GatewayOpcode,
  HelloPayload,
  InvalidSessionPayload,
  READY,
  RESUMED,
  ReadyPayload,
  SESSION_INVALIDATING_CLOSE_CODES,
  THREAD_MEMBER_LIST_UPDATE,
  ThreadMemberListUpdatePayload,
  buildIdentify,
  createFrame,
  decodeFrame,
  encodeFrame,
  isDispatchFrame,
  type GuildSubscribePayload,
  type IdentifyProperties,
  type ResumePayload,
  type ThreadMemberListUpdate,
} from '@relaycord/proto';
import { type EntityStore, type MemberListRequester } from '@relaycord/domain';
import { InvalidSessionError, TransportError, createLogger, errMessage } from '@relaycord/shared';
import { computeBackoff, invalidSessionDelay } from './backoff';
import { type Dispatcher } from './dispatcher';
import { Heartbeat } from './heartbeat';
import { type PendingRequests } from './pending-requests';
import { SendLimiter } from './rate-limiter';
import { type GatewaySocket, type SocketConnector, wsConnector } from './transport';

const logger = createLogger({ name: 'gateway:session' });

export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'identifying'
  | 'ready'
  | 'resuming'
  | 'reconnecting';

export type StateListener = (next: SessionState, previous: SessionState) => void;

export interface GatewaySessionOptions {
  url: string;
  token: string;
  properties: IdentifyProperties;
  store: EntityStore;
  dispatcher: Dispatcher;
  pending: PendingRequests;
  connector?: SocketConnector;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  sendLimitPerMinute?: number;
  random?: () => number;
}

/**
 * One gateway connection and its lifecycle. Transport failures never reach
 * callers: the session logs them and reconnects, resuming when the server
 * still holds the session and identifying from scratch otherwise.
 */
export class GatewaySession implements MemberListRequester {
  private current: SessionState = 'disconnected';
  private socket: GatewaySocket | null = null;
  /** Bumped on every new socket so late callbacks from a dead one are ignored. */
  private generation = 0;
  private heartbeat: Heartbeat | null = null;
  private sessionId: string | null = null;
  private resumeUrl: string | null = null;
  private attempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private identifyTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly limiter: SendLimiter;
  private readonly connector: SocketConnector;
  private readonly random: () => number;
  private readonly stateListeners = new Set<StateListener>();

  constructor(private readonly options: GatewaySessionOptions) {
    this.connector = options.connector ?? wsConnector;
    this.random = options.random ?? Math.random;
    this.limiter = new SendLimiter(options.sendLimitPerMinute ?? 120, 60_000, () => Date.now());

    options.dispatcher.on(READY, (payload) => this.onReady(payload));
    options.dispatcher.on(RESUMED, () => this.onResumed());
  }

  get state(): SessionState {
    return this.current;
  }

  /** Round-trip of the last acknowledged heartbeat, in milliseconds. */
  get latency(): number | null {
    return this.heartbeat?.latency ?? null;
  }

  get resumable(): boolean {
    return this.sessionId !== null;
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  connect(): void {
    if (this.current !== 'disconnected') return;
    this.attempts = 0;
    this.open(this.options.url, 'connecting');
  }

  /** Closes for good; pending gateway requests are rejected. */
  close(): void {
    this.clearTimers();
    const socket = this.detach();
    socket?.close(GatewayCloseCode.NORMAL, 'Client closing');
    this.forgetSession();
    this.setState('disconnected');
    this.options.pending.rejectAll(new TransportError('Session closed'));
  }

  requestThreadMemberList(
    guildId: string,
    threadId: string,
    timeoutMs: number,
  ): Promise<ThreadMemberListUpdate> {
    const response = this.options.pending.wait(
      THREAD_MEMBER_LIST_UPDATE,
      ThreadMemberListUpdatePayload,
      (update) => update.thread_id === threadId,
      timeoutMs,
    );
    const subscribe: GuildSubscribePayload = { guild_id: guildId, thread_member_lists: [threadId] };
    this.send(GatewayOpcode.GUILD_SUBSCRIBE, subscribe);
    return response;
  }

  private open(url: string, state: SessionState): void {
    const generation = ++this.generation;
    this.setState(state);
    logger.info({ url, generation }, 'Opening gateway connection');
    const live = () => generation === this.generation;
    this.socket = this.connector(url, {
      onOpen: () => {
        if (live()) logger.debug({ generation }, 'Gateway socket open');
      },
      onMessage: (data) => {
        if (live()) this.onFrame(data);
      },
      onClose: (code, reason) => {
        if (live()) this.onClose(code, reason);
      },
      onError: (err) => {
        if (live()) logger.warn({ generation, err: errMessage(err) }, 'Gateway socket error');
      },
    });
  }

  private onFrame(data: string): void {
    const frame = decodeFrame(data);
    if (!frame) {
      logger.warn({ length: data.length }, 'Ignoring undecodable gateway frame');
      return;
    }

    switch (frame.op) {
      case GatewayOpcode.DISPATCH:
        if (isDispatchFrame(frame)) {
          this.options.dispatcher.dispatch(frame.t, frame.s ?? null, frame.d);
        }
        return;
      case GatewayOpcode.HELLO:
        this.onHello(frame.d);
        return;
      case GatewayOpcode.HEARTBEAT:
        this.heartbeat?.beatNow();
        return;
      case GatewayOpcode.HEARTBEAT_ACK:
        this.heartbeat?.ack();
        return;
      case GatewayOpcode.RECONNECT:
        logger.info({}, 'Server requested reconnect');
        this.dropConnection('Reconnect requested');
        return;
      case GatewayOpcode.INVALID_SESSION:
        this.onInvalidSession(InvalidSessionPayload.parse(frame.d));
        return;
      default:
        logger.debug({ op: frame.op }, 'Ignoring gateway opcode');
    }
  }

  private onHello(data: unknown): void {
    const parsed = HelloPayload.safeParse(data);
    if (!parsed.success) {
      logger.warn({}, 'Malformed HELLO, reconnecting');
      this.dropConnection('Malformed hello');
      return;
    }

    this.heartbeat?.stop();
    this.heartbeat = new Heartbeat({
      intervalMs: parsed.data.heartbeat_interval,
      random: this.random,
      send: () => this.sendNow(GatewayOpcode.HEARTBEAT, this.options.dispatcher.sequence),
      onZombie: () => {
        logger.warn({ missedAcks: this.heartbeat?.missedAcks ?? 0 }, 'Heartbeat not acknowledged, reconnecting');
        this.dropConnection('Zombie connection');
      },
    });
    this.heartbeat.start();

    if (this.current === 'reconnecting' && this.sessionId !== null) {
      this.resume();
    } else {
      this.identify();
    }
  }

  private onReady(payload: unknown): void {
    const parsed = ReadyPayload.safeParse(payload);
    if (!parsed.success) return;
    this.sessionId = parsed.data.session_id;
    this.resumeUrl = parsed.data.resume_gateway_url ?? null;
    this.attempts = 0;
    logger.info({ userId: parsed.data.user.id, guilds: parsed.data.guilds.length }, 'Session ready');
    this.setState('ready');
  }

  private onResumed(): void {
    this.attempts = 0;
    logger.info({ sequence: this.options.dispatcher.sequence }, 'Session resumed');
    this.setState('ready');
  }

  private onInvalidSession(resumable: boolean): void {
    if (resumable && this.sessionId !== null) {
      logger.info({}, 'Session invalidated but resumable, resuming');
      this.resume();
      return;
    }

    const err = new InvalidSessionError('Session invalidated by server');
    logger.warn(err.toJSON(), 'Re-identifying');
    this.forgetSession();
    this.options.dispatcher.reset();
    this.options.store.clear();
    this.setState('identifying');
    if (this.identifyTimer) clearTimeout(this.identifyTimer);
    this.identifyTimer = setTimeout(() => {
      this.identifyTimer = null;
      this.identify();
    }, invalidSessionDelay(this.random));
  }

  private onClose(code: number, reason: string): void {
    this.detach();

    if (FATAL_CLOSE_CODES.has(code)) {
      logger.error({ code, reason }, 'Gateway closed with a fatal code');
      this.clearTimers();
      this.forgetSession();
      this.setState('disconnected');
      this.options.pending.rejectAll(new TransportError(`Gateway closed with code ${code}`, { code }));
      return;
    }

    if (SESSION_INVALIDATING_CLOSE_CODES.has(code)) {
      this.forgetSession();
    }
    logger.warn({ code, reason, resumable: this.resumable }, 'Gateway connection closed');
    this.scheduleReconnect();
  }

  /** A new session starts from the configured URL; the resume URL belongs to the old one. */
  private forgetSession(): void {
    this.sessionId = null;
    this.resumeUrl = null;
  }

  private identify(): void {
    this.options.dispatcher.reset();
    this.setState('identifying');
    this.send(GatewayOpcode.IDENTIFY, buildIdentify(this.options.token, this.options.properties));
  }

  private resume(): void {
    if (this.sessionId === null) return;
    const payload: ResumePayload = {
      token: this.options.token,
      session_id: this.sessionId,
      seq: this.options.dispatcher.sequence,
    };
    this.setState('resuming');
    this.send(GatewayOpcode.RESUME, payload);
  }

  /** Abandons the current socket (its close event is ignored) and reconnects. */
  private dropConnection(reason: string): void {
    const socket = this.detach();
    socket?.close(GatewayCloseCode.UNKNOWN_ERROR, reason);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    const delay = computeBackoff(
      this.attempts,
      this.options.reconnectBaseMs ?? 1000,
      this.options.reconnectMaxMs ?? 60_000,
      this.random,
    );
    this.attempts += 1;
    this.setState('reconnecting');
    logger.info({ delay, attempt: this.attempts }, 'Scheduling reconnect');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open(this.resumeUrl ?? this.options.url, 'reconnecting');
    }, delay);
  }

  private detach(): GatewaySocket | null {
    const socket = this.socket;
    this.generation += 1;
    this.socket = null;
    this.heartbeat?.stop();
    this.limiter.clear();
    if (this.identifyTimer) {
      clearTimeout(this.identifyTimer);
      this.identifyTimer = null;
    }
    return socket;
  }

  private clearTimers(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.identifyTimer) {
      clearTimeout(this.identifyTimer);
      this.identifyTimer = null;
    }
  }

  private send(op: number, d: unknown): void {
    this.limiter.run(() => this.sendNow(op, d));
  }

  /** Bypasses the send limiter; heartbeats must never queue. */
  private sendNow(op: number, d: unknown): void {
    if (!this.socket) return;
    this.socket.send(encodeFrame(createFrame(op, d)));
  }

  private setState(next: SessionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    logger.debug({ from: previous, to: next }, 'Session state change');
    for (const listener of [...this.stateListeners]) {
      listener(next, previous);
    }
  }
}
