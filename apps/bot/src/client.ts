import { type ClientConfig, SnowflakeGenerator } from '@relaycord/shared';
import {
  EntityStore,
  MessageService,
  ThreadService,
  type NotificationSink,
} from '@relaycord/domain';
import {
  BucketManager,
  FetchTransport,
  MessageEndpoints,
  RestClient,
  ThreadEndpoints,
  type RestTransport,
} from '@relaycord/rest';
import {
  Dispatcher,
  GatewaySession,
  PendingRequests,
  createDefaultHandlers,
  type SocketConnector,
} from '@relaycord/gateway';

export interface ClientOverrides {
  connector?: SocketConnector;
  transport?: RestTransport;
  sink?: NotificationSink;
  random?: () => number;
}

export interface RelayClient {
  store: EntityStore;
  rest: RestClient;
  messages: MessageService;
  threads: ThreadService;
  dispatcher: Dispatcher;
  session: GatewaySession;
}

/** Wires the cache, REST stack and gateway session around one token. */
export function createClient(config: ClientConfig, overrides: ClientOverrides = {}): RelayClient {
  const store = new EntityStore();
  const rest = new RestClient({
    token: config.DISCORD_TOKEN,
    baseUrl: config.API_BASE_URL,
    transport: overrides.transport ?? new FetchTransport(),
    buckets: new BucketManager(),
    maxRetries: config.REST_MAX_RETRIES,
    autoRetry: config.REST_AUTO_RETRY,
  });

  const nonces = new SnowflakeGenerator();
  const messages = new MessageService({
    rest: new MessageEndpoints(rest),
    generateNonce: () => nonces.generate(),
    store,
  });

  const pending = new PendingRequests();
  const dispatcher = new Dispatcher({
    store,
    pending,
    handlers: createDefaultHandlers(),
    sink: overrides.sink,
  });
  const session = new GatewaySession({
    url: config.GATEWAY_URL,
    token: config.DISCORD_TOKEN,
    properties: { os: config.CLIENT_OS, browser: config.CLIENT_BROWSER, device: '' },
    store,
    dispatcher,
    pending,
    connector: overrides.connector,
    reconnectBaseMs: config.GATEWAY_RECONNECT_BASE_MS,
    reconnectMaxMs: config.GATEWAY_RECONNECT_MAX_MS,
    sendLimitPerMinute: config.GATEWAY_SEND_LIMIT_PER_MINUTE,
    random: overrides.random,
  });

  const threads = new ThreadService({
    store,
    rest: new ThreadEndpoints(rest),
    messages,
    memberLists: session,
    memberFetchTimeoutMs: config.MEMBER_FETCH_TIMEOUT_MS,
    sink: overrides.sink,
  });

  return { store, rest, messages, threads, dispatcher, session };
}
