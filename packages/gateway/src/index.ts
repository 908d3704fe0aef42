export {
  GatewaySession,
  type GatewaySessionOptions,
  type SessionState,
  type StateListener,
} from './session';
export {
  Dispatcher,
  defineHandler,
  SILENT_SINK,
  type DispatcherDeps,
  type DispatchListener,
  type DroppedDispatch,
  type EventHandler,
  type HandlerContext,
  type HandlerTable,
} from './dispatcher';
export { createDefaultHandlers, applyGuildPayload, upsertThreadPayload } from './handlers';
export { PendingRequests } from './pending-requests';
export { Heartbeat, type HeartbeatOptions } from './heartbeat';
export { SendLimiter } from './rate-limiter';
export { computeBackoff, invalidSessionDelay } from './backoff';
export {
  wsConnector,
  type GatewaySocket,
  type SocketConnector,
  type SocketHandlers,
} from './transport';
