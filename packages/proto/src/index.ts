export {
  GatewayFrameSchema,
  createFrame,
  encodeFrame,
  decodeFrame,
  isDispatchFrame,
  type GatewayFrame,
  type DispatchFrame,
} from './envelope';
export {
  GatewayOpcode,
  GatewayCloseCode,
  FATAL_CLOSE_CODES,
  SESSION_INVALIDATING_CLOSE_CODES,
  type GatewayOpcodeValue,
} from './opcodes';
export * from './events';
export * from './api';
