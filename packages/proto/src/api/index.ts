export * from './message';
export * from './thread';
export * from './errors';
