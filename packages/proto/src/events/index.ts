export * from './gateway';
export * from './guild';
export * from './channel';
export * from './member';
export * from './message';
export * from './user';
