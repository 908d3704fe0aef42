export type {
  Guild,
  Channel,
  Thread,
  ThreadMember,
  Member,
  Role,
  User,
  Message,
  EntityMap,
  EntityKind,
  GuildChildKind,
} from './entities';
export { GUILD_CHILD_KINDS, memberKey } from './entities';
export {
  tryChannelType,
  isChannelType,
  compareChannelTypes,
  type ChannelType,
  type ChannelTypeName,
} from './enums';
export {
  guildFromPayload,
  channelFromPayload,
  threadFromPayload,
  threadMemberFromPayload,
  memberFromPayload,
  roleFromPayload,
  userFromPayload,
  messageFromPayload,
} from './mappers';
export { EntityStore, type Diff } from './entity-store';
export { ThreadMemberStore } from './thread-members';
export { applyThreadMemberList } from './member-lists';
export {
  threadParent,
  threadOwner,
  threadCreatedAt,
  threadMention,
  isPrivateThread,
  isNewsThread,
  threadCategoryId,
  threadCategory,
  isNsfwThread,
  threadPermissionsFor,
  threadMemberGuildMember,
} from './thread';
export {
  Permission,
  ALL_PERMISSIONS,
  parsePermissions,
  hasPermission,
  memberPermissions,
  type PermissionName,
} from './permissions';
export type {
  ThreadRestPort,
  MessageRestPort,
  HistoryPageQuery,
  MemberListRequester,
  NotificationKind,
  EntitySnapshot,
  EntityNotification,
  NotificationSink,
} from './ports';
export { notifyDiff, notifyRemoval } from './notifications';
export {
  MessageService,
  type MessageServiceDeps,
  type HistoryOptions,
  type SendOptions,
  type HistoryBound,
} from './message-service';
export {
  messageableFor,
  type Sendable,
  type HistoryReadable,
  type Messageable,
} from './messageable';
export {
  ThreadService,
  PURGE_CHUNK_SIZE,
  type ThreadServiceDeps,
  type PurgeOptions,
} from './thread-service';
