const KNOWN_CHANNEL_TYPES = [
  { name: 'text', value: 0 },
  { name: 'private', value: 1 },
  { name: 'voice', value: 2 },
  { name: 'group', value: 3 },
  { name: 'category', value: 4 },
  { name: 'news', value: 5 },
  { name: 'store', value: 6 },
  { name: 'news_thread', value: 10 },
  { name: 'public_thread', value: 11 },
  { name: 'private_thread', value: 12 },
  { name: 'stage_voice', value: 13 },
] as const;

export type ChannelTypeName = (typeof KNOWN_CHANNEL_TYPES)[number]['name'];

/**
 * A channel type as the server sent it. Values this client does not know
 * about are kept as `unknown` with the raw number rather than rejected.
 */
export type ChannelType =
  | { kind: 'known'; name: ChannelTypeName; value: number }
  | { kind: 'unknown'; value: number };

const BY_VALUE = new Map<number, ChannelTypeName>(
  KNOWN_CHANNEL_TYPES.map((entry): [number, ChannelTypeName] => [entry.value, entry.name]),
);

export function tryChannelType(value: number): ChannelType {
  const name = BY_VALUE.get(value);
  return name === undefined ? { kind: 'unknown', value } : { kind: 'known', name, value };
}

export function isChannelType(type: ChannelType, name: ChannelTypeName): boolean {
  return type.kind === 'known' && type.name === name;
}

/** Orders by raw value, so unknown values sort among the known ones. */
export function compareChannelTypes(a: ChannelType, b: ChannelType): number {
  return a.value - b.value;
}
