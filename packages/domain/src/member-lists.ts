import { type ThreadMemberListUpdate } from '@relaycord/proto';
import { type ThreadMember, memberKey } from './entities';
import { type EntityStore } from './entity-store';
import { memberFromPayload, threadMemberFromPayload, userFromPayload } from './mappers';

/**
 * Merges a lazy member list into the store, overwriting existing entries by
 * user id. Guild members and users carried alongside are upserted too. The
 * local user's entry is skipped; its slot only changes through membership
 * events. Returns the thread members that were stored.
 */
export function applyThreadMemberList(
  store: EntityStore,
  update: ThreadMemberListUpdate,
): ThreadMember[] {
  const stored: ThreadMember[] = [];
  for (const payload of update.members) {
    const member = threadMemberFromPayload(payload, {
      threadId: update.thread_id,
      selfUserId: store.selfUserId,
    });
    if (!member) continue;

    const guildMember = payload.member ? memberFromPayload(update.guild_id, payload.member) : null;
    if (guildMember && payload.member?.user) {
      store.upsert('user', payload.member.user.id, userFromPayload(payload.member.user));
      store.upsert('member', memberKey(update.guild_id, payload.member.user.id), guildMember);
    }

    if (store.threadMembers.addMember(member)) {
      stored.push(member);
    }
  }
  return stored;
}
