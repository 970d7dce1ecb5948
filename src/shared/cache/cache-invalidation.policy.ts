import { RedisKeyBuilder } from '../redis/redis-key-builder';

/**
 * Which cache entries each kind of mutation makes stale.
 *
 * Services evict the returned keys after their transaction commits and
 * before they publish the resulting event.
 */
export const CacheInvalidationPolicy = {
  /** Chat created: every initial member gained a chat. */
  chatCreated(memberIds: readonly string[]): string[] {
    return memberIds.map((id) => RedisKeyBuilder.userChats(id));
  },

  /**
   * Members added, removed or re-roled. `affectedUserIds` must hold the
   * remaining members and any removed ones.
   */
  membershipChanged(chatId: string, affectedUserIds: readonly string[]): string[] {
    return [
      RedisKeyBuilder.chatMembers(chatId),
      ...affectedUserIds.map((id) => RedisKeyBuilder.userChats(id)),
    ];
  },

  /** Group name or image changed: only the chat lists embed them. */
  chatPropertiesChanged(memberIds: readonly string[]): string[] {
    return memberIds.map((id) => RedisKeyBuilder.userChats(id));
  },

  /** Contact rows or a contact's phone number changed. */
  contactsChanged(ownerIds: readonly string[]): string[] {
    return ownerIds.map((id) => RedisKeyBuilder.userContacts(id));
  },
} as const;
