/**
 * Redis Key Builder
 *
 * Centralized cache key generation. Services and the invalidation policy
 * never build key strings themselves.
 *
 * Key Format: `{domain}:{entity}:{id}`
 * Example: `chat:user_chats:5f0c...`
 */
export class RedisKeyBuilder {
  static readonly DOMAIN_CHAT = 'chat';
  static readonly DOMAIN_CONTACT = 'contact';

  // ============ CHAT KEYS ============

  /** Chat list of one user. Pattern: chat:user_chats:{userId} */
  static userChats(userId: string): string {
    return `${this.DOMAIN_CHAT}:user_chats:${userId}`;
  }

  /** Member list of one chat. Pattern: chat:members:{chatId} */
  static chatMembers(chatId: string): string {
    return `${this.DOMAIN_CHAT}:members:${chatId}`;
  }

  // ============ CONTACT KEYS ============

  /** Contact list of one owner. Pattern: contact:list:{ownerId} */
  static userContacts(ownerId: string): string {
    return `${this.DOMAIN_CONTACT}:list:${ownerId}`;
  }
}
