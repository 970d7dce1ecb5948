/**
 * Chat Repository Interface
 *
 * Chats and their member rows. Every method runs inside the caller's
 * transaction when one is active (see TransactionHost).
 */

import type { ChatType, MemberRole } from '../../../common/enums/chat.enums';
import type { UserRecord } from '../../users/repositories';

export const CHAT_REPOSITORY = Symbol('CHAT_REPOSITORY');

export interface ChatRecord {
  id: string;
  type: ChatType;
  groupName: string | null;
  groupImage: string | null;
  isDeleted: boolean;
  createdAt: Date;
  deletedAt: Date | null;
}

export interface MemberRecord {
  id: string;
  chatId: string;
  userId: string;
  role: MemberRole;
  joinedAt: Date;
}

export interface MemberWithUser extends MemberRecord {
  user: UserRecord;
}

export interface MemberWithChat extends MemberRecord {
  chat: ChatRecord;
}

export interface NewChat {
  type: ChatType;
  groupName: string | null;
  groupImage: string | null;
}

export interface NewMember {
  userId: string;
  role: MemberRole;
}

export interface ChatPropertiesPatch {
  groupName?: string;
  groupImage?: string;
}

export interface IChatRepository {
  findChatById(chatId: string): Promise<ChatRecord | null>;

  /**
   * Reads the chat row and locks it until the current transaction ends.
   * Membership mutations of one chat take this lock first, so their
   * admin checks and admin counts cannot interleave.
   */
  lockChat(chatId: string): Promise<ChatRecord | null>;

  createChat(chat: NewChat): Promise<ChatRecord>;

  updateChat(chatId: string, patch: ChatPropertiesPatch): Promise<ChatRecord>;

  findMembership(chatId: string, userId: string): Promise<MemberRecord | null>;

  /**
   * All members of the given chats with their user attached, in one query.
   * Ordered by join time.
   */
  findMembersByChatIds(chatIds: readonly string[]): Promise<MemberWithUser[]>;

  /**
   * The user's memberships with their chat attached, in one query.
   * Deleted chats are excluded.
   */
  findMembershipsByUser(userId: string): Promise<MemberWithChat[]>;

  findMembersByChatIdAndUserIds(
    chatId: string,
    userIds: readonly string[],
  ): Promise<MemberWithUser[]>;

  /**
   * Insert-or-ignore on (chatId, userId).
   * @returns only the rows actually inserted
   */
  insertMembers(
    chatId: string,
    members: readonly NewMember[],
  ): Promise<MemberRecord[]>;

  updateMemberRole(chatId: string, userId: string, role: MemberRole): Promise<void>;

  countAdmins(chatId: string): Promise<number>;

  /** @returns number of rows removed */
  deleteMembers(chatId: string, userIds: readonly string[]): Promise<number>;
}
