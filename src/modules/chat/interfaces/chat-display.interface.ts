import type { ChatType, MemberRole } from '../../../common/enums/chat.enums';

/** Display-safe projections. None of them carries credentials. */

export interface MemberDisplay {
  userId: string;
  username: string;
  role: MemberRole;
}

export interface ChatDisplay {
  chatId: string;
  chatType: ChatType;
  groupName: string | null;
  groupImage: string | null;
  members: MemberDisplay[];
}

export type MemberUpdateType = 'MEMBER_ADDED' | 'MEMBER_REMOVED' | 'ROLE_UPDATED';

export interface MemberUpdate {
  chatId: string;
  updatedMembers: MemberDisplay[];
  updateType: MemberUpdateType;
}
