import type {
  ChatRecord,
  MemberWithUser,
} from '../repositories/chat.repository.interface';
import type {
  ChatDisplay,
  MemberDisplay,
} from '../interfaces/chat-display.interface';

export function toMemberDisplay(member: MemberWithUser): MemberDisplay {
  return {
    userId: member.userId,
    username: member.user.username,
    role: member.role,
  };
}

export function toChatDisplay(
  chat: ChatRecord,
  members: readonly MemberWithUser[],
): ChatDisplay {
  return {
    chatId: chat.id,
    chatType: chat.type,
    groupName: chat.groupName,
    groupImage: chat.groupImage,
    members: members.map(toMemberDisplay),
  };
}

/**
 * Groups a flat member list by chat id, keeping the input order per chat.
 */
export function groupMembersByChat(
  members: readonly MemberWithUser[],
): Map<string, MemberWithUser[]> {
  const byChat = new Map<string, MemberWithUser[]>();
  for (const member of members) {
    const bucket = byChat.get(member.chatId);
    if (bucket) {
      bucket.push(member);
    } else {
      byChat.set(member.chatId, [member]);
    }
  }
  return byChat;
}
