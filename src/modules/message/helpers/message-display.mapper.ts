import type { MessageRecord } from '../repositories/message.repository.interface';
import {
  DELETED_MESSAGE_PLACEHOLDER,
  type MessageDisplay,
  type MessageSender,
} from '../interfaces/message-display.interface';

/**
 * Deleted messages keep their row content; only the projection hides it.
 */
export function toMessageDisplay(
  message: MessageRecord,
  sender: MessageSender,
): MessageDisplay {
  return {
    messageId: message.id,
    chatId: message.chatId,
    sender: { userId: sender.userId, username: sender.username },
    messageType: message.type,
    content: message.isDeleted ? DELETED_MESSAGE_PLACEHOLDER : message.content,
    mediaUrl: message.isDeleted ? null : message.mediaUrl,
    timestamp: message.sentAt.toISOString(),
    isEdited: message.isEdited,
    isDeleted: message.isDeleted,
  };
}
