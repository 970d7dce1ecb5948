import type { MessageType } from '../../../common/enums/chat.enums';

export const DELETED_MESSAGE_PLACEHOLDER = 'Message has been deleted';

export interface MessageSender {
  userId: string;
  username: string;
}

export interface MessageDisplay {
  messageId: string;
  chatId: string;
  sender: MessageSender;
  messageType: MessageType;
  /** DELETED_MESSAGE_PLACEHOLDER when isDeleted */
  content: string;
  mediaUrl: string | null;
  /** ISO-8601 sentAt */
  timestamp: string;
  isEdited: boolean;
  isDeleted: boolean;
}
