/**
 * Message Repository Interface
 */

import type { MessageType } from '../../../common/enums/chat.enums';
import type { UserRecord } from '../../users/repositories';

export const MESSAGE_REPOSITORY = Symbol('MESSAGE_REPOSITORY');

export interface MessageRecord {
  id: string;
  chatId: string;
  senderId: string;
  type: MessageType;
  content: string;
  mediaUrl: string | null;
  sentAt: Date;
  /** Store-assigned, strictly increasing across inserts */
  seq: number;
  isEdited: boolean;
  isDeleted: boolean;
}

export interface MessageWithSender extends MessageRecord {
  sender: UserRecord;
}

export interface NewMessage {
  chatId: string;
  senderId: string;
  type: MessageType;
  content: string;
  mediaUrl: string | null;
  sentAt: Date;
}

export interface MessagePatch {
  content?: string;
  isEdited?: boolean;
  isDeleted?: boolean;
}

export interface MessagePage {
  items: MessageWithSender[];
  total: number;
}

export interface IMessageRepository {
  create(message: NewMessage): Promise<MessageRecord>;

  findById(messageId: string): Promise<MessageWithSender | null>;

  /**
   * Newest first: sentAt desc, then seq desc. `page` is zero-based.
   */
  findPageByChatId(
    chatId: string,
    page: number,
    size: number,
  ): Promise<MessagePage>;

  update(messageId: string, patch: MessagePatch): Promise<void>;
}
