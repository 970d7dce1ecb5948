/**
 * CHAT DOMAIN EVENTS
 *
 * Owner: ChatModule
 * Published after the mutation has committed and the affected cache
 * entries have been evicted. Delivered by ChatNotificationListener.
 */

import { DomainEvent } from '../../../shared/events';
import type {
  ChatDisplay,
  MemberUpdate,
} from '../interfaces/chat-display.interface';

/**
 * Emitted once per created chat.
 *
 * Delivery: targeted, one send per recipient.
 * Recipients are all initial members, the creator included.
 *
 * @version 1
 */
export class ChatCreatedEvent extends DomainEvent {
  readonly eventType = 'CHAT_CREATED';
  readonly version = 1;

  constructor(
    readonly chat: ChatDisplay,
    readonly recipientUsernames: string[],
  ) {
    super('ChatModule', 'Chat', chat.chatId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      chat: this.chat,
      recipientUsernames: this.recipientUsernames,
    };
  }
}

/**
 * Emitted when members are added, removed or change role.
 *
 * Delivery: broadcast on the chat's members topic.
 *
 * @version 1
 */
export class MemberUpdatedEvent extends DomainEvent {
  readonly eventType = 'MEMBER_UPDATED';
  readonly version = 1;

  constructor(
    readonly chatId: string,
    readonly update: MemberUpdate,
  ) {
    super('ChatModule', 'Chat', chatId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      chatId: this.chatId,
      update: this.update,
    };
  }
}

/**
 * Emitted once per user removed from a chat.
 *
 * Delivery: targeted to the removed user.
 *
 * @version 1
 */
export class ChatRemovedEvent extends DomainEvent {
  readonly eventType = 'CHAT_REMOVED';
  readonly version = 1;

  constructor(
    readonly chatId: string,
    readonly username: string,
  ) {
    super('ChatModule', 'Chat', chatId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      chatId: this.chatId,
      username: this.username,
    };
  }
}

/**
 * Emitted when a group's name or image changed.
 *
 * Delivery: broadcast on the chat's updates topic.
 *
 * @version 1
 */
export class ChatUpdatedEvent extends DomainEvent {
  readonly eventType = 'CHAT_UPDATED';
  readonly version = 1;

  constructor(
    readonly chatId: string,
    readonly chat: ChatDisplay,
  ) {
    super('ChatModule', 'Chat', chatId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      chatId: this.chatId,
      chat: this.chat,
    };
  }
}
