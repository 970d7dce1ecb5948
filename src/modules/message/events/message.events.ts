/**
 * MESSAGE DOMAIN EVENTS
 *
 * Owner: MessageModule
 */

import { DomainEvent } from '../../../shared/events';
import type { MessageDisplay } from '../interfaces/message-display.interface';

/**
 * Emitted when a message is sent, edited or deleted. The projection is
 * the message's current state (edited content or tombstone).
 *
 * Delivery: broadcast on the chat topic.
 *
 * @version 1
 */
export class MessageSentEvent extends DomainEvent {
  readonly eventType = 'MESSAGE_SENT';
  readonly version = 1;

  constructor(
    readonly chatId: string,
    readonly message: MessageDisplay,
  ) {
    super('MessageModule', 'Chat', chatId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      chatId: this.chatId,
      message: this.message,
    };
  }
}
