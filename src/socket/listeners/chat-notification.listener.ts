/**
 * ChatNotificationListener
 *
 * Turns committed chat, message and contact events into real-time
 * deliveries. Lives in SocketModule so the domain modules never import
 * the gateway.
 *
 * Event mapping (EventEmitter → Socket.IO):
 *   message.sent    → chat:message    (chat topic)
 *   chat.created    → chat:new        (each recipient)
 *   member.updated  → chat:members    (members topic)
 *   chat.removed    → chat:removed    (removed user)
 *   chat.updated    → chat:updated    (updates topic)
 *   contact.updated → contact:updated (other party)
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  SocketEvents,
  SocketRooms,
} from '../../common/constants/socket-events.constant';
import {
  NOTIFICATION_TRANSPORT,
  type NotificationTransport,
} from '../interfaces/notification-transport.interface';
import type { MessageSentEvent } from '../../modules/message/events';
import type {
  ChatCreatedEvent,
  ChatRemovedEvent,
  ChatUpdatedEvent,
  MemberUpdatedEvent,
} from '../../modules/chat/events';
import type { ContactUpdatedEvent } from '../../modules/contact/events';

@Injectable()
export class ChatNotificationListener {
  private readonly logger = new Logger(ChatNotificationListener.name);

  constructor(
    @Inject(NOTIFICATION_TRANSPORT)
    private readonly transport: NotificationTransport,
  ) {}

  @OnEvent('message.sent')
  handleMessageSent(event: MessageSentEvent): void {
    this.transport.broadcast(
      SocketRooms.chat(event.chatId),
      SocketEvents.CHAT_MESSAGE,
      event.message,
    );
    this.logger.debug(
      `message.sent: chat=${event.chatId} message=${event.message.messageId}`,
    );
  }

  /**
   * One delivery per recipient; a failed send does not stop the rest.
   */
  @OnEvent('chat.created')
  handleChatCreated(event: ChatCreatedEvent): void {
    for (const username of event.recipientUsernames) {
      try {
        this.transport.sendToUser(username, SocketEvents.CHAT_NEW, event.chat);
      } catch (error) {
        this.logger.error(
          `Failed to deliver chat ${event.chat.chatId} to ${username}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }
  }

  @OnEvent('member.updated')
  handleMemberUpdated(event: MemberUpdatedEvent): void {
    this.transport.broadcast(
      SocketRooms.chatMembers(event.chatId),
      SocketEvents.CHAT_MEMBERS,
      event.update,
    );
    this.logger.debug(
      `member.updated: chat=${event.chatId} type=${event.update.updateType}`,
    );
  }

  @OnEvent('chat.removed')
  handleChatRemoved(event: ChatRemovedEvent): void {
    this.transport.sendToUser(event.username, SocketEvents.CHAT_REMOVED, {
      chatId: event.chatId,
    });
  }

  @OnEvent('chat.updated')
  handleChatUpdated(event: ChatUpdatedEvent): void {
    this.transport.broadcast(
      SocketRooms.chatUpdates(event.chatId),
      SocketEvents.CHAT_UPDATED,
      event.chat,
    );
  }

  @OnEvent('contact.updated')
  handleContactUpdated(event: ContactUpdatedEvent): void {
    this.transport.sendToUser(
      event.targetUsername,
      SocketEvents.CONTACT_UPDATED,
      event.notification,
    );
    this.logger.debug(
      `contact.updated: target=${event.targetUsername} type=${event.notification.updateType}`,
    );
  }
}
