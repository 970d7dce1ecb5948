import { Inject, Injectable, Logger } from '@nestjs/common';
import { MemberRole, MessageType } from '../../../common/enums/chat.enums';
import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../../common/errors/chat-domain.errors';
import {
  toPagePaginatedResult,
  type PagePaginatedResult,
} from '../../../common/interfaces/paginated-result.interface';
import type { Principal } from '../../../common/interfaces/principal.interface';
import { TransactionHost } from '../../../database/transaction-host';
import { EventPublisher } from '../../../shared/events';
import { CHAT_REPOSITORY } from '../../chat/repositories';
import type { IChatRepository } from '../../chat/repositories';
import { MessageSentEvent } from '../events';
import { toMessageDisplay } from '../helpers/message-display.mapper';
import { MessageValidator } from '../helpers/message-validation.helper';
import type { MessageDisplay } from '../interfaces/message-display.interface';
import { MESSAGE_REPOSITORY } from '../repositories';
import type { IMessageRepository, MessageWithSender } from '../repositories';

export interface SendMessageInput {
  chatId: string;
  messageType: string;
  content?: string | null;
  mediaUrl?: string | null;
}

@Injectable()
export class MessageService {
  private readonly logger = new Logger(MessageService.name);

  constructor(
    @Inject(MESSAGE_REPOSITORY)
    private readonly messageRepository: IMessageRepository,
    @Inject(CHAT_REPOSITORY)
    private readonly chatRepository: IChatRepository,
    private readonly messageValidator: MessageValidator,
    private readonly txHost: TransactionHost,
    private readonly eventPublisher: EventPublisher,
  ) {}

  async sendMessage(
    sender: Principal,
    input: SendMessageInput,
  ): Promise<MessageDisplay> {
    const { chatId } = input;

    const chat = await this.chatRepository.findChatById(chatId);
    if (!chat || chat.isDeleted) {
      throw new NotFoundError('Chat not found');
    }

    const membership = await this.chatRepository.findMembership(
      chatId,
      sender.userId,
    );
    if (!membership) {
      throw new ForbiddenError('User is not a member of this chat');
    }

    const validated = this.messageValidator.validate(input.messageType, input);

    const message = await this.txHost.run(() =>
      this.messageRepository.create({
        chatId,
        senderId: sender.userId,
        type: validated.type,
        content: validated.content,
        mediaUrl: validated.mediaUrl,
        sentAt: new Date(),
      }),
    );

    const display = toMessageDisplay(message, sender);
    await this.eventPublisher.publish(new MessageSentEvent(chatId, display));

    this.logger.log(
      `Message ${message.id} (${message.type}) sent to chat ${chatId} by ${sender.userId}`,
    );
    return display;
  }

  async getMessages(
    chatId: string,
    requester: Principal,
    page: number,
    size: number,
  ): Promise<PagePaginatedResult<MessageDisplay>> {
    if (!Number.isInteger(page) || page < 0) {
      throw new ValidationError('page must be an integer >= 0');
    }
    if (!Number.isInteger(size) || size < 1) {
      throw new ValidationError('size must be an integer >= 1');
    }

    const membership = await this.chatRepository.findMembership(
      chatId,
      requester.userId,
    );
    if (!membership) {
      throw new ForbiddenError('User is not a member of this chat');
    }

    const { items, total } = await this.messageRepository.findPageByChatId(
      chatId,
      page,
      size,
    );

    return toPagePaginatedResult(
      items.map((message) => this.displayWithSender(message)),
      page,
      size,
      total,
    );
  }

  async editMessage(
    editor: Principal,
    messageId: string,
    newContent: string,
  ): Promise<MessageDisplay> {
    const message = await this.findMessageOrThrow(messageId);

    if (message.senderId !== editor.userId) {
      throw new ForbiddenError('You can only edit your own messages');
    }
    if (message.isDeleted) {
      throw new ValidationError('A deleted message cannot be edited');
    }
    if (message.type !== MessageType.TEXT) {
      throw new ValidationError('Only TEXT messages can be edited');
    }
    if (!newContent || newContent.trim().length === 0) {
      throw new ValidationError('Message content cannot be empty');
    }

    await this.txHost.run(() =>
      this.messageRepository.update(messageId, {
        content: newContent,
        isEdited: true,
      }),
    );

    const display = this.displayWithSender({
      ...message,
      content: newContent,
      isEdited: true,
    });
    await this.eventPublisher.publish(
      new MessageSentEvent(message.chatId, display),
    );

    this.logger.log(`Message ${messageId} edited by ${editor.userId}`);
    return display;
  }

  async deleteMessage(
    deleter: Principal,
    messageId: string,
  ): Promise<MessageDisplay> {
    const message = await this.findMessageOrThrow(messageId);

    if (message.senderId !== deleter.userId) {
      const membership = await this.chatRepository.findMembership(
        message.chatId,
        deleter.userId,
      );
      if (membership?.role !== MemberRole.ADMIN) {
        throw new ForbiddenError(
          'Only the sender or a chat admin can delete this message',
        );
      }
    }

    await this.txHost.run(() =>
      this.messageRepository.update(messageId, { isDeleted: true }),
    );

    const display = this.displayWithSender({ ...message, isDeleted: true });
    await this.eventPublisher.publish(
      new MessageSentEvent(message.chatId, display),
    );

    this.logger.log(`Message ${messageId} deleted by ${deleter.userId}`);
    return display;
  }

  private async findMessageOrThrow(messageId: string): Promise<MessageWithSender> {
    const message = await this.messageRepository.findById(messageId);
    if (!message) {
      throw new NotFoundError('Message not found');
    }
    return message;
  }

  private displayWithSender(message: MessageWithSender): MessageDisplay {
    return toMessageDisplay(message, {
      userId: message.sender.id,
      username: message.sender.username,
    });
  }
}
