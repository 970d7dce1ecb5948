/**
 * TypeORM implementation of Message Repository
 */

import { Injectable } from '@nestjs/common';
import { TypeOrmTransactionHost } from '../../../database/typeorm-transaction-host';
import { toUserRecord } from '../../users/repositories/typeorm-user.repository';
import { Message } from '../entities/message.entity';
import type {
  IMessageRepository,
  MessagePage,
  MessagePatch,
  MessageRecord,
  MessageWithSender,
  NewMessage,
} from './message.repository.interface';

function toMessageRecord(message: Message): MessageRecord {
  return {
    id: message.id,
    chatId: message.chatId,
    senderId: message.senderId,
    type: message.type,
    content: message.content,
    mediaUrl: message.mediaUrl,
    sentAt: message.sentAt,
    seq: message.seq,
    isEdited: message.isEdited,
    isDeleted: message.isDeleted,
  };
}

function toMessageWithSender(message: Message): MessageWithSender {
  if (!message.sender) {
    throw new Error(`Message ${message.id} loaded without its sender`);
  }
  return { ...toMessageRecord(message), sender: toUserRecord(message.sender) };
}

@Injectable()
export class TypeOrmMessageRepository implements IMessageRepository {
  constructor(private readonly txHost: TypeOrmTransactionHost) {}

  private get repo() {
    return this.txHost.manager.getRepository(Message);
  }

  async create(message: NewMessage): Promise<MessageRecord> {
    const saved = await this.repo.save(this.repo.create(message));
    return toMessageRecord(saved);
  }

  async findById(messageId: string): Promise<MessageWithSender | null> {
    const message = await this.repo.findOne({
      where: { id: messageId },
      relations: { sender: true },
    });
    return message ? toMessageWithSender(message) : null;
  }

  async findPageByChatId(
    chatId: string,
    page: number,
    size: number,
  ): Promise<MessagePage> {
    const [messages, total] = await this.repo.findAndCount({
      where: { chatId },
      relations: { sender: true },
      order: { sentAt: 'DESC', seq: 'DESC' },
      skip: page * size,
      take: size,
    });
    return { items: messages.map(toMessageWithSender), total };
  }

  async update(messageId: string, patch: MessagePatch): Promise<void> {
    await this.repo.update({ id: messageId }, patch);
  }
}
