/**
 * TypeORM implementation of Chat Repository
 */

import { Injectable } from '@nestjs/common';
import { In } from 'typeorm';
import { MemberRole } from '../../../common/enums/chat.enums';
import { NotFoundError } from '../../../common/errors/chat-domain.errors';
import { TypeOrmTransactionHost } from '../../../database/typeorm-transaction-host';
import { toUserRecord } from '../../users/repositories/typeorm-user.repository';
import { Chat } from '../entities/chat.entity';
import { ChatMember } from '../entities/chat-member.entity';
import type {
  ChatPropertiesPatch,
  ChatRecord,
  IChatRepository,
  MemberRecord,
  MemberWithChat,
  MemberWithUser,
  NewChat,
  NewMember,
} from './chat.repository.interface';

function toChatRecord(chat: Chat): ChatRecord {
  return {
    id: chat.id,
    type: chat.type,
    groupName: chat.groupName,
    groupImage: chat.groupImage,
    isDeleted: chat.isDeleted,
    createdAt: chat.createdAt,
    deletedAt: chat.deletedAt,
  };
}

function toMemberRecord(member: ChatMember): MemberRecord {
  return {
    id: member.id,
    chatId: member.chatId,
    userId: member.userId,
    role: member.role,
    joinedAt: member.joinedAt,
  };
}

function toMemberWithUser(member: ChatMember): MemberWithUser {
  if (!member.user) {
    throw new Error(`Member ${member.id} loaded without its user`);
  }
  return { ...toMemberRecord(member), user: toUserRecord(member.user) };
}

function toMemberWithChat(member: ChatMember): MemberWithChat {
  if (!member.chat) {
    throw new Error(`Member ${member.id} loaded without its chat`);
  }
  return { ...toMemberRecord(member), chat: toChatRecord(member.chat) };
}

function hasId(row: unknown): row is { id: string } {
  return (
    typeof row === 'object' &&
    row !== null &&
    'id' in row &&
    typeof row.id === 'string'
  );
}

@Injectable()
export class TypeOrmChatRepository implements IChatRepository {
  constructor(private readonly txHost: TypeOrmTransactionHost) {}

  private get chats() {
    return this.txHost.manager.getRepository(Chat);
  }

  private get members() {
    return this.txHost.manager.getRepository(ChatMember);
  }

  async findChatById(chatId: string): Promise<ChatRecord | null> {
    const chat = await this.chats.findOneBy({ id: chatId });
    return chat ? toChatRecord(chat) : null;
  }

  async lockChat(chatId: string): Promise<ChatRecord | null> {
    const chat = await this.chats.findOne({
      where: { id: chatId },
      lock: { mode: 'pessimistic_write' },
    });
    return chat ? toChatRecord(chat) : null;
  }

  async createChat(chat: NewChat): Promise<ChatRecord> {
    const saved = await this.chats.save(this.chats.create(chat));
    return toChatRecord(saved);
  }

  async updateChat(
    chatId: string,
    patch: ChatPropertiesPatch,
  ): Promise<ChatRecord> {
    if (Object.keys(patch).length > 0) {
      await this.chats.update({ id: chatId }, patch);
    }
    const chat = await this.chats.findOneBy({ id: chatId });
    if (!chat) {
      throw new NotFoundError('Chat not found');
    }
    return toChatRecord(chat);
  }

  async findMembership(
    chatId: string,
    userId: string,
  ): Promise<MemberRecord | null> {
    const member = await this.members.findOneBy({ chatId, userId });
    return member ? toMemberRecord(member) : null;
  }

  async findMembersByChatIds(
    chatIds: readonly string[],
  ): Promise<MemberWithUser[]> {
    if (chatIds.length === 0) return [];
    const members = await this.members.find({
      where: { chatId: In([...chatIds]) },
      relations: { user: true },
      order: { joinedAt: 'ASC' },
    });
    return members.map(toMemberWithUser);
  }

  async findMembershipsByUser(userId: string): Promise<MemberWithChat[]> {
    const members = await this.members.find({
      where: { userId, chat: { isDeleted: false } },
      relations: { chat: true },
      order: { chat: { createdAt: 'DESC' } },
    });
    return members.map(toMemberWithChat);
  }

  async findMembersByChatIdAndUserIds(
    chatId: string,
    userIds: readonly string[],
  ): Promise<MemberWithUser[]> {
    if (userIds.length === 0) return [];
    const members = await this.members.find({
      where: { chatId, userId: In([...userIds]) },
      relations: { user: true },
      order: { joinedAt: 'ASC' },
    });
    return members.map(toMemberWithUser);
  }

  async insertMembers(
    chatId: string,
    members: readonly NewMember[],
  ): Promise<MemberRecord[]> {
    if (members.length === 0) return [];

    // ON CONFLICT DO NOTHING: a concurrent add of the same user is a no-op
    const result = await this.members
      .createQueryBuilder()
      .insert()
      .into(ChatMember)
      .values(
        members.map((member) => ({
          chatId,
          userId: member.userId,
          role: member.role,
        })),
      )
      .orIgnore()
      .returning(['id'])
      .execute();

    const rows: unknown = result.raw;
    const insertedIds = Array.isArray(rows)
      ? rows.filter(hasId).map((row) => row.id)
      : [];
    if (insertedIds.length === 0) return [];

    const inserted = await this.members.find({
      where: { id: In(insertedIds) },
      order: { joinedAt: 'ASC' },
    });
    return inserted.map(toMemberRecord);
  }

  async updateMemberRole(
    chatId: string,
    userId: string,
    role: MemberRole,
  ): Promise<void> {
    await this.members.update({ chatId, userId }, { role });
  }

  async countAdmins(chatId: string): Promise<number> {
    return this.members.countBy({ chatId, role: MemberRole.ADMIN });
  }

  async deleteMembers(
    chatId: string,
    userIds: readonly string[],
  ): Promise<number> {
    if (userIds.length === 0) return 0;
    const result = await this.members.delete({
      chatId,
      userId: In([...userIds]),
    });
    return result.affected ?? 0;
  }
}
