import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { In } from 'typeorm';
import { ChatType, MemberRole } from '../../../common/enums/chat.enums';
import { TypeOrmTransactionHost } from '../../../database/typeorm-transaction-host';
import { Chat } from '../entities/chat.entity';
import { TypeOrmChatRepository } from './typeorm-chat.repository';

describe('TypeOrmChatRepository', () => {
  let repository: TypeOrmChatRepository;

  const queryBuilder = {
    insert: vi.fn(),
    into: vi.fn(),
    values: vi.fn(),
    orIgnore: vi.fn(),
    returning: vi.fn(),
    execute: vi.fn(),
  };

  const members = {
    createQueryBuilder: vi.fn(() => queryBuilder),
    find: vi.fn(),
  };

  const chats = {
    findOne: vi.fn(),
  };

  const joinedAt = new Date('2025-01-01T00:00:00.000Z');

  beforeEach(async () => {
    vi.clearAllMocks();
    queryBuilder.insert.mockReturnValue(queryBuilder);
    queryBuilder.into.mockReturnValue(queryBuilder);
    queryBuilder.values.mockReturnValue(queryBuilder);
    queryBuilder.orIgnore.mockReturnValue(queryBuilder);
    queryBuilder.returning.mockReturnValue(queryBuilder);

    const manager = {
      getRepository: vi.fn((entity: unknown) =>
        entity === Chat ? chats : members,
      ),
    };

    const module = await Test.createTestingModule({
      providers: [
        TypeOrmChatRepository,
        { provide: TypeOrmTransactionHost, useValue: { manager } },
      ],
    }).compile();

    repository = module.get(TypeOrmChatRepository);
  });

  describe('insertMembers', () => {
    it('should insert with ON CONFLICT DO NOTHING and report only new rows', async () => {
      queryBuilder.execute.mockResolvedValue({ raw: [{ id: 'member-2' }] });
      members.find.mockResolvedValue([
        {
          id: 'member-2',
          chatId: 'chat-1',
          userId: 'user-2',
          role: MemberRole.MEMBER,
          joinedAt,
        },
      ]);

      const inserted = await repository.insertMembers('chat-1', [
        { userId: 'user-1', role: MemberRole.MEMBER },
        { userId: 'user-2', role: MemberRole.MEMBER },
      ]);

      expect(queryBuilder.values).toHaveBeenCalledWith([
        { chatId: 'chat-1', userId: 'user-1', role: MemberRole.MEMBER },
        { chatId: 'chat-1', userId: 'user-2', role: MemberRole.MEMBER },
      ]);
      expect(queryBuilder.orIgnore).toHaveBeenCalledTimes(1);
      expect(queryBuilder.returning).toHaveBeenCalledWith(['id']);
      expect(members.find).toHaveBeenCalledWith({
        where: { id: In(['member-2']) },
        order: { joinedAt: 'ASC' },
      });
      expect(inserted).toEqual([
        {
          id: 'member-2',
          chatId: 'chat-1',
          userId: 'user-2',
          role: MemberRole.MEMBER,
          joinedAt,
        },
      ]);
    });

    it('should report nothing when every row already existed', async () => {
      queryBuilder.execute.mockResolvedValue({ raw: [] });

      const inserted = await repository.insertMembers('chat-1', [
        { userId: 'user-1', role: MemberRole.MEMBER },
      ]);

      expect(inserted).toEqual([]);
      expect(members.find).not.toHaveBeenCalled();
    });

    it('should skip the query for an empty batch', async () => {
      expect(await repository.insertMembers('chat-1', [])).toEqual([]);
      expect(members.createQueryBuilder).not.toHaveBeenCalled();
    });
  });

  describe('lockChat', () => {
    it('should read the chat row FOR UPDATE', async () => {
      const createdAt = new Date('2025-01-02T00:00:00.000Z');
      chats.findOne.mockResolvedValue({
        id: 'chat-1',
        type: ChatType.GROUP,
        groupName: 'Hiking',
        groupImage: null,
        isDeleted: false,
        createdAt,
        deletedAt: null,
      });

      const chat = await repository.lockChat('chat-1');

      expect(chats.findOne).toHaveBeenCalledWith({
        where: { id: 'chat-1' },
        lock: { mode: 'pessimistic_write' },
      });
      expect(chat).toEqual({
        id: 'chat-1',
        type: ChatType.GROUP,
        groupName: 'Hiking',
        groupImage: null,
        isDeleted: false,
        createdAt,
        deletedAt: null,
      });
    });

    it('should return null for an unknown chat', async () => {
      chats.findOne.mockResolvedValue(null);

      expect(await repository.lockChat('chat-missing')).toBeNull();
    });
  });
});
