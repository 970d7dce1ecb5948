import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ChatType,
  MemberRole,
  parseEnumValue,
} from '../../../common/enums/chat.enums';
import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../../common/errors/chat-domain.errors';
import type { Principal } from '../../../common/interfaces/principal.interface';
import { TransactionHost } from '../../../database/transaction-host';
import { CacheInvalidationPolicy } from '../../../shared/cache/cache-invalidation.policy';
import { EventPublisher } from '../../../shared/events';
import { RedisKeyBuilder } from '../../../shared/redis/redis-key-builder';
import { CacheService } from '../../redis/services/cache.service';
import { USER_REPOSITORY } from '../../users/repositories';
import type { IUserRepository, UserRecord } from '../../users/repositories';
import {
  ChatCreatedEvent,
  ChatRemovedEvent,
  ChatUpdatedEvent,
  MemberUpdatedEvent,
} from '../events';
import {
  groupMembersByChat,
  toChatDisplay,
  toMemberDisplay,
} from '../helpers/chat-display.mapper';
import type {
  ChatDisplay,
  MemberDisplay,
} from '../interfaces/chat-display.interface';
import { CHAT_REPOSITORY } from '../repositories';
import type {
  IChatRepository,
  MemberRecord,
  MemberWithUser,
} from '../repositories';

export interface CreateChatInput {
  chatType: string;
  groupName?: string | null;
  groupImage?: string | null;
  memberIds: string[];
}

export interface GroupPropertiesInput {
  chatId: string;
  newGroupName?: string | null;
  newGroupImage?: string | null;
}

function isBlank(value: string | null | undefined): boolean {
  return !value || value.trim().length === 0;
}

/**
 * Chat lifecycle and membership.
 *
 * Every mutation: one transaction, then cache eviction, then event
 * publication. Eviction failures propagate; listener failures do not.
 * Mutations of an existing chat lock its row before the admin check.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    @Inject(CHAT_REPOSITORY)
    private readonly chatRepository: IChatRepository,
    @Inject(USER_REPOSITORY)
    private readonly userRepository: IUserRepository,
    private readonly txHost: TransactionHost,
    private readonly cache: CacheService,
    private readonly eventPublisher: EventPublisher,
  ) {}

  // ============================================================
  // Authorization helpers
  // ============================================================

  async isAdmin(chatId: string, userId: string): Promise<boolean> {
    const member = await this.chatRepository.findMembership(chatId, userId);
    return member?.role === MemberRole.ADMIN;
  }

  async isMember(chatId: string, userId: string): Promise<boolean> {
    const member = await this.chatRepository.findMembership(chatId, userId);
    return member !== null;
  }

  /**
   * Non-members and plain members are both rejected; only the message
   * differs.
   */
  async verifyAdmin(chatId: string, userId: string): Promise<MemberRecord> {
    const member = await this.chatRepository.findMembership(chatId, userId);
    if (!member) {
      throw new ForbiddenError('User is not a member of the chat');
    }
    if (member.role !== MemberRole.ADMIN) {
      throw new ForbiddenError(
        'User does not have administrative privileges for this group',
      );
    }
    return member;
  }

  // ============================================================
  // Reads
  // ============================================================

  async getUserChats(owner: Principal): Promise<ChatDisplay[]> {
    return this.cache.getOrLoad(RedisKeyBuilder.userChats(owner.userId), () =>
      this.loadUserChats(owner.userId),
    );
  }

  async getChatMembers(
    chatId: string,
    requester: Principal,
  ): Promise<MemberDisplay[]> {
    // Checked on every call; only the list itself is cached
    if (!(await this.isMember(chatId, requester.userId))) {
      throw new ForbiddenError(
        'User is not authorized to view the members of this chat',
      );
    }

    return this.cache.getOrLoad(RedisKeyBuilder.chatMembers(chatId), async () => {
      const members = await this.chatRepository.findMembersByChatIds([chatId]);
      return members.map(toMemberDisplay);
    });
  }

  private async loadUserChats(userId: string): Promise<ChatDisplay[]> {
    const memberships = await this.chatRepository.findMembershipsByUser(userId);
    if (memberships.length === 0) return [];

    const allMembers = await this.chatRepository.findMembersByChatIds(
      memberships.map((membership) => membership.chatId),
    );
    const membersByChat = groupMembersByChat(allMembers);

    return memberships.map((membership) =>
      toChatDisplay(membership.chat, membersByChat.get(membership.chatId) ?? []),
    );
  }

  // ============================================================
  // Mutations
  // ============================================================

  async createChat(
    owner: Principal,
    input: CreateChatInput,
  ): Promise<ChatDisplay> {
    const chatType = parseEnumValue(ChatType, input.chatType);
    if (!chatType) {
      throw new ValidationError('Invalid chat type');
    }

    const requestedIds = [...new Set(input.memberIds)];
    const users = await this.userRepository.findByIds(requestedIds);
    if (users.length !== requestedIds.length) {
      throw new ValidationError('Some users were not found');
    }
    const usersById = new Map(users.map((user) => [user.id, user]));

    const ownerRecord =
      usersById.get(owner.userId) ??
      (await this.userRepository.findById(owner.userId));
    if (!ownerRecord) {
      throw new ValidationError('Some users were not found');
    }

    // Owner first, then the requested members in request order
    const participants: UserRecord[] = [ownerRecord];
    for (const id of requestedIds) {
      const user = usersById.get(id);
      if (user && id !== owner.userId) participants.push(user);
    }

    if (chatType === ChatType.P2P && participants.length !== 2) {
      throw new ValidationError('P2P chat must have exactly 2 users');
    }
    if (chatType === ChatType.GROUP) {
      if (isBlank(input.groupName)) {
        throw new ValidationError('Group name is required');
      }
      if (participants.length < 3) {
        throw new ValidationError('Group chat must have at least 3 users');
      }
    }

    const { chat, inserted } = await this.txHost.run(async () => {
      const created = await this.chatRepository.createChat({
        type: chatType,
        groupName:
          chatType === ChatType.GROUP ? (input.groupName ?? '').trim() : null,
        groupImage:
          chatType === ChatType.GROUP && !isBlank(input.groupImage)
            ? (input.groupImage ?? null)
            : null,
      });
      const members = await this.chatRepository.insertMembers(
        created.id,
        participants.map((user) => ({
          userId: user.id,
          role: user.id === owner.userId ? MemberRole.ADMIN : MemberRole.MEMBER,
        })),
      );
      return { chat: created, inserted: members };
    });

    const insertedByUser = new Map(
      inserted.map((member) => [member.userId, member]),
    );
    const members: MemberWithUser[] = [];
    for (const user of participants) {
      const member = insertedByUser.get(user.id);
      if (member) members.push({ ...member, user });
    }
    const display = toChatDisplay(chat, members);

    await this.cache.evict(
      ...CacheInvalidationPolicy.chatCreated(participants.map((user) => user.id)),
    );
    await this.eventPublisher.publish(
      new ChatCreatedEvent(
        display,
        participants.map((user) => user.username),
      ),
    );

    this.logger.log(
      `Chat ${chat.id} (${chatType}) created by ${owner.userId} with ${participants.length} members`,
    );
    return display;
  }

  async addMember(
    owner: Principal,
    chatId: string,
    userIds: string[],
  ): Promise<ChatDisplay> {
    const requestedIds = [...new Set(userIds)];

    const { chat, users, added, members } = await this.txHost.run(async () => {
      const locked = await this.chatRepository.lockChat(chatId);
      await this.verifyAdmin(chatId, owner.userId);
      if (!locked || locked.isDeleted) {
        throw new NotFoundError('Chat not found');
      }

      const found = await this.userRepository.findByIds(requestedIds);
      if (found.length !== requestedIds.length) {
        throw new ValidationError('One or more user IDs to add are invalid');
      }

      const existing = await this.chatRepository.findMembersByChatIdAndUserIds(
        chatId,
        requestedIds,
      );
      const existingIds = new Set(existing.map((member) => member.userId));

      const inserted = await this.chatRepository.insertMembers(
        chatId,
        requestedIds
          .filter((id) => !existingIds.has(id))
          .map((id) => ({ userId: id, role: MemberRole.MEMBER })),
      );

      return {
        chat: locked,
        users: found,
        added: inserted,
        members: await this.chatRepository.findMembersByChatIds([chatId]),
      };
    });

    const usersById = new Map(users.map((user) => [user.id, user]));
    const addedMembers: MemberWithUser[] = [];
    for (const member of added) {
      const user = usersById.get(member.userId);
      if (user) addedMembers.push({ ...member, user });
    }

    await this.cache.evict(
      ...CacheInvalidationPolicy.membershipChanged(
        chatId,
        members.map((member) => member.userId),
      ),
    );
    await this.eventPublisher.publish(
      new MemberUpdatedEvent(chatId, {
        chatId,
        updatedMembers: addedMembers.map(toMemberDisplay),
        updateType: 'MEMBER_ADDED',
      }),
    );

    this.logger.log(
      `Added ${addedMembers.length} members to chat ${chatId} by ${owner.userId}`,
    );
    return toChatDisplay(chat, members);
  }

  async updateGroupProperties(
    owner: Principal,
    input: GroupPropertiesInput,
  ): Promise<ChatDisplay> {
    const { chatId } = input;

    const { chat, members } = await this.txHost.run(async () => {
      const existing = await this.chatRepository.lockChat(chatId);
      await this.verifyAdmin(chatId, owner.userId);
      if (!existing) {
        throw new NotFoundError('Chat not found');
      }

      return {
        chat: await this.chatRepository.updateChat(chatId, {
          ...(!isBlank(input.newGroupName) && {
            groupName: (input.newGroupName ?? '').trim(),
          }),
          ...(!isBlank(input.newGroupImage) && {
            groupImage: input.newGroupImage ?? undefined,
          }),
        }),
        members: await this.chatRepository.findMembersByChatIds([chatId]),
      };
    });

    const display = toChatDisplay(chat, members);

    await this.cache.evict(
      ...CacheInvalidationPolicy.chatPropertiesChanged(
        members.map((member) => member.userId),
      ),
    );
    await this.eventPublisher.publish(new ChatUpdatedEvent(chatId, display));

    this.logger.log(`Group ${chatId} properties updated by ${owner.userId}`);
    return display;
  }

  async updateMemberRole(
    owner: Principal,
    chatId: string,
    targetUserId: string,
    newRole: string,
  ): Promise<MemberDisplay> {
    const { target, members } = await this.txHost.run(async () => {
      await this.chatRepository.lockChat(chatId);
      await this.verifyAdmin(chatId, owner.userId);

      const [targetMember] =
        await this.chatRepository.findMembersByChatIdAndUserIds(chatId, [
          targetUserId,
        ]);
      if (!targetMember) {
        throw new ForbiddenError('Target user is not a member of this chat');
      }

      if (
        targetMember.role === MemberRole.ADMIN &&
        targetMember.userId !== owner.userId
      ) {
        throw new ForbiddenError(
          'Cannot modify the role of an existing group ADMIN',
        );
      }

      const role = parseEnumValue(MemberRole, newRole);
      if (!role) {
        throw new ValidationError(
          'Invalid role provided. Role must be ADMIN or MEMBER',
        );
      }

      if (
        targetMember.role === MemberRole.ADMIN &&
        role === MemberRole.MEMBER &&
        (await this.chatRepository.countAdmins(chatId)) <= 1
      ) {
        throw new ValidationError('A chat must keep at least one ADMIN');
      }

      await this.chatRepository.updateMemberRole(chatId, targetUserId, role);

      return {
        target: { ...targetMember, role },
        members: await this.chatRepository.findMembersByChatIds([chatId]),
      };
    });

    const display = toMemberDisplay(target);

    await this.cache.evict(
      ...CacheInvalidationPolicy.membershipChanged(
        chatId,
        members.map((member) => member.userId),
      ),
    );
    await this.eventPublisher.publish(
      new MemberUpdatedEvent(chatId, {
        chatId,
        updatedMembers: [display],
        updateType: 'ROLE_UPDATED',
      }),
    );

    this.logger.log(
      `Member ${targetUserId} in chat ${chatId} is now ${display.role} (by ${owner.userId})`,
    );
    return display;
  }

  async deleteMember(
    owner: Principal,
    chatId: string,
    targetUserIds: string[],
  ): Promise<void> {
    const { removed, remaining } = await this.txHost.run(async () => {
      await this.chatRepository.lockChat(chatId);

      const targets = await this.chatRepository.findMembersByChatIdAndUserIds(
        chatId,
        [...new Set(targetUserIds)],
      );
      if (targets.length === 0) {
        throw new NotFoundError(
          'No matching members found to remove from the chat',
        );
      }

      const ownerIsAdmin = await this.isAdmin(chatId, owner.userId);

      // Every target is checked before anything is deleted
      for (const target of targets) {
        const isRemovingSelf = target.userId === owner.userId;
        if (isRemovingSelf && target.role === MemberRole.ADMIN) {
          throw new ForbiddenError(
            'Group owner cannot remove themselves using this function',
          );
        }
        if (!ownerIsAdmin && !isRemovingSelf) {
          throw new ForbiddenError(
            'User does not have permission to remove one of the specified members',
          );
        }
      }

      await this.chatRepository.deleteMembers(
        chatId,
        targets.map((target) => target.userId),
      );

      return {
        removed: targets,
        remaining: await this.chatRepository.findMembersByChatIds([chatId]),
      };
    });

    await this.cache.evict(
      ...CacheInvalidationPolicy.membershipChanged(chatId, [
        ...remaining.map((member) => member.userId),
        ...removed.map((member) => member.userId),
      ]),
    );

    await this.eventPublisher.publishBatch([
      ...removed.map(
        (member) => new ChatRemovedEvent(chatId, member.user.username),
      ),
      new MemberUpdatedEvent(chatId, {
        chatId,
        updatedMembers: removed.map(toMemberDisplay),
        updateType: 'MEMBER_REMOVED',
      }),
    ]);

    this.logger.log(
      `Removed ${removed.length} members from chat ${chatId} by ${owner.userId}`,
    );
  }
}
