import { describe, it, expect, beforeEach } from 'vitest';
import type { UserRecord } from '../../users/repositories';
import { MessageType } from '../../../common/enums/chat.enums';
import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../../common/errors/chat-domain.errors';
import type { MessageSentEvent } from '../events';
import { DELETED_MESSAGE_PLACEHOLDER } from '../interfaces/message-display.interface';
import {
  captureEvents,
  createChatCoreHarness,
  principalOf,
  type ChatCoreHarness,
} from '../../../../test/mocks/chat-core.harness';

describe('MessageService', () => {
  let h: ChatCoreHarness;
  let alice: UserRecord;
  let bob: UserRecord;
  let carol: UserRecord;
  let dave: UserRecord;
  let chatId: string;

  beforeEach(async () => {
    h = await createChatCoreHarness();
    alice = h.store.addUser('alice', '+15550000001');
    bob = h.store.addUser('bob', '+15550000002');
    carol = h.store.addUser('carol', '+15550000003');
    dave = h.store.addUser('dave', '+15550000004');

    const group = await h.chatService.createChat(principalOf(alice), {
      chatType: 'GROUP',
      groupName: 'Hiking',
      memberIds: [bob.id, carol.id],
    });
    chatId = group.chatId;
  });

  const sendText = (sender: UserRecord, content: string) =>
    h.messageService.sendMessage(principalOf(sender), {
      chatId,
      messageType: 'TEXT',
      content,
    });

  describe('sendMessage', () => {
    it('should store a text message and broadcast it', async () => {
      const sent = captureEvents<MessageSentEvent>(h.emitter, 'message.sent');

      const message = await sendText(bob, 'hello');

      expect(message).toMatchObject({
        chatId,
        sender: { userId: bob.id, username: 'bob' },
        messageType: MessageType.TEXT,
        content: 'hello',
        mediaUrl: null,
        isEdited: false,
        isDeleted: false,
      });
      expect(message.timestamp).toBe(h.store.state.messages[0].sentAt.toISOString());
      expect(sent).toHaveLength(1);
      expect(sent[0].chatId).toBe(chatId);
      expect(sent[0].message).toEqual(message);
    });

    it('should fill in the caption of a media message', async () => {
      const message = await h.messageService.sendMessage(principalOf(bob), {
        chatId,
        messageType: 'image',
        mediaUrl: 'https://cdn.example.test/p.jpg',
      });

      expect(message.messageType).toBe(MessageType.IMAGE);
      expect(message.content).toBe('📷 Photo');
      expect(message.mediaUrl).toBe('https://cdn.example.test/p.jpg');
    });

    it('should reject a media message without a URL', async () => {
      await expect(
        h.messageService.sendMessage(principalOf(bob), {
          chatId,
          messageType: 'VIDEO',
          content: 'look',
        }),
      ).rejects.toThrow(new ValidationError('VIDEO message must have a media URL'));
      expect(h.store.state.messages).toHaveLength(0);
    });

    it('should reject blank text without storing or publishing', async () => {
      const sent = captureEvents<MessageSentEvent>(h.emitter, 'message.sent');

      await expect(sendText(bob, '  ')).rejects.toThrow(
        'TEXT message must have non-empty content',
      );
      expect(h.store.state.messages).toHaveLength(0);
      expect(sent).toHaveLength(0);
    });

    it('should reject an unsupported type', async () => {
      await expect(
        h.messageService.sendMessage(principalOf(bob), {
          chatId,
          messageType: 'STICKER',
          content: 'x',
        }),
      ).rejects.toThrow('Unsupported message type: STICKER');
    });

    it('should reject a sender outside the chat', async () => {
      await expect(sendText(dave, 'hi')).rejects.toThrow(
        new ForbiddenError('User is not a member of this chat'),
      );
    });

    it('should reject an unknown chat', async () => {
      await expect(
        h.messageService.sendMessage(principalOf(bob), {
          chatId: 'chat-missing',
          messageType: 'TEXT',
          content: 'hi',
        }),
      ).rejects.toThrow(new NotFoundError('Chat not found'));
    });
  });

  describe('getMessages', () => {
    beforeEach(async () => {
      await sendText(alice, 'first');
      await sendText(bob, 'second');
      await sendText(carol, 'third');
    });

    it('should page newest first', async () => {
      const firstPage = await h.messageService.getMessages(
        chatId,
        principalOf(bob),
        0,
        2,
      );
      const secondPage = await h.messageService.getMessages(
        chatId,
        principalOf(bob),
        1,
        2,
      );

      expect(firstPage.data.map((message) => message.content)).toEqual([
        'third',
        'second',
      ]);
      expect(firstPage.meta).toEqual({
        current: 0,
        pageSize: 2,
        total: 3,
        totalPages: 2,
      });
      expect(secondPage.data.map((message) => message.content)).toEqual([
        'first',
      ]);
    });

    it('should return an empty page past the end', async () => {
      const page = await h.messageService.getMessages(
        chatId,
        principalOf(bob),
        5,
        20,
      );

      expect(page.data).toEqual([]);
      expect(page.meta.total).toBe(3);
    });

    it('should reject a negative page', async () => {
      await expect(
        h.messageService.getMessages(chatId, principalOf(bob), -1, 20),
      ).rejects.toThrow('page must be an integer >= 0');
    });

    it('should reject a zero size', async () => {
      await expect(
        h.messageService.getMessages(chatId, principalOf(bob), 0, 0),
      ).rejects.toThrow('size must be an integer >= 1');
    });

    it('should reject a reader outside the chat', async () => {
      await expect(
        h.messageService.getMessages(chatId, principalOf(dave), 0, 20),
      ).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('editMessage', () => {
    it('should replace the content and mark it edited', async () => {
      const original = await sendText(bob, 'helo');
      const sent = captureEvents<MessageSentEvent>(h.emitter, 'message.sent');

      const edited = await h.messageService.editMessage(
        principalOf(bob),
        original.messageId,
        'hello',
      );

      expect(edited.content).toBe('hello');
      expect(edited.isEdited).toBe(true);
      expect(edited.timestamp).toBe(original.timestamp);
      expect(sent[0].message).toEqual(edited);
    });

    it("should not edit another user's message", async () => {
      const original = await sendText(bob, 'mine');

      await expect(
        h.messageService.editMessage(principalOf(alice), original.messageId, 'x'),
      ).rejects.toThrow('You can only edit your own messages');
    });

    it('should only edit text messages', async () => {
      const original = await h.messageService.sendMessage(principalOf(bob), {
        chatId,
        messageType: 'AUDIO',
        mediaUrl: 'https://cdn.example.test/a.mp3',
      });

      await expect(
        h.messageService.editMessage(principalOf(bob), original.messageId, 'x'),
      ).rejects.toThrow('Only TEXT messages can be edited');
    });

    it('should not edit a deleted message', async () => {
      const original = await sendText(bob, 'oops');
      await h.messageService.deleteMessage(principalOf(bob), original.messageId);

      await expect(
        h.messageService.editMessage(principalOf(bob), original.messageId, 'x'),
      ).rejects.toThrow('A deleted message cannot be edited');
    });

    it('should reject blank content', async () => {
      const original = await sendText(bob, 'text');

      await expect(
        h.messageService.editMessage(principalOf(bob), original.messageId, ' '),
      ).rejects.toThrow('Message content cannot be empty');
    });

    it('should fail for an unknown message', async () => {
      await expect(
        h.messageService.editMessage(principalOf(bob), 'message-missing', 'x'),
      ).rejects.toThrow(new NotFoundError('Message not found'));
    });
  });

  describe('deleteMessage', () => {
    it('should leave a tombstone', async () => {
      const original = await h.messageService.sendMessage(principalOf(bob), {
        chatId,
        messageType: 'IMAGE',
        mediaUrl: 'https://cdn.example.test/p.jpg',
      });

      const deleted = await h.messageService.deleteMessage(
        principalOf(bob),
        original.messageId,
      );

      expect(deleted.isDeleted).toBe(true);
      expect(deleted.content).toBe(DELETED_MESSAGE_PLACEHOLDER);
      expect(deleted.mediaUrl).toBeNull();

      const page = await h.messageService.getMessages(
        chatId,
        principalOf(carol),
        0,
        20,
      );
      expect(page.data).toEqual([deleted]);
    });

    it('should let a chat admin delete any message', async () => {
      const original = await sendText(bob, 'spam');

      const deleted = await h.messageService.deleteMessage(
        principalOf(alice),
        original.messageId,
      );

      expect(deleted.isDeleted).toBe(true);
    });

    it('should not let a plain member delete another member message', async () => {
      const original = await sendText(bob, 'keep');

      await expect(
        h.messageService.deleteMessage(principalOf(carol), original.messageId),
      ).rejects.toThrow('Only the sender or a chat admin can delete this message');
      expect(h.store.state.messages[0].isDeleted).toBe(false);
    });
  });
});
