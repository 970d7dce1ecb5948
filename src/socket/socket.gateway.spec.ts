import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { SocketGateway } from './socket.gateway';
import { SocketAuthService } from './services/socket-auth.service';
import { ChatService } from '../modules/chat/services/chat.service';
import { fakeClient } from '../../test/mocks/fake-socket';

const alice = { userId: 'u1', username: 'alice' };

describe('SocketGateway', () => {
  let gateway: SocketGateway;
  let socketAuth: { authenticateSocket: ReturnType<typeof vi.fn> };
  let chatService: { isMember: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    socketAuth = { authenticateSocket: vi.fn() };
    chatService = { isMember: vi.fn() };

    const module = await Test.createTestingModule({
      providers: [
        SocketGateway,
        { provide: SocketAuthService, useValue: socketAuth },
        { provide: ChatService, useValue: chatService },
      ],
    }).compile();

    gateway = module.get(SocketGateway);
  });

  describe('handleConnection', () => {
    it('should attach the principal and join the user room', async () => {
      socketAuth.authenticateSocket.mockResolvedValueOnce(alice);
      const client = fakeClient();

      await gateway.handleConnection(client);

      expect(client.principal).toEqual(alice);
      expect(client.join).toHaveBeenCalledWith('user:alice');
      expect(client.disconnect).not.toHaveBeenCalled();
    });

    it('should reject a socket without a valid token', async () => {
      socketAuth.authenticateSocket.mockResolvedValueOnce(null);
      const client = fakeClient();

      await gateway.handleConnection(client);

      expect(client.emit).toHaveBeenCalledWith('auth_failed', {
        message: 'Authentication failed',
      });
      expect(client.disconnect).toHaveBeenCalledWith(true);
      expect(client.join).not.toHaveBeenCalled();
    });
  });

  describe('handleSubscribe', () => {
    it('should join the three chat rooms for a member', async () => {
      chatService.isMember.mockResolvedValueOnce(true);
      const client = fakeClient(alice);

      const ack = await gateway.handleSubscribe(client, { chatId: 'c1' });

      expect(ack).toEqual({ ok: true, chatId: 'c1' });
      expect(chatService.isMember).toHaveBeenCalledWith('c1', 'u1');
      expect(client.join).toHaveBeenCalledWith([
        'chat:c1',
        'chat:c1:members',
        'chat:c1:updates',
      ]);
    });

    it('should refuse a non-member', async () => {
      chatService.isMember.mockResolvedValueOnce(false);
      const client = fakeClient(alice);

      const ack = await gateway.handleSubscribe(client, { chatId: 'c1' });

      expect(ack).toEqual({
        ok: false,
        error: 'User is not a member of this chat',
      });
      expect(client.join).not.toHaveBeenCalled();
    });

    it('should refuse an unauthenticated socket', async () => {
      const client = fakeClient();

      const ack = await gateway.handleSubscribe(client, { chatId: 'c1' });

      expect(ack).toEqual({ ok: false, error: 'Not authenticated' });
      expect(chatService.isMember).not.toHaveBeenCalled();
    });
  });

  describe('handleUnsubscribe', () => {
    it('should leave the chat rooms', async () => {
      const client = fakeClient(alice);

      const ack = await gateway.handleUnsubscribe(client, { chatId: 'c1' });

      expect(ack).toEqual({ ok: true, chatId: 'c1' });
      expect(client.leave.mock.calls).toEqual([
        ['chat:c1'],
        ['chat:c1:members'],
        ['chat:c1:updates'],
      ]);
    });
  });
});
