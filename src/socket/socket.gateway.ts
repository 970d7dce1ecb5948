import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
  ConnectedSocket,
  MessageBody,
  SubscribeMessage,
} from '@nestjs/websockets';
import { Server } from 'socket.io';
import { Logger, UseFilters, UsePipes } from '@nestjs/common';
import type { GatewayClient } from '../common/interfaces/socket-client.interface';
import { SocketEvents, SocketRooms } from '../common/constants/socket-events.constant';
import { WsExceptionFilter } from './filters/ws-exception.filter';
import { WsValidationPipe } from './pipes/ws-validation.pipe';
import { SocketAuthService } from './services/socket-auth.service';
import { ChatService } from '../modules/chat/services/chat.service';
import { ChatSubscriptionAck, ChatSubscriptionDto } from './dto/socket-event.dto';
import type { NotificationTransport } from './interfaces/notification-transport.interface';
import socketConfig from '../config/socket.config';

// Decorator options are evaluated at import time
const gatewayConfig = socketConfig();

@WebSocketGateway({
  cors: {
    origin: (
      requestOrigin: string | undefined,
      callback: (err: Error | null, allow?: boolean) => void,
    ) => {
      const allowedOrigins = gatewayConfig.corsOrigins;
      if (
        !requestOrigin ||
        allowedOrigins.includes('*') ||
        allowedOrigins.includes(requestOrigin)
      ) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
  },
  namespace: '/socket.io',
  transports: ['websocket', 'polling'],
  pingInterval: gatewayConfig.pingInterval,
  pingTimeout: gatewayConfig.pingTimeout,
})
@UseFilters(WsExceptionFilter)
@UsePipes(WsValidationPipe)
export class SocketGateway
  implements
    OnGatewayInit,
    OnGatewayConnection,
    OnGatewayDisconnect,
    NotificationTransport
{
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(SocketGateway.name);

  constructor(
    private readonly socketAuth: SocketAuthService,
    private readonly chatService: ChatService,
  ) {}

  afterInit() {
    this.logger.log(
      `Socket.IO gateway initialized on ${gatewayConfig.serverInstance}`,
    );
  }

  /**
   * Authenticate the handshake and join the user's personal room.
   */
  async handleConnection(@ConnectedSocket() client: GatewayClient) {
    const principal = await this.socketAuth.authenticateSocket(client);

    if (!principal) {
      this.logger.warn(`Socket ${client.id}: Authentication failed`);
      client.emit(SocketEvents.AUTH_FAILED, {
        message: 'Authentication failed',
      });
      client.disconnect(true);
      return;
    }

    client.principal = principal;
    await client.join(SocketRooms.user(principal.username));

    this.logger.log(
      `Socket connected: ${client.id} | User: ${principal.username}`,
    );
  }

  handleDisconnect(@ConnectedSocket() client: GatewayClient) {
    // Socket.IO drops the socket from every room on its own
    this.logger.log(
      `Socket disconnected: ${client.id} | User: ${client.principal?.username ?? 'anonymous'}`,
    );
  }

  /**
   * Join the message, membership and property rooms of a chat.
   * Only current members may subscribe.
   */
  @SubscribeMessage(SocketEvents.CHAT_SUBSCRIBE)
  async handleSubscribe(
    @ConnectedSocket() client: GatewayClient,
    @MessageBody() dto: ChatSubscriptionDto,
  ): Promise<ChatSubscriptionAck> {
    const principal = client.principal;
    if (!principal) {
      return { ok: false, error: 'Not authenticated' };
    }

    const allowed = await this.chatService.isMember(dto.chatId, principal.userId);
    if (!allowed) {
      this.logger.warn(
        `User ${principal.username} denied subscription to chat ${dto.chatId}`,
      );
      return { ok: false, error: 'User is not a member of this chat' };
    }

    await client.join(this.chatRooms(dto.chatId));
    return { ok: true, chatId: dto.chatId };
  }

  @SubscribeMessage(SocketEvents.CHAT_UNSUBSCRIBE)
  async handleUnsubscribe(
    @ConnectedSocket() client: GatewayClient,
    @MessageBody() dto: ChatSubscriptionDto,
  ): Promise<ChatSubscriptionAck> {
    await Promise.all(
      this.chatRooms(dto.chatId).map((room) => client.leave(room)),
    );
    return { ok: true, chatId: dto.chatId };
  }

  broadcast(topic: string, event: string, payload: unknown): void {
    this.server.to(topic).emit(event, payload);
  }

  sendToUser(username: string, event: string, payload: unknown): void {
    this.server.to(SocketRooms.user(username)).emit(event, payload);
  }

  private chatRooms(chatId: string): string[] {
    return [
      SocketRooms.chat(chatId),
      SocketRooms.chatMembers(chatId),
      SocketRooms.chatUpdates(chatId),
    ];
  }
}
