import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SocketGateway } from './socket.gateway';
import { SocketAuthService } from './services/socket-auth.service';
import { WsValidationPipe } from './pipes/ws-validation.pipe';
import { ChatNotificationListener } from './listeners/chat-notification.listener';
import { NOTIFICATION_TRANSPORT } from './interfaces/notification-transport.interface';
import { IdentityModule } from '../modules/identity/identity.module';
import { ChatModule } from '../modules/chat/chat.module';
import socketConfig from '../config/socket.config';
import jwtConfig from '../config/jwt.config';

/**
 * SocketModule
 *
 * Real-time edge. Domain modules publish events and never import this
 * module; ChatNotificationListener picks the events up and hands them to
 * the gateway through NOTIFICATION_TRANSPORT.
 */
@Module({
  imports: [
    ConfigModule.forFeature(socketConfig),
    ConfigModule.forFeature(jwtConfig),
    IdentityModule,
    ChatModule,
  ],
  providers: [
    SocketGateway,
    SocketAuthService,
    WsValidationPipe,
    {
      provide: NOTIFICATION_TRANSPORT,
      useExisting: SocketGateway,
    },
    ChatNotificationListener,
  ],
  exports: [SocketGateway, NOTIFICATION_TRANSPORT],
})
export class SocketModule {}
