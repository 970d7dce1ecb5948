import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UsersModule } from '../users/users.module';
import { ChatController } from './chat.controller';
import { Chat } from './entities/chat.entity';
import { ChatMember } from './entities/chat-member.entity';
import { CHAT_REPOSITORY, TypeOrmChatRepository } from './repositories';
import { ChatService } from './services/chat.service';

/**
 * ChatModule
 *
 * Chat lifecycle, membership and role-based authorization.
 * Publishes CHAT_CREATED, CHAT_UPDATED, CHAT_REMOVED and MEMBER_UPDATED;
 * the socket layer delivers them.
 *
 * RedisModule, EventsModule and DatabaseModule are global.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Chat, ChatMember]), UsersModule],
  controllers: [ChatController],
  providers: [
    ChatService,
    {
      provide: CHAT_REPOSITORY,
      useClass: TypeOrmChatRepository,
    },
  ],
  exports: [ChatService, CHAT_REPOSITORY],
})
export class ChatModule {}
