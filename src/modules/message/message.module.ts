import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatModule } from '../chat/chat.module';
import { Message } from './entities/message.entity';
import { MessageValidator } from './helpers/message-validation.helper';
import { MessageController } from './message.controller';
import { MESSAGE_REPOSITORY, TypeOrmMessageRepository } from './repositories';
import { MessageService } from './services';

/**
 * MessageModule
 *
 * Send, page, edit and soft-delete messages. Every change is published as
 * MESSAGE_SENT for the socket layer to broadcast.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Message]), ChatModule],
  controllers: [MessageController],
  providers: [
    MessageService,
    MessageValidator,
    {
      provide: MESSAGE_REPOSITORY,
      useClass: TypeOrmMessageRepository,
    },
  ],
  exports: [MessageService, MessageValidator],
})
export class MessageModule {}
