import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, ResponseMessage } from '../../common/decorator/customize';
import type { Principal } from '../../common/interfaces/principal.interface';
import { GetMessagesQueryDto } from './dto/get-messages.dto';
import { EditMessageDto, SendMessageDto } from './dto/send-message.dto';
import { MessageService } from './services/message.service';

@ApiTags('messages')
@ApiBearerAuth()
@Controller('messages')
export class MessageController {
  constructor(private readonly messageService: MessageService) {}

  @Post()
  @ApiOperation({ summary: 'Send a message to a chat' })
  @ResponseMessage('Send message')
  sendMessage(@CurrentUser() user: Principal, @Body() dto: SendMessageDto) {
    return this.messageService.sendMessage(user, dto);
  }

  @Get(':chatId')
  @ApiOperation({ summary: 'Get a page of messages, newest first' })
  @ResponseMessage('Fetch messages')
  getMessages(
    @CurrentUser() user: Principal,
    @Param('chatId', ParseUUIDPipe) chatId: string,
    @Query() query: GetMessagesQueryDto,
  ) {
    return this.messageService.getMessages(
      chatId,
      user,
      query.page ?? 0,
      query.size ?? 20,
    );
  }

  @Patch()
  @ApiOperation({ summary: 'Edit the content of a TEXT message' })
  @ResponseMessage('Edit message')
  editMessage(@CurrentUser() user: Principal, @Body() dto: EditMessageDto) {
    return this.messageService.editMessage(user, dto.messageId, dto.newContent);
  }

  @Delete(':messageId')
  @ApiOperation({ summary: 'Delete a message (sender or chat admin)' })
  @ResponseMessage('Delete message')
  deleteMessage(
    @CurrentUser() user: Principal,
    @Param('messageId', ParseUUIDPipe) messageId: string,
  ) {
    return this.messageService.deleteMessage(user, messageId);
  }
}
