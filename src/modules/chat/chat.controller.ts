import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, ResponseMessage } from '../../common/decorator/customize';
import type { Principal } from '../../common/interfaces/principal.interface';
import {
  CreateChatDto,
  UpdateGroupPropertiesDto,
  UpdateMemberRoleDto,
  UpdateMembershipDto,
} from './dto/chat.dto';
import { ChatService } from './services/chat.service';

@ApiTags('chats')
@ApiBearerAuth()
@Controller('chats')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Get()
  @ApiOperation({ summary: 'Get chats of the current user' })
  @ResponseMessage('Fetch user chats')
  getUserChats(@CurrentUser() user: Principal) {
    return this.chatService.getUserChats(user);
  }

  @Get(':chatId/members')
  @ApiOperation({ summary: 'Get members of a chat' })
  @ResponseMessage('Fetch chat members')
  getChatMembers(
    @CurrentUser() user: Principal,
    @Param('chatId', ParseUUIDPipe) chatId: string,
  ) {
    return this.chatService.getChatMembers(chatId, user);
  }

  @Post()
  @ApiOperation({ summary: 'Create a P2P or GROUP chat' })
  @ResponseMessage('Create chat')
  createChat(@CurrentUser() user: Principal, @Body() dto: CreateChatDto) {
    return this.chatService.createChat(user, dto);
  }

  @Patch('properties')
  @ApiOperation({ summary: 'Rename a group or change its image (admin)' })
  @ResponseMessage('Update group properties')
  updateGroupProperties(
    @CurrentUser() user: Principal,
    @Body() dto: UpdateGroupPropertiesDto,
  ) {
    return this.chatService.updateGroupProperties(user, dto);
  }

  @Post('members')
  @ApiOperation({ summary: 'Add members to a chat (admin)' })
  @ResponseMessage('Add members')
  addMember(@CurrentUser() user: Principal, @Body() dto: UpdateMembershipDto) {
    return this.chatService.addMember(user, dto.chatId, dto.memberUserIds);
  }

  @Patch('roles')
  @ApiOperation({ summary: 'Change the role of a member (admin)' })
  @ResponseMessage('Update member role')
  updateMemberRole(
    @CurrentUser() user: Principal,
    @Body() dto: UpdateMemberRoleDto,
  ) {
    return this.chatService.updateMemberRole(
      user,
      dto.chatId,
      dto.targetUserId,
      dto.newRole,
    );
  }

  @Delete('members')
  @ApiOperation({ summary: 'Remove members, or leave a chat' })
  @ResponseMessage('Remove members')
  deleteMember(
    @CurrentUser() user: Principal,
    @Body() dto: UpdateMembershipDto,
  ) {
    return this.chatService.deleteMember(user, dto.chatId, dto.memberUserIds);
  }
}
