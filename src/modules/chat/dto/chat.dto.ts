import {
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ChatType, MemberRole } from '../../../common/enums/chat.enums';

export class CreateChatDto {
  // Case-insensitive; unknown values are rejected by ChatService
  @ApiProperty({ enum: ChatType, example: ChatType.GROUP })
  @IsString()
  @IsNotEmpty()
  chatType!: string;

  @ApiPropertyOptional({ description: 'Required for GROUP chats' })
  @IsString()
  @IsOptional()
  @MaxLength(100)
  groupName?: string;

  @ApiPropertyOptional({ description: 'Image URL of the group' })
  @IsString()
  @IsOptional()
  groupImage?: string;

  @ApiProperty({
    type: [String],
    description: 'Initial members. The creator is added when absent',
  })
  @IsArray()
  @IsUUID('all', { each: true })
  @ArrayMinSize(1)
  memberIds!: string[];
}

export class UpdateGroupPropertiesDto {
  @ApiProperty()
  @IsUUID()
  chatId!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  @MaxLength(100)
  newGroupName?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  newGroupImage?: string;
}

export class UpdateMembershipDto {
  @ApiProperty()
  @IsUUID()
  chatId!: string;

  @ApiProperty({ type: [String] })
  @IsArray()
  @IsUUID('all', { each: true })
  @ArrayMinSize(1)
  memberUserIds!: string[];
}

export class UpdateMemberRoleDto {
  @ApiProperty()
  @IsUUID()
  chatId!: string;

  @ApiProperty()
  @IsUUID()
  targetUserId!: string;

  @ApiProperty({ enum: MemberRole, description: 'Case-insensitive' })
  @IsString()
  @IsNotEmpty()
  newRole!: string;
}
