import {
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MessageType } from '../../../common/enums/chat.enums';

export class SendMessageDto {
  @ApiProperty()
  @IsUUID()
  chatId!: string;

  // Case-insensitive; checked against the content validator registry
  @ApiProperty({ enum: MessageType, example: MessageType.TEXT })
  @IsString()
  @IsNotEmpty()
  messageType!: string;

  @ApiPropertyOptional({ description: 'Text, or caption of a media message' })
  @IsString()
  @IsOptional()
  @MaxLength(10000) // 10KB text limit
  content?: string;

  @ApiPropertyOptional({ description: 'Required for media messages' })
  @IsString()
  @IsOptional()
  mediaUrl?: string;
}

export class EditMessageDto {
  @ApiProperty()
  @IsUUID()
  messageId!: string;

  @ApiProperty()
  @IsString()
  @MaxLength(10000)
  newContent!: string;
}
