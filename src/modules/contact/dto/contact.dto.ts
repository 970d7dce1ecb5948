import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SyncContactsDto {
  @ApiProperty({ type: [String], description: 'Raw numbers from the phone book' })
  @IsArray()
  @IsString({ each: true })
  @ArrayMaxSize(1000)
  phoneNumbers!: string[];
}

export class AddContactDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty({ message: 'Target phone number is required' })
  targetPhoneNumber!: string;

  @ApiPropertyOptional({ description: 'Name shown to the owner only' })
  @IsString()
  @IsOptional()
  @MaxLength(100)
  customDisplayName?: string;
}

export class UpdateContactDto {
  @ApiProperty()
  @IsUUID()
  targetUserId!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  @MaxLength(100)
  newDisplayName?: string;

  @ApiPropertyOptional({ description: "Changes the contact user's number" })
  @IsString()
  @IsOptional()
  newPhoneNumber?: string;
}

export class ContactByPhoneQueryDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  phone!: string;
}
