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
import { ContactService } from './contact.service';
import {
  AddContactDto,
  ContactByPhoneQueryDto,
  SyncContactsDto,
  UpdateContactDto,
} from './dto/contact.dto';

@ApiTags('contacts')
@ApiBearerAuth()
@Controller('contacts')
export class ContactController {
  constructor(private readonly contactService: ContactService) {}

  @Get()
  @ApiOperation({ summary: 'Get contacts of the current user' })
  @ResponseMessage('Fetch contacts')
  getAllContacts(@CurrentUser() user: Principal) {
    return this.contactService.getAllContacts(user);
  }

  @Get('phone')
  @ApiOperation({ summary: 'Find a registered user by phone number' })
  @ResponseMessage('Fetch user by phone number')
  getContactByPhoneNumber(@Query() query: ContactByPhoneQueryDto) {
    return this.contactService.getContactByPhoneNumber(query.phone);
  }

  @Post('sync')
  @ApiOperation({ summary: 'Match phone book numbers against registered users' })
  @ResponseMessage('Sync contacts')
  syncContacts(@Body() dto: SyncContactsDto) {
    return this.contactService.syncContacts(dto.phoneNumbers);
  }

  @Post()
  @ApiOperation({ summary: 'Add a contact by phone number' })
  @ResponseMessage('Add contact')
  addContact(@CurrentUser() user: Principal, @Body() dto: AddContactDto) {
    return this.contactService.addContact(
      user,
      dto.targetPhoneNumber,
      dto.customDisplayName,
    );
  }

  @Patch()
  @ApiOperation({ summary: "Rename a contact or change the contact's number" })
  @ResponseMessage('Update contact')
  updateContact(@CurrentUser() user: Principal, @Body() dto: UpdateContactDto) {
    return this.contactService.updateContact(user, dto);
  }

  @Delete(':contactUserId')
  @ApiOperation({ summary: 'Remove a contact' })
  @ResponseMessage('Delete contact')
  deleteContact(
    @CurrentUser() user: Principal,
    @Param('contactUserId', ParseUUIDPipe) contactUserId: string,
  ) {
    return this.contactService.deleteContact(user, contactUserId);
  }
}
