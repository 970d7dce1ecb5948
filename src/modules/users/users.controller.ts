import { Controller, Get } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CurrentUser, ResponseMessage } from '../../common/decorator/customize';
import type { Principal } from '../../common/interfaces/principal.interface';
import { UsersService } from './users.service';

@ApiTags('users')
@ApiBearerAuth()
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get('profile') // Endpoint: /api/v1/users/profile
  @ApiOperation({ summary: 'Profile of the authenticated user' })
  @ResponseMessage('Fetch current user profile')
  getProfile(@CurrentUser() user: Principal) {
    return this.usersService.getProfile(user);
  }

  @Get('all') // Endpoint: /api/v1/users/all
  @ApiOperation({ summary: 'List every registered user' })
  @ResponseMessage('Fetch all users')
  getAllUsers() {
    return this.usersService.getAllUsers();
  }
}
