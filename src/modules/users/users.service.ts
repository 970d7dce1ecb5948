import { Inject, Injectable } from '@nestjs/common';
import { NotFoundError } from '../../common/errors/chat-domain.errors';
import type { Principal } from '../../common/interfaces/principal.interface';
import { USER_REPOSITORY } from './repositories';
import type { IUserRepository, UserRecord } from './repositories';

export interface UserProfile {
  userId: string;
  username: string;
  name: string;
  phoneNumber: string;
}

function toUserProfile(user: UserRecord): UserProfile {
  return {
    userId: user.id,
    username: user.username,
    name: user.name,
    phoneNumber: user.phoneNumber,
  };
}

@Injectable()
export class UsersService {
  constructor(
    @Inject(USER_REPOSITORY)
    private readonly userRepository: IUserRepository,
  ) {}

  async getProfile(principal: Principal): Promise<UserProfile> {
    const user = await this.userRepository.findById(principal.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toUserProfile(user);
  }

  /** Directory listing used by clients to pick chat members. */
  async getAllUsers(): Promise<UserProfile[]> {
    const users = await this.userRepository.findAll();
    return users.map(toUserProfile);
  }
}
