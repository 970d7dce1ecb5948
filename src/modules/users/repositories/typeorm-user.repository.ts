/**
 * TypeORM implementation of User Repository
 */

import { Injectable } from '@nestjs/common';
import { In } from 'typeorm';
import { ConflictError } from '../../../common/errors/chat-domain.errors';
import { isUniqueViolation } from '../../../database/query-errors';
import { TypeOrmTransactionHost } from '../../../database/typeorm-transaction-host';
import { User } from '../entities/user.entity';
import type { IUserRepository, UserRecord } from './user.repository.interface';

export function toUserRecord(user: User): UserRecord {
  return {
    id: user.id,
    username: user.username,
    phoneNumber: user.phoneNumber,
    name: user.name,
    createdAt: user.createdAt,
  };
}

@Injectable()
export class TypeOrmUserRepository implements IUserRepository {
  constructor(private readonly txHost: TypeOrmTransactionHost) {}

  private get repo() {
    return this.txHost.manager.getRepository(User);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = await this.repo.findOneBy({ id });
    return user ? toUserRecord(user) : null;
  }

  async findAll(): Promise<UserRecord[]> {
    const users = await this.repo.find({ order: { username: 'ASC' } });
    return users.map(toUserRecord);
  }

  async findByIds(ids: readonly string[]): Promise<UserRecord[]> {
    if (ids.length === 0) return [];
    const users = await this.repo.findBy({ id: In([...ids]) });
    return users.map(toUserRecord);
  }

  async findByPhoneNumber(phoneNumber: string): Promise<UserRecord | null> {
    const user = await this.repo.findOneBy({ phoneNumber });
    return user ? toUserRecord(user) : null;
  }

  async findByPhoneNumbers(
    phoneNumbers: readonly string[],
  ): Promise<UserRecord[]> {
    if (phoneNumbers.length === 0) return [];
    const users = await this.repo.findBy({ phoneNumber: In([...phoneNumbers]) });
    return users.map(toUserRecord);
  }

  async updatePhoneNumber(userId: string, phoneNumber: string): Promise<void> {
    try {
      await this.repo.update({ id: userId }, { phoneNumber });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Phone number is already registered');
      }
      throw error;
    }
  }
}
