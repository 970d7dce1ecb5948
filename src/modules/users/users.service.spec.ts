import { describe, it, expect, beforeEach } from 'vitest';
import { Test } from '@nestjs/testing';
import { UsersService } from './users.service';
import { USER_REPOSITORY } from './repositories/user.repository.interface';
import { NotFoundError } from '../../common/errors/chat-domain.errors';
import { InMemoryStore } from '../../../test/mocks/in-memory-store';
import { InMemoryUserRepository } from '../../../test/mocks/in-memory-repositories';

describe('UsersService', () => {
  let service: UsersService;
  let store: InMemoryStore;

  beforeEach(async () => {
    store = new InMemoryStore();

    const module = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: USER_REPOSITORY, useValue: new InMemoryUserRepository(store) },
      ],
    }).compile();

    service = module.get(UsersService);
  });

  it('should return the profile of the caller', async () => {
    const alice = store.addUser('alice', '+15550000001', 'Alice Doe');

    expect(
      await service.getProfile({ userId: alice.id, username: 'alice' }),
    ).toEqual({
      userId: alice.id,
      username: 'alice',
      name: 'Alice Doe',
      phoneNumber: '+15550000001',
    });
  });

  it('should fail for an unknown user', async () => {
    await expect(
      service.getProfile({ userId: 'user-missing', username: 'ghost' }),
    ).rejects.toThrow(new NotFoundError('User not found'));
  });

  it('should list every user by username', async () => {
    const carol = store.addUser('carol', '+15550000003', 'Carol Roe');
    const alice = store.addUser('alice', '+15550000001', 'Alice Doe');

    expect(await service.getAllUsers()).toEqual([
      {
        userId: alice.id,
        username: 'alice',
        name: 'Alice Doe',
        phoneNumber: '+15550000001',
      },
      {
        userId: carol.id,
        username: 'carol',
        name: 'Carol Roe',
        phoneNumber: '+15550000003',
      },
    ]);
  });

  it('should list nobody when no user is registered', async () => {
    expect(await service.getAllUsers()).toEqual([]);
  });
});
