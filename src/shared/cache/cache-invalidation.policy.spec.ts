import { describe, it, expect } from 'vitest';
import { CacheInvalidationPolicy } from './cache-invalidation.policy';

describe('CacheInvalidationPolicy', () => {
  it('should stale every new member chat list on creation', () => {
    expect(CacheInvalidationPolicy.chatCreated(['u1', 'u2'])).toEqual([
      'chat:user_chats:u1',
      'chat:user_chats:u2',
    ]);
  });

  it('should stale the member list and the affected chat lists on membership change', () => {
    expect(CacheInvalidationPolicy.membershipChanged('c1', ['u1', 'u3'])).toEqual([
      'chat:members:c1',
      'chat:user_chats:u1',
      'chat:user_chats:u3',
    ]);
  });

  it('should leave the member list alone on a property change', () => {
    expect(CacheInvalidationPolicy.chatPropertiesChanged(['u1'])).toEqual([
      'chat:user_chats:u1',
    ]);
  });

  it('should stale contact lists by owner', () => {
    expect(CacheInvalidationPolicy.contactsChanged(['u1', 'u2'])).toEqual([
      'contact:list:u1',
      'contact:list:u2',
    ]);
  });
});
