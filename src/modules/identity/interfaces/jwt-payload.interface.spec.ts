import { describe, it, expect } from 'vitest';
import { isJwtPayload, toPrincipal } from './jwt-payload.interface';

describe('toPrincipal', () => {
  it('should map sub and username of an access token', () => {
    expect(toPrincipal({ sub: 'user-1', username: 'alice', type: 'access' })).toEqual({
      userId: 'user-1',
      username: 'alice',
    });
  });

  it('should accept a token without a type claim', () => {
    expect(toPrincipal({ sub: 'user-1', username: 'alice' })).toEqual({
      userId: 'user-1',
      username: 'alice',
    });
  });

  it('should refuse a refresh token', () => {
    expect(
      toPrincipal({ sub: 'user-1', username: 'alice', type: 'refresh' }),
    ).toBeNull();
  });

  it('should refuse malformed claims', () => {
    expect(toPrincipal({ sub: 42, username: 'alice' })).toBeNull();
    expect(toPrincipal({ sub: 'user-1' })).toBeNull();
    expect(toPrincipal('user-1')).toBeNull();
    expect(toPrincipal(null)).toBeNull();
  });
});

describe('isJwtPayload', () => {
  it('should require string sub and username', () => {
    expect(isJwtPayload({ sub: 'user-1', username: 'alice', iat: 1 })).toBe(true);
    expect(isJwtPayload({ sub: 'user-1', username: null })).toBe(false);
  });
});
