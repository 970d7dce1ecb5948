import type { Principal } from '../../../common/interfaces/principal.interface';

/**
 * Claims this service reads from an access token. Tokens are issued by
 * the identity provider; `sub` is the user id.
 */
export interface JwtPayload {
  sub: string;
  username: string;
  type?: 'access' | 'refresh';
}

export function isJwtPayload(value: unknown): value is JwtPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    typeof value.sub === 'string' &&
    'username' in value &&
    typeof value.username === 'string'
  );
}

/**
 * The principal carried by a verified token, or null when the claims are
 * malformed or belong to a refresh token.
 */
export function toPrincipal(payload: unknown): Principal | null {
  if (!isJwtPayload(payload) || payload.type === 'refresh') return null;
  return { userId: payload.sub, username: payload.username };
}
