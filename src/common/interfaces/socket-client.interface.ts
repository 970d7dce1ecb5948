import { Socket } from 'socket.io';
import type { Principal } from './principal.interface';

/**
 * Socket with the principal resolved during the handshake.
 */
export interface AuthenticatedSocket extends Socket {
  principal?: Principal;
}

/** The part of a socket the gateway handlers touch. */
export type GatewayClient = Pick<
  AuthenticatedSocket,
  'id' | 'handshake' | 'principal' | 'join' | 'leave' | 'emit' | 'disconnect'
>;
