/**
 * Delivery seam between the fanout listener and the wire.
 * SocketGateway is the production implementation.
 */

export const NOTIFICATION_TRANSPORT = Symbol('NOTIFICATION_TRANSPORT');

export interface NotificationTransport {
  /** Deliver to every subscriber of a topic room. */
  broadcast(topic: string, event: string, payload: unknown): void;

  /** Deliver to every session of one user. */
  sendToUser(username: string, event: string, payload: unknown): void;
}
