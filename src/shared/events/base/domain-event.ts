/**
 * DomainEvent Base Class
 *
 * Every event published on the in-process bus extends this class, so each
 * carries an identity (eventId), a contract version and its origin.
 *
 * @example
 * ```typescript
 * export class ChatUpdatedEvent extends DomainEvent {
 *   readonly eventType = 'CHAT_UPDATED';
 *
 *   constructor(readonly chatId: string, readonly chat: ChatDisplay) {
 *     super('ChatModule', 'Chat', chatId);
 *   }
 * }
 * ```
 */

import { v4 as uuidv4 } from 'uuid';

export type DomainEventType =
  | 'CHAT_CREATED'
  | 'CHAT_UPDATED'
  | 'CHAT_REMOVED'
  | 'MEMBER_UPDATED'
  | 'MESSAGE_SENT'
  | 'CONTACT_UPDATED';

export abstract class DomainEvent {
  /**
   * Discriminator. Also drives the EventEmitter2 event name
   * (MESSAGE_SENT → 'message.sent').
   */
  abstract readonly eventType: DomainEventType;

  readonly eventId: string;

  /**
   * Event contract version. Bump it when a field is added instead of
   * creating a second event class.
   */
  readonly version: number;

  readonly timestamp: Date;

  /** Module that emitted the event, e.g. 'ChatModule'. */
  readonly source: string;

  readonly aggregateId: string;
  readonly aggregateType: string;

  /**
   * @param source - Module that emitted (e.g., 'MessageModule')
   * @param aggregateType - Type of changed entity (e.g., 'Chat', 'User')
   * @param aggregateId - ID of changed entity
   * @param version - Event contract version (default: 1)
   */
  constructor(
    source: string,
    aggregateType: string,
    aggregateId: string,
    version: number = 1,
  ) {
    this.eventId = uuidv4();
    this.source = source;
    this.aggregateType = aggregateType;
    this.aggregateId = aggregateId;
    this.version = version;
    this.timestamp = new Date();
  }

  /**
   * Envelope fields. Subclasses spread this and add their payload.
   */
  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventType: this.eventType,
      version: this.version,
      timestamp: this.timestamp.toISOString(),
      source: this.source,
      aggregateType: this.aggregateType,
      aggregateId: this.aggregateId,
    };
  }
}
