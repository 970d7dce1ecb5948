/**
 * Event-driven infrastructure shared by every module.
 *
 * @example
 * ```typescript
 * import { EventPublisher } from '../../shared/events';
 *
 * await this.eventPublisher.publish(new ChatUpdatedEvent(chatId, chat));
 * ```
 */

export { DomainEvent } from './base';
export type { DomainEventType } from './base';
export { EventPublisher } from './event-publisher.service';
