export { DomainEvent } from './domain-event';
export type { DomainEventType } from './domain-event';
