/**
 * EventPublisher Service
 *
 * Central hub for emitting domain events on the in-process bus
 * (EventEmitter2). Services publish after their transaction has committed
 * and their cache entries have been evicted.
 *
 * @example
 * ```typescript
 * constructor(private readonly eventPublisher: EventPublisher) {}
 *
 * async sendMessage(...) {
 *   const message = await this.txHost.run(...);
 *   await this.eventPublisher.publish(new MessageSentEvent(chatId, message));
 * }
 * ```
 */

import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from './base';

@Injectable()
export class EventPublisher {
  private readonly logger = new Logger(EventPublisher.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  /**
   * Publish a domain event and wait for every listener. Listener
   * failures are logged, never rethrown.
   *
   * @returns Event ID for tracking
   * @throws Error if event validation fails
   */
  async publish(event: DomainEvent): Promise<string> {
    this.validateEvent(event);

    await this.emitEvent(event);

    this.logger.debug(`Event published: ${event.eventType} (${event.eventId})`);

    return event.eventId;
  }

  /**
   * Publish several events in order. Each one is fully dispatched before
   * the next is emitted.
   */
  async publishBatch(events: DomainEvent[]): Promise<string[]> {
    for (const event of events) {
      this.validateEvent(event);
    }

    const eventIds: string[] = [];
    for (const event of events) {
      eventIds.push(await this.publish(event));
    }

    this.logger.debug(`Batch published: ${events.length} events`);
    return eventIds;
  }

  /**
   * Converts the event type to its EventEmitter2 name.
   *
   * MESSAGE_SENT → 'message.sent'
   * CHAT_CREATED → 'chat.created'
   */
  static eventNameOf(eventType: string): string {
    return eventType.toLowerCase().split('_').join('.');
  }

  private validateEvent(event: DomainEvent): void {
    if (!(event instanceof DomainEvent)) {
      throw new Error(`Invalid event: must extend DomainEvent`);
    }

    if (!event.eventType) {
      throw new Error(`Invalid event: missing eventType`);
    }

    if (!event.eventId) {
      throw new Error(`Invalid event: missing eventId`);
    }

    if (!event.source) {
      throw new Error(`Invalid event: missing source (which module emitted)`);
    }

    try {
      JSON.stringify(event.toJSON());
    } catch (error) {
      throw new Error(`Invalid event: not JSON serializable - ${String(error)}`);
    }
  }

  private async emitEvent(event: DomainEvent): Promise<void> {
    const eventName = EventPublisher.eventNameOf(event.eventType);

    try {
      await this.eventEmitter.emitAsync(eventName, event);
    } catch (error) {
      this.logger.error(
        `Event listener failed for ${eventName}:`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
