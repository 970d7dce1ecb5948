/**
 * CONTACT DOMAIN EVENTS
 *
 * Owner: ContactModule
 */

import { DomainEvent } from '../../../shared/events';
import type { ContactNotification } from '../interfaces/contact-display.interface';

/**
 * Emitted when a user adds, updates or removes another user as a contact.
 *
 * Delivery: targeted to `targetUsername` (the other party).
 *
 * @version 1
 */
export class ContactUpdatedEvent extends DomainEvent {
  readonly eventType = 'CONTACT_UPDATED';
  readonly version = 1;

  constructor(
    readonly targetUsername: string,
    readonly notification: ContactNotification,
  ) {
    super('ContactModule', 'User', notification.userId, 1);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      targetUsername: this.targetUsername,
      notification: this.notification,
    };
  }
}
