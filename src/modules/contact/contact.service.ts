import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../common/errors/chat-domain.errors';
import type { Principal } from '../../common/interfaces/principal.interface';
import { TransactionHost } from '../../database/transaction-host';
import { CacheInvalidationPolicy } from '../../shared/cache/cache-invalidation.policy';
import { EventPublisher } from '../../shared/events';
import { RedisKeyBuilder } from '../../shared/redis/redis-key-builder';
import { CacheService } from '../redis/services/cache.service';
import { USER_REPOSITORY } from '../users/repositories';
import type { IUserRepository, UserRecord } from '../users/repositories';
import { ContactUpdatedEvent } from './events';
import type {
  ContactDisplay,
  ContactMatch,
  ContactUpdateType,
} from './interfaces/contact-display.interface';
import { CONTACT_REPOSITORY } from './repositories';
import type { ContactRecord, IContactRepository } from './repositories';

export interface UpdateContactInput {
  targetUserId: string;
  newDisplayName?: string | null;
  newPhoneNumber?: string | null;
}

function nonBlank(value: string | null | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function toContactMatch(user: UserRecord): ContactMatch {
  return {
    id: user.id,
    username: user.username,
    name: user.name,
    phoneNumber: user.phoneNumber,
  };
}

function toContactDisplay(
  contact: ContactRecord,
  contactUser: UserRecord,
): ContactDisplay {
  return {
    id: contact.id,
    contactUserId: contact.contactUserId,
    displayName: contact.displayName,
    contactUsername: contactUser.username,
    contactPhoneNumber: contactUser.phoneNumber,
  };
}

@Injectable()
export class ContactService {
  private readonly logger = new Logger(ContactService.name);

  constructor(
    @Inject(CONTACT_REPOSITORY)
    private readonly contactRepository: IContactRepository,
    @Inject(USER_REPOSITORY)
    private readonly userRepository: IUserRepository,
    private readonly txHost: TransactionHost,
    private readonly cache: CacheService,
    private readonly eventPublisher: EventPublisher,
  ) {}

  /**
   * Which of the given numbers belong to registered users.
   * Read-only, no side effects.
   */
  async syncContacts(phoneNumbers: string[]): Promise<ContactMatch[]> {
    const unique = [...new Set(phoneNumbers.map((phone) => phone.trim()))];
    const users = await this.userRepository.findByPhoneNumbers(unique);
    return users.map(toContactMatch);
  }

  async getAllContacts(owner: Principal): Promise<ContactDisplay[]> {
    return this.cache.getOrLoad(
      RedisKeyBuilder.userContacts(owner.userId),
      async () => {
        const contacts = await this.contactRepository.findByOwner(owner.userId);
        return contacts.map((contact) =>
          toContactDisplay(contact, contact.contactUser),
        );
      },
    );
  }

  async getContactByPhoneNumber(phoneNumber: string): Promise<ContactMatch> {
    const user = await this.userRepository.findByPhoneNumber(phoneNumber.trim());
    if (!user) {
      throw new NotFoundError('No user registered with this phone number');
    }
    return toContactMatch(user);
  }

  async addContact(
    owner: Principal,
    targetPhoneNumber: string,
    displayName?: string | null,
  ): Promise<ContactDisplay> {
    const target = await this.userRepository.findByPhoneNumber(
      targetPhoneNumber.trim(),
    );
    if (!target) {
      throw new NotFoundError('Target user not found');
    }
    if (target.id === owner.userId) {
      throw new ValidationError('Cannot add yourself as a contact');
    }

    const contact = await this.txHost.run(async () => {
      const existing = await this.contactRepository.findByOwnerAndContactUser(
        owner.userId,
        target.id,
      );
      if (existing) {
        throw new ValidationError('Contact already added');
      }
      // A concurrent duplicate still fails here, on the unique index
      return this.contactRepository.create({
        ownerId: owner.userId,
        contactUserId: target.id,
        displayName: nonBlank(displayName) ?? null,
      });
    });

    await this.cache.evict(...CacheInvalidationPolicy.contactsChanged([owner.userId]));
    await this.notify(owner, target.username, 'CONTACT_ADDED');

    this.logger.log(`User ${owner.userId} added contact ${target.id}`);
    return toContactDisplay(contact, target);
  }

  async updateContact(
    owner: Principal,
    input: UpdateContactInput,
  ): Promise<ContactDisplay> {
    const newDisplayName = nonBlank(input.newDisplayName);
    const newPhoneNumber = nonBlank(input.newPhoneNumber);

    const { contact, target, phoneChanged, observerIds } =
      await this.txHost.run(async () => {
        const relationship =
          await this.contactRepository.findByOwnerAndContactUser(
            owner.userId,
            input.targetUserId,
          );
        if (!relationship) {
          throw new ForbiddenError(
            'Contact relationship not found or unauthorized',
          );
        }

        let contactUser = relationship.contactUser;
        let changed = false;

        if (newPhoneNumber && newPhoneNumber !== contactUser.phoneNumber) {
          const holder =
            await this.userRepository.findByPhoneNumber(newPhoneNumber);
          if (holder && holder.id !== contactUser.id) {
            throw new ConflictError('Phone number is already registered');
          }
          await this.userRepository.updatePhoneNumber(
            contactUser.id,
            newPhoneNumber,
          );
          contactUser = { ...contactUser, phoneNumber: newPhoneNumber };
          changed = true;
        }

        if (newDisplayName) {
          await this.contactRepository.updateDisplayName(
            relationship.id,
            newDisplayName,
          );
        }

        return {
          contact: {
            ...relationship,
            displayName: newDisplayName ?? relationship.displayName,
          },
          target: contactUser,
          phoneChanged: changed,
          // Every owner whose list embeds the old number
          observerIds: changed
            ? await this.contactRepository.findOwnerIdsByContactUser(
                contactUser.id,
              )
            : [],
        };
      });

    await this.cache.evict(
      ...CacheInvalidationPolicy.contactsChanged([owner.userId, ...observerIds]),
    );
    if (phoneChanged) {
      await this.notify(owner, target.username, 'CONTACT_DETAILS_UPDATED');
    }

    this.logger.log(
      `User ${owner.userId} updated contact ${target.id}${phoneChanged ? ' (phone number changed)' : ''}`,
    );
    return toContactDisplay(contact, target);
  }

  async deleteContact(owner: Principal, contactUserId: string): Promise<void> {
    const relationship = await this.txHost.run(async () => {
      const existing = await this.contactRepository.findByOwnerAndContactUser(
        owner.userId,
        contactUserId,
      );
      if (!existing) {
        throw new ForbiddenError('Contact not found or unauthorized');
      }
      await this.contactRepository.delete(existing.id);
      return existing;
    });

    await this.cache.evict(...CacheInvalidationPolicy.contactsChanged([owner.userId]));
    await this.notify(owner, relationship.contactUser.username, 'CONTACT_REMOVED');

    this.logger.log(`User ${owner.userId} removed contact ${contactUserId}`);
  }

  private async notify(
    actor: Principal,
    targetUsername: string,
    updateType: ContactUpdateType,
  ): Promise<void> {
    await this.eventPublisher.publish(
      new ContactUpdatedEvent(targetUsername, {
        userId: actor.userId,
        username: actor.username,
        updateType,
      }),
    );
  }
}
